/**
 * Handle for one background reconciliation run.
 *
 * The underlying promise never rejects: its outcome is kept on the handle
 * (`state`, `result`, `error`) so a task nobody awaits cannot surface as an
 * unhandled rejection.
 */

import { toError } from "./errors.js";

/** Lifecycle of a task. "Not started" is the absence of a handle. */
export type SyncTaskState = "running" | "completed" | "failed";

/** Counters reported by a finished reconciliation. */
export interface SyncResult {
	/** Recordings found by the scan. */
	recordings: number;
	/** Conversations they grouped into. */
	conversations: number;
	/** Conversations written to the index. */
	indexed: number;
	/** Conversations whose index write failed. */
	failed: number;
	/** Rows removed because their directory is gone. */
	pruned: number;
	durationMs: number;
}

/**
 * A running or settled reconciliation.
 *
 * @example
 * ```typescript
 * const task = SyncTask.start(() => coordinator.reconcile());
 * if (await task.wait(5_000)) console.log(task.result);
 * ```
 */
export class SyncTask {
	private currentState: SyncTaskState = "running";
	private settledResult: SyncResult | undefined;
	private settledError: Error | undefined;
	private finishedTime: Date | undefined;
	private readonly settled: Promise<void>;
	readonly startedAt = new Date();

	private constructor(run: () => Promise<SyncResult>) {
		this.settled = run().then(
			(result) => {
				this.settledResult = result;
				this.currentState = "completed";
				this.finishedTime = new Date();
			},
			(error: unknown) => {
				this.settledError = toError(error);
				this.currentState = "failed";
				this.finishedTime = new Date();
			}
		);
	}

	/**
	 * Start `run` immediately and return its handle.
	 *
	 * @param run - Reconciliation to execute
	 * @returns Running task
	 */
	static start(run: () => Promise<SyncResult>): SyncTask {
		return new SyncTask(run);
	}

	get state(): SyncTaskState {
		return this.currentState;
	}

	get result(): SyncResult | undefined {
		return this.settledResult;
	}

	get error(): Error | undefined {
		return this.settledError;
	}

	get finishedAt(): Date | undefined {
		return this.finishedTime;
	}

	/** Resolves once the task has settled either way. */
	done(): Promise<void> {
		return this.settled;
	}

	/**
	 * Wait for the task to settle, up to `timeoutMs`.
	 * Timing out leaves the task running.
	 *
	 * @param timeoutMs - Upper bound in milliseconds
	 * @returns True when the task completed successfully in time
	 */
	async wait(timeoutMs: number): Promise<boolean> {
		if (this.currentState !== "running") {
			return this.currentState === "completed";
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), Math.max(0, timeoutMs));
		});

		try {
			const outcome = await Promise.race([this.settled.then(() => "settled" as const), timedOut]);
			return outcome === "settled" && this.state === "completed";
		} finally {
			clearTimeout(timer);
		}
	}
}
