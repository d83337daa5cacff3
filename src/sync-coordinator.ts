/**
 * Keeps the search index consistent with the recordings on disk.
 *
 * At most one reconciliation runs per coordinator: the running-task check
 * and the task assignment happen synchronously, before the first await.
 */

import { groupIntoConversations } from "./conversation-grouper.js";
import { SyncFailureError, toError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { RecordingStore } from "./recording-store.js";
import type { SearchIndex } from "./search-index.js";
import { type SyncResult, SyncTask, type SyncTaskState } from "./sync-task.js";
import type { Conversation } from "./types.js";

/** Progress is logged after every this many conversations. */
export const PROGRESS_INTERVAL = 100;

/** Outcome of {@link SyncCoordinator.ensureSync}. */
export type EnsureSyncOutcome = "synced" | "skipped";

/** Snapshot returned by {@link SyncCoordinator.getStatus}. */
export interface SyncStatus {
	state: SyncTaskState | "idle";
	syncing: boolean;
	syncComplete: boolean;
	startedAt: string | null;
	finishedAt: string | null;
	lastResult: SyncResult | null;
	lastError: string | null;
}

/**
 * Reconciles a {@link RecordingStore} into a {@link SearchIndex}.
 *
 * @example
 * ```typescript
 * const sync = new SyncCoordinator(store, index, logger);
 * sync.startBackgroundSync();
 * const ready = await sync.waitForSync(30_000);
 * ```
 */
export class SyncCoordinator {
	private currentTask: SyncTask | undefined;
	private lastCompleted: SyncTask | undefined;

	/**
	 * @param store - Source of recordings
	 * @param index - Index to keep up to date
	 * @param logger - Diagnostic sink
	 */
	constructor(
		private readonly store: RecordingStore,
		private readonly index: SearchIndex,
		private readonly logger: Logger = silentLogger
	) {}

	/**
	 * Start a reconciliation without waiting for it. A call while one is
	 * running returns the running task.
	 *
	 * @returns The running task
	 */
	startBackgroundSync(): SyncTask {
		const running = this.currentTask;
		if (running && running.state === "running") {
			this.logger.debug("sync", "already_running");
			return running;
		}

		const task = SyncTask.start(() => this.reconcile());
		this.currentTask = task;
		this.logger.info("sync", "started", { baseDirectory: this.store.baseDirectory });

		void task.done().then(() => {
			if (task.state === "completed") {
				this.lastCompleted = task;
				this.logger.info("sync", "completed", { ...task.result });
			} else {
				this.logger.error("sync", "failed", { error: task.error });
			}
		});

		return task;
	}

	/**
	 * Wait up to `timeoutMs` for the current task.
	 *
	 * @param timeoutMs - Upper bound in milliseconds
	 * @returns True when a sync has completed before or completes in time;
	 *   false on timeout, when no sync was started, or when the task failed
	 */
	async waitForSync(timeoutMs: number): Promise<boolean> {
		const task = this.currentTask;
		if (!task || task.state !== "running") return this.isSyncComplete();

		const completed = await task.wait(timeoutMs);
		if (!completed && task.state === "running") {
			this.logger.warn("sync", "wait_timeout", { timeoutMs });
		}
		return completed || this.isSyncComplete();
	}

	/**
	 * Reconcile when the index looks out of date (or when forced) and wait
	 * for it to finish.
	 *
	 * @param force - Reconcile even when the counts agree
	 * @returns "skipped" when a task is already running, the recordings
	 *   directory is missing, or counts agree
	 * @throws {SyncFailureError} When the reconciliation fails
	 */
	async ensureSync(force = false): Promise<EnsureSyncOutcome> {
		if (this.isSyncing()) return "skipped";

		if (!(await this.store.exists())) {
			this.logger.warn("sync", "base_missing", { baseDirectory: this.store.baseDirectory });
			return "skipped";
		}

		if (!force && (await this.countsAgree())) {
			this.logger.debug("sync", "up_to_date");
			return "skipped";
		}
		// A task may have started while the counts were read.
		if (this.isSyncing()) return "skipped";

		const task = this.startBackgroundSync();
		await task.done();
		if (task.state === "failed") {
			throw new SyncFailureError(
				`Sync failed: ${task.error?.message ?? "unknown error"}`,
				task.error
			);
		}
		return "synced";
	}

	/** @returns True while a reconciliation is running */
	isSyncing(): boolean {
		return this.currentTask?.state === "running";
	}

	/** Resolves once no reconciliation is running. Never rejects. */
	async whenIdle(): Promise<void> {
		while (this.currentTask?.state === "running") {
			await this.currentTask.done();
		}
	}

	/** @returns True once any reconciliation has completed successfully */
	isSyncComplete(): boolean {
		return this.currentTask?.state === "completed" || this.lastCompleted !== undefined;
	}

	/** @returns Snapshot of the current or most recent task */
	getStatus(): SyncStatus {
		const task = this.currentTask;
		const resultSource = task?.state === "completed" ? task : this.lastCompleted;
		return {
			state: task?.state ?? "idle",
			syncing: this.isSyncing(),
			syncComplete: this.isSyncComplete(),
			startedAt: task?.startedAt.toISOString() ?? null,
			finishedAt: task?.finishedAt?.toISOString() ?? null,
			lastResult: resultSource?.result ?? null,
			lastError: task?.state === "failed" ? (task.error?.message ?? null) : null,
		};
	}

	/**
	 * Full rebuild from the filesystem: scan, group, upsert every version,
	 * recompute latest flags, prune rows whose directory is gone. Nothing is
	 * pruned while the recordings directory itself is missing.
	 *
	 * A failing conversation is logged and counted; the rest continue.
	 *
	 * @returns Counters for the run
	 * @throws When the scan fails, or when every conversation failed
	 */
	async reconcile(): Promise<SyncResult> {
		const started = Date.now();
		const recordings = await this.store.scan();
		const conversations = groupIntoConversations(recordings);

		let indexed = 0;
		let failed = 0;
		const keep = new Map<string, Set<string>>();

		for (const conversation of conversations) {
			keep.set(
				conversation.conversationId,
				new Set(conversation.versions.map((version) => version.versionId))
			);
			try {
				this.indexConversation(conversation);
				indexed++;
			} catch (error) {
				failed++;
				this.logger.error("index", "conversation_failed", {
					conversationId: conversation.conversationId,
					error: toError(error),
				});
			}

			const processed = indexed + failed;
			if (processed % PROGRESS_INTERVAL === 0) {
				this.logger.info("sync", "progress", { processed, total: conversations.length });
			}
		}

		if (conversations.length > 0 && indexed === 0) {
			throw new Error(`Could not index any of ${conversations.length} conversations`);
		}

		// A missing tree scans as empty; keep the index as it is.
		let pruned = 0;
		if (await this.store.exists()) {
			pruned = this.index.pruneExcept(keep);
		} else {
			this.logger.warn("sync", "prune_skipped", { baseDirectory: this.store.baseDirectory });
		}

		return {
			recordings: recordings.length,
			conversations: conversations.length,
			indexed,
			failed,
			pruned,
			durationMs: Date.now() - started,
		};
	}

	/** Write one conversation's versions and flags atomically. */
	private indexConversation(conversation: Conversation): void {
		this.index.transaction(() => {
			for (const version of conversation.versions) {
				this.index.upsert({
					conversationId: conversation.conversationId,
					versionId: version.versionId,
					timestamp: version.timestamp,
					recording: version.recording,
					title: conversation.title,
					isLatest: version.isLatest,
				});
			}
			this.index.updateLatestFlags(conversation.conversationId);
		});
	}

	/**
	 * Compare the directory count with the index's conversation count.
	 * A failing check counts as a mismatch.
	 */
	private async countsAgree(): Promise<boolean> {
		try {
			const directories = await this.store.countRecordingDirectories();
			const indexed = this.index.getCount();
			this.logger.debug("sync", "count_check", { directories, indexed });
			return directories === indexed;
		} catch (error) {
			this.logger.warn("sync", "count_check_failed", { error: toError(error) });
			return false;
		}
	}
}
