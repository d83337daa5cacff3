import assert from "node:assert/strict";
import { rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { type CatalogDatabase, openCatalogDatabase } from "../database.js";
import { NotFoundError, SyncFailureError } from "../errors.js";
import { MemoryLogger } from "../logger.js";
import { DirectoryRecordingStore, type RecordingStore } from "../recording-store.js";
import { type IndexUpsert, SearchIndex } from "../search-index.js";
import { SyncCoordinator } from "../sync-coordinator.js";
import type { Recording } from "../types.js";
import { makeTempDir, metaDocument, removeDir, writeRecording } from "./fixtures.js";

function recording(timestamp: number, fields: Partial<Recording> = {}): Recording {
	return {
		timestamp,
		directory: `/fake/${timestamp}`,
		segments: [],
		createdAt: new Date(timestamp * 1000),
		...fields,
	};
}

/** In-memory store whose scan can be held open or made to fail. */
class FakeStore implements RecordingStore {
	readonly baseDirectory = "/fake";
	recordings: Recording[] = [];
	present = true;
	scanError: Error | undefined;
	countError: Error | undefined;
	private gate: Promise<void> | undefined;
	private openGate: () => void = () => {};

	/** Make the next scans wait until {@link release} is called. */
	hold(): void {
		this.gate = new Promise<void>((resolve) => {
			this.openGate = resolve;
		});
	}

	release(): void {
		this.gate = undefined;
		this.openGate();
	}

	async scan(): Promise<Recording[]> {
		if (this.gate) await this.gate;
		if (this.scanError) throw this.scanError;
		return [...this.recordings];
	}

	async getByTimestamp(timestamp: number): Promise<Recording | null> {
		return this.recordings.find((candidate) => candidate.timestamp === timestamp) ?? null;
	}

	async readAudio(): Promise<Buffer> {
		throw new NotFoundError("no audio in the fake store");
	}

	async countRecordingDirectories(): Promise<number> {
		if (this.countError) throw this.countError;
		return this.recordings.length;
	}

	async exists(): Promise<boolean> {
		return this.present;
	}
}

/** Index that refuses to write one conversation. */
class FlakyIndex extends SearchIndex {
	constructor(
		db: CatalogDatabase,
		private readonly refuse: (conversationId: string) => boolean
	) {
		super(db);
	}

	override upsert(entry: IndexUpsert): void {
		if (this.refuse(entry.conversationId)) throw new Error("constraint failed");
		super.upsert(entry);
	}
}

describe("SyncCoordinator", () => {
	let db: CatalogDatabase;
	let index: SearchIndex;

	beforeEach(() => {
		db = openCatalogDatabase(":memory:");
		index = new SearchIndex(db);
	});

	afterEach(() => {
		db.close();
	});

	describe("with a recordings directory", () => {
		let base: string;

		beforeEach(() => {
			base = makeTempDir("sync");
			writeRecording(base, { timestamp: 100, audio: "shared", meta: metaDocument({ raw: "first take" }) });
			writeRecording(base, { timestamp: 200, audio: "shared", meta: metaDocument({ raw: "second take" }) });
			writeRecording(base, { timestamp: 300, audio: "solo", meta: metaDocument({ raw: "solo note" }) });
		});

		afterEach(() => {
			removeDir(base);
		});

		it("indexes every version and flags the latest", async () => {
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index);

			assert.equal(await sync.ensureSync(), "synced");

			assert.equal(index.getCount(), 2);
			assert.equal(index.getVersionCount(), 3);
			const page = index.getPaginated(1, 10);
			assert.deepEqual(
				page.rows.map((row) => [row.versionId, row.title]),
				[
					["300", "solo note"],
					["200", "second take"],
				]
			);

			const status = sync.getStatus();
			assert.equal(status.state, "completed");
			assert.equal(status.syncComplete, true);
			assert.equal(status.syncing, false);
			assert.deepEqual(
				{ ...status.lastResult, durationMs: 0 },
				{ recordings: 3, conversations: 2, indexed: 2, failed: 0, pruned: 0, durationMs: 0 }
			);
		});

		it("gives every version of a conversation the latest title", async () => {
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index);
			await sync.ensureSync();

			const rows = index.getByConversationId(index.getPaginated(1, 10).rows[1].conversationId);
			assert.deepEqual(
				rows.map((row) => row.title),
				["second take", "second take"]
			);
		});

		it("skips when the directory count matches the conversation count", async () => {
			rmSync(join(base, "100"), { recursive: true });
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index);

			assert.equal(await sync.ensureSync(), "synced");
			assert.equal(await sync.ensureSync(), "skipped");
			assert.equal(await sync.ensureSync(true), "synced");
		});

		it("resyncs while any conversation has several versions", async () => {
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index);
			await sync.ensureSync();
			// 3 directories against 2 conversations never agree.
			assert.equal(await sync.ensureSync(), "synced");
		});

		it("prunes rows whose directory disappeared", async () => {
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index);
			await sync.ensureSync();

			rmSync(join(base, "300"), { recursive: true });
			await sync.ensureSync(true);

			assert.equal(index.getCount(), 1);
			assert.equal(sync.getStatus().lastResult?.pruned, 1);
			assert.equal(index.search("solo", 1, 10).total, 0);
		});

		it("keeps the index when the recordings directory goes missing", async () => {
			const logger = new MemoryLogger();
			const sync = new SyncCoordinator(new DirectoryRecordingStore(base), index, logger);
			await sync.ensureSync();

			rmSync(base, { recursive: true });

			assert.equal(await sync.ensureSync(), "skipped");
			assert.equal(await sync.ensureSync(true), "skipped");
			assert.equal(index.getCount(), 2);
			assert.equal(index.getVersionCount(), 3);
			assert.equal(logger.byEvent("base_missing").length, 2);
		});
	});

	describe("task lifecycle", () => {
		let store: FakeStore;
		let sync: SyncCoordinator;

		beforeEach(() => {
			store = new FakeStore();
			store.recordings = [recording(100, { rawTranscription: "hello" }), recording(200)];
			sync = new SyncCoordinator(store, index);
		});

		it("reports idle before any sync", async () => {
			assert.equal(sync.isSyncing(), false);
			assert.equal(sync.isSyncComplete(), false);
			assert.equal(sync.getStatus().state, "idle");
			assert.equal(sync.getStatus().lastResult, null);
			assert.equal(await sync.waitForSync(10), false);
		});

		it("runs at most one reconciliation at a time", async () => {
			store.hold();
			const first = sync.startBackgroundSync();
			const second = sync.startBackgroundSync();

			assert.equal(first, second);
			assert.equal(sync.isSyncing(), true);
			assert.equal(await sync.ensureSync(true), "skipped");

			store.release();
			await first.done();
			assert.equal(sync.isSyncing(), false);
		});

		it("times out without cancelling the running task", async () => {
			store.hold();
			const task = sync.startBackgroundSync();

			assert.equal(await sync.waitForSync(10), false);
			assert.equal(task.state, "running");

			store.release();
			assert.equal(await sync.waitForSync(1_000), true);
			assert.equal(index.getCount(), 2);
		});

		it("surfaces a failed scan as SyncFailureError", async () => {
			store.scanError = new Error("scan exploded");

			await assert.rejects(sync.ensureSync(), SyncFailureError);

			const status = sync.getStatus();
			assert.equal(status.state, "failed");
			assert.equal(status.lastError, "scan exploded");
			assert.equal(status.syncing, false);
			assert.equal(await sync.waitForSync(10), false);
		});

		it("recovers on the next sync after a failure", async () => {
			store.scanError = new Error("scan exploded");
			await assert.rejects(sync.ensureSync(), SyncFailureError);

			store.scanError = undefined;
			assert.equal(await sync.ensureSync(), "synced");
			assert.equal(sync.isSyncComplete(), true);
			assert.equal(sync.getStatus().lastError, null);
		});

		it("does not prune when the tree disappears mid-sync", async () => {
			const logger = new MemoryLogger();
			sync = new SyncCoordinator(store, index, logger);
			await sync.ensureSync();
			assert.equal(index.getCount(), 2);

			store.recordings = [];
			store.present = false;
			const task = sync.startBackgroundSync();
			await task.done();

			assert.equal(task.state, "completed");
			assert.equal(task.result?.pruned, 0);
			assert.equal(index.getCount(), 2);
			assert.equal(logger.byEvent("prune_skipped").length, 1);
		});

		it("syncs when the count check fails", async () => {
			store.countError = new Error("permission denied");
			assert.equal(await sync.ensureSync(), "synced");
		});

		it("logs progress every 100 conversations", async () => {
			const logger = new MemoryLogger();
			store.recordings = Array.from({ length: 250 }, (_, i) => recording(i + 1));
			sync = new SyncCoordinator(store, index, logger);

			await sync.ensureSync();

			assert.deepEqual(
				logger.byEvent("progress").map((entry) => entry.data.processed),
				[100, 200]
			);
		});
	});

	describe("index failures", () => {
		it("counts a failing conversation and keeps going", async () => {
			const store = new FakeStore();
			store.recordings = [recording(100), recording(200), recording(300)];
			const logger = new MemoryLogger();
			const sync = new SyncCoordinator(
				store,
				new FlakyIndex(db, (id) => id === "200"),
				logger
			);

			assert.equal(await sync.ensureSync(), "synced");
			assert.equal(sync.getStatus().lastResult?.indexed, 2);
			assert.equal(sync.getStatus().lastResult?.failed, 1);
			assert.equal(index.getCount(), 2);
			assert.equal(logger.byEvent("conversation_failed").length, 1);
		});

		it("fails the sync when nothing could be indexed", async () => {
			const store = new FakeStore();
			store.recordings = [recording(100)];
			const sync = new SyncCoordinator(store, new FlakyIndex(db, () => true));

			await assert.rejects(sync.ensureSync(), SyncFailureError);
		});
	});
});
