import assert from "node:assert/strict";
import { createHash } from "node:crypto";
import { mkdirSync, symlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { NotFoundError } from "../errors.js";
import { MemoryLogger } from "../logger.js";
import {
	DirectoryRecordingStore,
	parseTimestampDirectoryName,
	type RecordingLocationSink,
} from "../recording-store.js";
import { makeTempDir, metaDocument, removeDir, writeRecording } from "./fixtures.js";

function sha256(data: string): string {
	return createHash("sha256").update(data).digest("hex");
}

/** Location sink that records calls, optionally failing each one. */
class RecordingSink implements RecordingLocationSink {
	readonly calls: Array<[string, string, string, string | null | undefined]> = [];

	constructor(private readonly fail = false) {}

	upsert(recordingId: string, internalId: string, directoryPath: string, contentHash?: string | null) {
		if (this.fail) throw new Error("disk full");
		this.calls.push([recordingId, internalId, directoryPath, contentHash]);
	}
}

describe("parseTimestampDirectoryName", () => {
	it("accepts decimal names only", () => {
		assert.equal(parseTimestampDirectoryName("1700000000"), 1_700_000_000);
		assert.equal(parseTimestampDirectoryName("0"), 0);
		assert.equal(parseTimestampDirectoryName("17000a"), null);
		assert.equal(parseTimestampDirectoryName("-5"), null);
		assert.equal(parseTimestampDirectoryName(".DS_Store"), null);
		assert.equal(parseTimestampDirectoryName("99999999999999999999"), null);
	});
});

describe("DirectoryRecordingStore", () => {
	let base: string;

	beforeEach(() => {
		base = makeTempDir("store");
	});

	afterEach(() => {
		removeDir(base);
	});

	it("returns nothing when the base directory is missing", async () => {
		const store = new DirectoryRecordingStore(join(base, "nowhere"));
		assert.deepEqual(await store.scan(), []);
		assert.equal(await store.countRecordingDirectories(), 0);
		assert.equal(await store.exists(), false);
		assert.equal(await new DirectoryRecordingStore(base).exists(), true);
	});

	it("loads recordings newest first with metadata and audio hash", async () => {
		writeRecording(base, {
			timestamp: 1_700_000_100,
			audio: "audio-one",
			meta: metaDocument({ recordingId: "r1", raw: "first raw", result: "first clean", duration: 1500 }),
		});
		writeRecording(base, {
			timestamp: 1_700_000_200,
			audio: "audio-two",
			meta: metaDocument({ raw: "second raw", language: "de" }),
		});

		const recordings = await new DirectoryRecordingStore(base).scan();

		assert.deepEqual(
			recordings.map((recording) => recording.timestamp),
			[1_700_000_200, 1_700_000_100]
		);
		const [second, first] = recordings;
		assert.equal(first.recordingId, "r1");
		assert.equal(first.rawTranscription, "first raw");
		assert.equal(first.preprocessedTranscription, "first clean");
		assert.equal(first.duration, 1500);
		assert.equal(first.contentHash, sha256("audio-one"));
		assert.equal(first.audioFile, join(base, "1700000100", "output.wav"));
		assert.equal(first.metadataFile, join(base, "1700000100", "meta.json"));
		assert.equal(second.language, "de");
		assert.equal(second.recordingId, undefined);
	});

	it("gives identical audio the same hash", async () => {
		writeRecording(base, { timestamp: 1, audio: "same bytes", meta: metaDocument({ raw: "a" }) });
		writeRecording(base, { timestamp: 2, audio: "same bytes", meta: metaDocument({ raw: "b" }) });

		const [a, b] = await new DirectoryRecordingStore(base).scan();
		assert.equal(a.contentHash, b.contentHash);
		assert.equal(a.contentHash, sha256("same bytes"));
	});

	it("ignores entries that are not timestamp directories", async () => {
		writeRecording(base, { timestamp: 10, audio: "x" });
		mkdirSync(join(base, "notes"));
		mkdirSync(join(base, "12ab"));
		writeFileSync(join(base, "20"), "a file named like a timestamp");

		const store = new DirectoryRecordingStore(base);
		assert.deepEqual(
			(await store.scan()).map((recording) => recording.timestamp),
			[10]
		);
		assert.equal(await store.countRecordingDirectories(), 1);
	});

	it("follows symlinked timestamp directories", async () => {
		const elsewhere = makeTempDir("store-target");
		try {
			writeRecording(elsewhere, { timestamp: 30, audio: "linked" });
			symlinkSync(join(elsewhere, "30"), join(base, "30"));
			const recordings = await new DirectoryRecordingStore(base).scan();
			assert.equal(recordings.length, 1);
			assert.equal(recordings[0].contentHash, sha256("linked"));
		} finally {
			removeDir(elsewhere);
		}
	});

	it("prefers audio and metadata files in their documented order", async () => {
		const directory = writeRecording(base, {
			timestamp: 40,
			audio: "mp3 bytes",
			audioName: "output.mp3",
			meta: metaDocument({ raw: "from metadata.json" }),
			metaName: "metadata.json",
		});
		writeFileSync(join(directory, "audio.wav"), "wav bytes");
		writeFileSync(join(directory, "meta.json"), JSON.stringify({ rawResult: "from meta.json" }));

		const [recording] = await new DirectoryRecordingStore(base).scan();
		assert.equal(recording.audioFile, join(directory, "audio.wav"));
		assert.equal(recording.contentHash, sha256("wav bytes"));
		assert.equal(recording.rawTranscription, "from meta.json");
	});

	it("keeps a recording without audio, with no hash", async () => {
		writeRecording(base, { timestamp: 50, meta: metaDocument({ raw: "text only" }) });
		const [recording] = await new DirectoryRecordingStore(base).scan();
		assert.equal(recording.audioFile, undefined);
		assert.equal(recording.contentHash, undefined);
		assert.equal(recording.rawTranscription, "text only");
	});

	it("keeps a recording with malformed metadata and logs it", async () => {
		writeRecording(base, { timestamp: 60, audio: "x", meta: "{ broken" });
		const logger = new MemoryLogger();

		const [recording] = await new DirectoryRecordingStore(base, { logger }).scan();
		assert.equal(recording.timestamp, 60);
		assert.equal(recording.rawTranscription, undefined);
		assert.deepEqual(recording.segments, []);
		assert.equal(recording.createdAt.getTime(), 60_000);
		assert.equal(logger.byEvent("metadata_malformed").length, 1);
	});

	it("uses the metadata datetime for createdAt", async () => {
		writeRecording(base, {
			timestamp: 70,
			meta: metaDocument({ datetime: "2024-06-01T12:00:00Z" }),
		});
		const [recording] = await new DirectoryRecordingStore(base).scan();
		assert.equal(recording.createdAt.toISOString(), "2024-06-01T12:00:00.000Z");
	});

	it("loads one recording by timestamp", async () => {
		writeRecording(base, { timestamp: 80, audio: "x", meta: metaDocument({ raw: "eighty" }) });
		const store = new DirectoryRecordingStore(base);

		assert.equal((await store.getByTimestamp(80))?.rawTranscription, "eighty");
		assert.equal(await store.getByTimestamp(81), null);
	});

	it("writes recording locations through to the sink", async () => {
		const directory = writeRecording(base, {
			timestamp: 90,
			audio: "ninety",
			meta: metaDocument({ recordingId: "rec-90" }),
		});
		writeRecording(base, { timestamp: 91, audio: "no id" });
		const sink = new RecordingSink();

		await new DirectoryRecordingStore(base, { locationCache: sink }).scan();
		assert.deepEqual(sink.calls, [["rec-90", "90", directory, sha256("ninety")]]);
	});

	it("keeps loading when the sink fails", async () => {
		writeRecording(base, { timestamp: 95, meta: metaDocument({ recordingId: "rec-95" }) });
		const logger = new MemoryLogger();

		const recordings = await new DirectoryRecordingStore(base, {
			locationCache: new RecordingSink(true),
			logger,
		}).scan();
		assert.equal(recordings.length, 1);
		assert.equal(logger.byEvent("upsert_failed").length, 1);
	});

	it("reads audio bytes", async () => {
		writeRecording(base, { timestamp: 100, audio: "payload" });
		const store = new DirectoryRecordingStore(base);
		const recording = await store.getByTimestamp(100);
		assert.ok(recording);
		assert.equal((await store.readAudio(recording)).toString("utf-8"), "payload");
	});

	it("throws NotFoundError for a recording without audio", async () => {
		writeRecording(base, { timestamp: 110, meta: metaDocument({ raw: "silent" }) });
		const store = new DirectoryRecordingStore(base);
		const recording = await store.getByTimestamp(110);
		assert.ok(recording);
		await assert.rejects(store.readAudio(recording), NotFoundError);
	});
});
