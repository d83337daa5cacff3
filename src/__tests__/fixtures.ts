/**
 * Test helpers: temporary recording trees shaped like the recorder's output.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** One timestamp directory to create. */
export interface RecordingFixture {
	timestamp: number;
	/** Audio payload; omitted → no audio file. */
	audio?: string | Buffer;
	/** Defaults to "output.wav". */
	audioName?: string;
	/** Metadata document: an object is serialized, a string is written raw. */
	meta?: Record<string, unknown> | string;
	/** Defaults to "meta.json". */
	metaName?: string;
}

/**
 * @param prefix - Directory name prefix
 * @returns Fresh temporary directory
 */
export function makeTempDir(prefix: string): string {
	return mkdtempSync(join(tmpdir(), `murmur-${prefix}-`));
}

/**
 * @param dir - Directory to remove
 */
export function removeDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true });
}

/**
 * Create one timestamp directory with its files.
 *
 * @param base - Recordings directory
 * @param fixture - What to write
 * @returns The directory path
 */
export function writeRecording(base: string, fixture: RecordingFixture): string {
	const directory = join(base, String(fixture.timestamp));
	mkdirSync(directory, { recursive: true });

	if (fixture.audio !== undefined) {
		writeFileSync(join(directory, fixture.audioName ?? "output.wav"), fixture.audio);
	}
	if (fixture.meta !== undefined) {
		const content =
			typeof fixture.meta === "string" ? fixture.meta : JSON.stringify(fixture.meta, null, 2);
		writeFileSync(join(directory, fixture.metaName ?? "meta.json"), content);
	}
	return directory;
}

/**
 * Metadata document with the recorder's field names.
 *
 * @param fields - Fields to set
 * @returns Document object
 */
export function metaDocument(fields: {
	recordingId?: string;
	raw?: string;
	result?: string;
	llm?: string;
	duration?: number;
	language?: string;
	datetime?: string;
}): Record<string, unknown> {
	const doc: Record<string, unknown> = {};
	if (fields.recordingId !== undefined) doc.recordingId = fields.recordingId;
	if (fields.raw !== undefined) doc.rawResult = fields.raw;
	if (fields.result !== undefined) doc.result = fields.result;
	if (fields.llm !== undefined) doc.llmResult = fields.llm;
	if (fields.duration !== undefined) doc.duration = fields.duration;
	if (fields.language !== undefined) doc.languageSelected = fields.language;
	if (fields.datetime !== undefined) doc.datetime = fields.datetime;
	return doc;
}
