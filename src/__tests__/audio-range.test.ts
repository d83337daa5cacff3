import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { mimeTypeFor, parseByteRange } from "../audio-range.js";

describe("parseByteRange", () => {
	it("returns null without a header", () => {
		assert.equal(parseByteRange(undefined, 1000), null);
		assert.equal(parseByteRange("", 1000), null);
	});

	it("parses a closed range", () => {
		assert.deepEqual(parseByteRange("bytes=0-99", 1000), { start: 0, end: 99 });
	});

	it("parses an open-ended range", () => {
		assert.deepEqual(parseByteRange("bytes=500-", 1000), { start: 500, end: 999 });
	});

	it("parses a suffix range", () => {
		assert.deepEqual(parseByteRange("bytes=-100", 1000), { start: 900, end: 999 });
	});

	it("clamps a suffix longer than the file", () => {
		assert.deepEqual(parseByteRange("bytes=-2000", 1000), { start: 0, end: 999 });
	});

	it("clamps an end past the last byte", () => {
		assert.deepEqual(parseByteRange("bytes=900-5000", 1000), { start: 900, end: 999 });
	});

	it("reports a start past the end as unsatisfiable", () => {
		assert.equal(parseByteRange("bytes=1000-", 1000), "unsatisfiable");
		assert.equal(parseByteRange("bytes=0-", 0), "unsatisfiable");
	});

	it("reports a zero-length suffix as unsatisfiable", () => {
		assert.equal(parseByteRange("bytes=-0", 1000), "unsatisfiable");
	});

	it("treats malformed headers as absent", () => {
		assert.equal(parseByteRange("bytes=5-2", 1000), null);
		assert.equal(parseByteRange("bytes=0-1,5-6", 1000), null);
		assert.equal(parseByteRange("items=0-1", 1000), null);
		assert.equal(parseByteRange("bytes=-", 1000), null);
	});
});

describe("mimeTypeFor", () => {
	it("maps the recorder's audio formats", () => {
		assert.equal(mimeTypeFor("/r/1700000000/output.wav"), "audio/wav");
		assert.equal(mimeTypeFor("/r/1700000000/audio.MP3"), "audio/mpeg");
		assert.equal(mimeTypeFor("/r/1700000000/output.m4a"), "audio/mp4");
	});

	it("falls back to a generic type", () => {
		assert.equal(mimeTypeFor("/r/1700000000/output.ogg"), "application/octet-stream");
	});
});
