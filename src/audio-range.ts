/**
 * HTTP byte-range parsing for audio streaming, and audio MIME types.
 */

import { extname } from "node:path";

/** Inclusive byte range within a payload of `size` bytes. */
export interface ByteRange {
	start: number;
	end: number;
}

const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

const MIME_TYPES: Record<string, string> = {
	".wav": "audio/wav",
	".mp3": "audio/mpeg",
	".m4a": "audio/mp4",
};

/**
 * Parse a single-range `Range` header.
 *
 * Supports `bytes=a-b`, `bytes=a-` and the suffix form `bytes=-n`. An end
 * past the payload is clamped to the last byte. Multi-range headers are
 * treated as malformed.
 *
 * @param header - Raw header value
 * @param size - Payload size in bytes
 * @returns The range; null for a missing or malformed header (serve the whole
 *   payload); "unsatisfiable" when the range lies outside the payload
 */
export function parseByteRange(
	header: string | undefined,
	size: number
): ByteRange | "unsatisfiable" | null {
	if (!header) return null;
	const match = RANGE_PATTERN.exec(header.trim());
	if (!match) return null;

	const [, startText, endText] = match;
	if (startText === "" && endText === "") return null;

	if (startText === "") {
		const suffix = Number(endText);
		if (suffix === 0 || size === 0) return "unsatisfiable";
		return { start: Math.max(0, size - suffix), end: size - 1 };
	}

	const start = Number(startText);
	const end = endText === "" ? size - 1 : Math.min(Number(endText), size - 1);
	if (endText !== "" && Number(endText) < start) return null;
	if (start >= size) return "unsatisfiable";
	return { start, end };
}

/**
 * @param path - Audio file path
 * @returns MIME type by extension; `application/octet-stream` when unknown
 */
export function mimeTypeFor(path: string): string {
	return MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}
