/**
 * Parsing of the recorder's per-recording metadata document (`meta.json`).
 *
 * Each field is validated on its own: a field with the wrong type is dropped,
 * the rest of the document still counts.
 */

import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Recording, Segment } from "./types.js";

export const SegmentSchema = Type.Object({
	start: Type.Number(),
	end: Type.Number(),
	text: Type.String(),
});

const IdentifierSchema = Type.Union([Type.String({ minLength: 1 }), Type.Number()]);
const TextSchema = Type.String();
const NumberSchema = Type.Number();

/** Metadata fields murmur understands, normalized to its own names. */
export interface RecordingMetadata {
	recordingId?: string;
	rawTranscription?: string;
	preprocessedTranscription?: string;
	llmTranscription?: string;
	segments: Segment[];
	duration?: number;
	language?: string;
	modelName?: string;
	languageModelName?: string;
	modeName?: string;
	processingTime?: number;
	datetime?: string;
}

/**
 * Narrow a JSON value to a plain object.
 *
 * @param value - Parsed JSON
 * @returns True for non-null, non-array objects
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one field, keeping it only when it matches its schema.
 *
 * @param doc - Metadata document
 * @param key - Field name in the document
 * @param schema - Expected shape
 * @returns The typed value, or undefined
 */
function pickField<T extends TSchema>(
	doc: Record<string, unknown>,
	key: string,
	schema: T
): Static<T> | undefined {
	const value = doc[key];
	return Value.Check(schema, value) ? value : undefined;
}

/**
 * Resolve the recorder's identifier: `recordingId`, falling back to `id`.
 *
 * @param doc - Metadata document
 * @returns Identifier as a string, or undefined
 */
function pickRecordingId(doc: Record<string, unknown>): string | undefined {
	const id = pickField(doc, "recordingId", IdentifierSchema) ?? pickField(doc, "id", IdentifierSchema);
	return id === undefined ? undefined : String(id);
}

/**
 * Keep the well-formed segments of a `segments` array, in order.
 *
 * @param value - Raw `segments` value
 * @returns Valid segments; empty when the field is missing or not an array
 */
function pickSegments(value: unknown): Segment[] {
	if (!Array.isArray(value)) return [];
	const segments: Segment[] = [];
	for (const entry of value) {
		if (Value.Check(SegmentSchema, entry)) {
			segments.push({ start: entry.start, end: entry.end, text: entry.text });
		}
	}
	return segments;
}

/**
 * Parse a metadata document.
 *
 * @param content - File contents
 * @returns Normalized metadata, or null when the content is not a JSON object
 */
export function parseMetadataDocument(content: string): RecordingMetadata | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch {
		return null;
	}
	if (!isPlainObject(parsed)) return null;

	return {
		recordingId: pickRecordingId(parsed),
		rawTranscription: pickField(parsed, "rawResult", TextSchema),
		preprocessedTranscription: pickField(parsed, "result", TextSchema),
		llmTranscription: pickField(parsed, "llmResult", TextSchema),
		segments: pickSegments(parsed.segments),
		duration: pickField(parsed, "duration", NumberSchema),
		language: pickField(parsed, "languageSelected", TextSchema),
		modelName: pickField(parsed, "modelName", TextSchema),
		languageModelName: pickField(parsed, "languageModelName", TextSchema),
		modeName: pickField(parsed, "modeName", TextSchema),
		processingTime: pickField(parsed, "processingTime", NumberSchema),
		datetime: pickField(parsed, "datetime", TextSchema),
	};
}

// ─── Dates ───────────────────────────────────────────────────────────────────

const ISO_DATE_TIME =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date-time. Values without an offset are local time;
 * a bare date is local midnight.
 *
 * @param value - e.g. "2025-11-13T01:42:15" or "2025-11-13"
 * @returns Date, or null when the value is not a valid date-time
 */
export function parseIsoDateTime(value: string): Date | null {
	const match = ISO_DATE_TIME.exec(value.trim());
	if (!match) return null;

	const [, y, mo, d, h = "0", mi = "0", s = "0", frac, tz] = match;
	const year = Number(y);
	const month = Number(mo);
	const day = Number(d);
	const hour = Number(h);
	const minute = Number(mi);
	const second = Number(s);
	const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;

	if (month < 1 || month > 12) return null;
	if (day < 1 || day > daysInMonth(year, month)) return null;
	if (hour > 23 || minute > 59 || second > 59) return null;

	if (!tz) {
		return new Date(year, month - 1, day, hour, minute, second, millis);
	}

	const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
	return new Date(utc - parseOffsetMinutes(tz) * 60_000);
}

function daysInMonth(year: number, month: number): number {
	return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * @param tz - "Z", "+02:00", "-0530"
 * @returns Offset east of UTC in minutes
 */
function parseOffsetMinutes(tz: string): number {
	if (tz === "Z") return 0;
	const sign = tz.startsWith("-") ? -1 : 1;
	const digits = tz.slice(1).replace(":", "");
	return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Creation time of a recording: the metadata `datetime` when valid,
 * otherwise the directory timestamp.
 *
 * @param datetime - Raw metadata value
 * @param timestamp - Directory name as Unix seconds
 * @returns Creation date
 */
export function resolveCreatedAt(datetime: string | undefined, timestamp: number): Date {
	const parsed = datetime ? parseIsoDateTime(datetime) : null;
	return parsed ?? new Date(timestamp * 1000);
}

// ─── Text ────────────────────────────────────────────────────────────────────

/**
 * Best available transcription text: preprocessed, then raw, then
 * LLM-refined. Blank strings count as absent.
 *
 * @param recording - Recording text fields
 * @returns The chosen text, untrimmed, or undefined
 */
export function bestTranscriptionText(
	recording: Pick<
		Recording,
		"preprocessedTranscription" | "rawTranscription" | "llmTranscription"
	>
): string | undefined {
	const candidates = [
		recording.preprocessedTranscription,
		recording.rawTranscription,
		recording.llmTranscription,
	];
	return candidates.find((text) => text !== undefined && text.trim().length > 0);
}
