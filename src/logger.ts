/**
 * Structured diagnostic logger for murmur.
 *
 * Emits JSONL to `<home>/murmur.log` (or stderr). `debug` entries are
 * dropped unless debug mode is active; `isDebug()` is resolved once and cached.
 *
 * Activation precedence:
 *   1. MURMUR_DEBUG env var (truthy = file, "stderr" = stderr)
 *   2. NODE_ENV=development
 */

import { appendFileSync, existsSync, mkdirSync, truncateSync, writeFileSync } from "node:fs";
import { join } from "node:path";

/** Log entry categories that partition diagnostic output. */
export type LogCategory = "sync" | "scan" | "cache" | "index" | "query" | "config" | "error";

/** Severity of a log entry. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Single JSONL log entry. */
export interface LogEntry {
	ts: string;
	level: LogLevel;
	cat: LogCategory;
	evt: string;
	data: Record<string, unknown>;
}

/** Logging surface every component receives at construction. */
export interface Logger {
	debug(cat: LogCategory, evt: string, data?: Record<string, unknown>): void;
	info(cat: LogCategory, evt: string, data?: Record<string, unknown>): void;
	warn(cat: LogCategory, evt: string, data?: Record<string, unknown>): void;
	error(cat: LogCategory, evt: string, data?: Record<string, unknown>): void;
}

/** Maximum string length for values in log data before truncation. */
const MAX_STRING_LENGTH = 500;

/** Placeholder value used when sensitive fields are redacted. */
const REDACTED_VALUE = "[REDACTED]";

/** Sensitive key segments that should always be redacted. */
const SENSITIVE_KEY_SEGMENTS = new Set([
	"auth",
	"authorization",
	"cookie",
	"credential",
	"credentials",
	"key",
	"password",
	"secret",
	"token",
]);

/** Cached debug mode result, resolved once per process. */
let debugCached: boolean | undefined;

/**
 * Checks whether debug mode is active.
 *
 * @returns True if debug entries should be written
 */
export function isDebug(): boolean {
	if (debugCached !== undefined) return debugCached;

	const envDebug = process.env.MURMUR_DEBUG;
	if (envDebug && envDebug !== "0" && envDebug !== "false") {
		debugCached = true;
		return true;
	}

	debugCached = process.env.NODE_ENV === "development";
	return debugCached;
}

/**
 * Resets the cached debug state so the next {@link isDebug} call re-reads
 * the environment. Used by tests.
 */
export function resetDebugCache(): void {
	debugCached = undefined;
}

/**
 * Splits a key into normalized lowercase segments for pattern matching.
 *
 * @param key - Raw object key from a log payload
 * @returns Normalized key segments (e.g. "apiKey" → ["api", "key"])
 */
function normalizeKeySegments(key: string): string[] {
	const normalized = key
		.replace(/([a-z0-9])([A-Z])/g, "$1_$2")
		.replace(/[^a-zA-Z0-9]+/g, "_")
		.toLowerCase();
	return normalized.split("_").filter(Boolean);
}

/**
 * Checks whether a key name should be treated as sensitive.
 *
 * @param key - Object key to evaluate
 * @returns True when the key matches the redaction policy
 */
function isSensitiveKey(key: string): boolean {
	return normalizeKeySegments(key).some((segment) => SENSITIVE_KEY_SEGMENTS.has(segment));
}

/**
 * Redacts sensitive keys and truncates long strings, recursively.
 *
 * @param value - Value to sanitize
 * @returns Deep-cloned, log-safe value
 */
export function sanitizeLogValue(value: unknown): unknown {
	if (typeof value === "string" && value.length > MAX_STRING_LENGTH) {
		return `${value.slice(0, MAX_STRING_LENGTH)}…[${value.length} chars]`;
	}

	if (value instanceof Error) {
		return { name: value.name, message: sanitizeLogValue(value.message) };
	}

	if (Array.isArray(value)) {
		return value.map((item) => sanitizeLogValue(item));
	}

	if (value !== null && typeof value === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, nestedValue] of Object.entries(value)) {
			result[key] = isSensitiveKey(key) ? REDACTED_VALUE : sanitizeLogValue(nestedValue);
		}
		return result;
	}

	return value;
}

/**
 * Build a log entry with a sanitized payload.
 *
 * @returns Entry ready to serialize
 */
function buildEntry(
	level: LogLevel,
	cat: LogCategory,
	evt: string,
	data: Record<string, unknown>
): LogEntry {
	const sanitized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		sanitized[key] = isSensitiveKey(key) ? REDACTED_VALUE : sanitizeLogValue(value);
	}
	return { ts: new Date().toISOString(), level, cat, evt, data: sanitized };
}

/** Shared level dispatch so subclasses only implement `write`. */
abstract class BaseLogger implements Logger {
	/**
	 * @param includeDebug - Whether debug entries are kept
	 */
	constructor(protected readonly includeDebug: boolean) {}

	protected abstract write(entry: LogEntry): void;

	debug(cat: LogCategory, evt: string, data: Record<string, unknown> = {}): void {
		if (!this.includeDebug) return;
		this.write(buildEntry("debug", cat, evt, data));
	}

	info(cat: LogCategory, evt: string, data: Record<string, unknown> = {}): void {
		this.write(buildEntry("info", cat, evt, data));
	}

	warn(cat: LogCategory, evt: string, data: Record<string, unknown> = {}): void {
		this.write(buildEntry("warn", cat, evt, data));
	}

	error(cat: LogCategory, evt: string, data: Record<string, unknown> = {}): void {
		this.write(buildEntry("error", cat, evt, data));
	}
}

/**
 * JSONL logger writing to a single destination: a file in append mode
 * (default `<logDir>/murmur.log`) or stderr.
 */
export class JsonlLogger extends BaseLogger {
	private readonly useStderr: boolean;
	private closed = false;
	readonly logPath: string;

	/**
	 * @param logDir - Directory for the log file
	 * @param options - `stderr` forces stderr output; `debug` overrides `isDebug()`
	 */
	constructor(logDir: string, options: { stderr?: boolean; debug?: boolean } = {}) {
		super(options.debug ?? isDebug());
		this.useStderr = options.stderr ?? process.env.MURMUR_DEBUG === "stderr";
		this.logPath = join(logDir, "murmur.log");

		if (!this.useStderr) {
			mkdirSync(logDir, { recursive: true });
			writeFileSync(this.logPath, "", { flag: "a" });
		}
	}

	/** Synchronous append; entries stay in call order. */
	protected write(entry: LogEntry): void {
		if (this.closed) return;

		const line = `${JSON.stringify(entry)}\n`;
		if (this.useStderr) {
			process.stderr.write(line);
		} else {
			appendFileSync(this.logPath, line);
		}
	}

	/** Truncates the log file to zero bytes. */
	clear(): void {
		if (!this.useStderr && existsSync(this.logPath)) {
			truncateSync(this.logPath, 0);
		}
	}

	/** Subsequent writes become no-ops. */
	close(): void {
		this.closed = true;
	}
}

/** Logger that keeps entries in memory, for embedding and tests. */
export class MemoryLogger extends BaseLogger {
	readonly entries: LogEntry[] = [];

	constructor(includeDebug = true) {
		super(includeDebug);
	}

	protected write(entry: LogEntry): void {
		this.entries.push(entry);
	}

	/**
	 * Entries matching an event name.
	 *
	 * @param evt - Event name
	 * @returns Matching entries in write order
	 */
	byEvent(evt: string): LogEntry[] {
		return this.entries.filter((entry) => entry.evt === evt);
	}
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
