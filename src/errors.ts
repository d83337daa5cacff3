/** Machine-readable error categories surfaced to callers. */
export type CatalogErrorCode = "not_found" | "sync_failure" | "invalid_request";

/**
 * Base class for errors the catalog surfaces to its callers.
 * Carries a machine-readable code alongside the human message.
 */
export class CatalogError extends Error {
	readonly code: CatalogErrorCode;

	/**
	 * @param code - Machine-readable error category
	 * @param message - Human-readable description
	 * @param options - Optional underlying cause
	 */
	constructor(code: CatalogErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CatalogError";
		this.code = code;
	}
}

/** A conversation, a version within it, or its audio file does not exist. */
export class NotFoundError extends CatalogError {
	constructor(message: string) {
		super("not_found", message);
		this.name = "NotFoundError";
	}
}

/** A reconciliation could not complete (scan failed or nothing could be indexed). */
export class SyncFailureError extends CatalogError {
	constructor(message: string, cause?: unknown) {
		super("sync_failure", message, { cause });
		this.name = "SyncFailureError";
	}
}

/** Pagination or query arguments outside their accepted range. */
export class InvalidRequestError extends CatalogError {
	constructor(message: string) {
		super("invalid_request", message);
		this.name = "InvalidRequestError";
	}
}

/**
 * Normalize unknown error-like values into Error instances.
 *
 * @param value - Unknown thrown value
 * @returns Normalized Error instance
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Check whether a thrown value is a Node system error with the given code.
 *
 * @param error - Unknown thrown value
 * @param code - errno code such as "ENOENT"
 * @returns True when the codes match
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
	return error instanceof Error && "code" in error && error.code === code;
}
