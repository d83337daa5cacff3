/**
 * Persistent mapping from the recorder's recording id to the timestamp
 * directory that holds it, so repeat lookups skip the directory scan.
 */

import type { CatalogDatabase } from "./database.js";
import { type Logger, silentLogger } from "./logger.js";
import type { CacheEntry } from "./types.js";

/** Raw row shape of `recording_location_cache`. */
interface CacheRow {
	recording_id: string;
	internal_id: string;
	directory_path: string;
	content_hash: string | null;
	created_at: string;
	updated_at: string;
}

const COLUMNS = "recording_id, internal_id, directory_path, content_hash, created_at, updated_at";

/** Newest-created first; same-instant entries fall back to the newer directory. */
const NEWEST_FIRST = "ORDER BY created_at DESC, CAST(internal_id AS INTEGER) DESC";

function toEntry(row: CacheRow): CacheEntry {
	return {
		recordingId: row.recording_id,
		internalId: row.internal_id,
		directoryPath: row.directory_path,
		contentHash: row.content_hash,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

/**
 * Recording location cache over the shared catalog database.
 *
 * @example
 * ```typescript
 * const cache = new LocationCache(openCatalogDatabase(dbPath));
 * cache.upsert("rec-42", "1731462135", "/recordings/1731462135", hash);
 * cache.getByContentHash(hash); // every directory holding that audio
 * ```
 */
export class LocationCache {
	/**
	 * @param db - Open catalog database (schema already applied)
	 * @param logger - Diagnostic sink
	 */
	constructor(
		private readonly db: CatalogDatabase,
		private readonly logger: Logger = silentLogger
	) {}

	/**
	 * Insert or update an entry. Last write wins on `recordingId`;
	 * `createdAt` of an existing entry is kept.
	 *
	 * @param recordingId - Recorder-assigned id
	 * @param internalId - Timestamp directory name
	 * @param directoryPath - Absolute directory path
	 * @param contentHash - Audio hash, when known
	 */
	upsert(
		recordingId: string,
		internalId: string,
		directoryPath: string,
		contentHash?: string | null
	): void {
		this.db
			.prepare<[string, string, string, string | null]>(
				`INSERT INTO recording_location_cache (recording_id, internal_id, directory_path, content_hash)
				VALUES (?, ?, ?, ?)
				ON CONFLICT(recording_id) DO UPDATE SET
					internal_id = excluded.internal_id,
					directory_path = excluded.directory_path,
					content_hash = excluded.content_hash,
					updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`
			)
			.run(recordingId, internalId, directoryPath, contentHash ?? null);

		this.logger.debug("cache", "upsert", { recordingId, internalId });
	}

	/**
	 * @param recordingId - Recorder-assigned id
	 * @returns Matching entry or null
	 */
	getByRecordingId(recordingId: string): CacheEntry | null {
		const row = this.db
			.prepare<[string], CacheRow>(
				`SELECT ${COLUMNS} FROM recording_location_cache WHERE recording_id = ?`
			)
			.get(recordingId);
		return row ? toEntry(row) : null;
	}

	/**
	 * @param internalId - Timestamp directory name
	 * @returns Newest matching entry or null
	 */
	getByInternalId(internalId: string): CacheEntry | null {
		const row = this.db
			.prepare<[string], CacheRow>(
				`SELECT ${COLUMNS} FROM recording_location_cache WHERE internal_id = ? ${NEWEST_FIRST} LIMIT 1`
			)
			.get(internalId);
		return row ? toEntry(row) : null;
	}

	/**
	 * Every entry sharing an audio hash, newest-created first.
	 *
	 * @param contentHash - SHA-256 hex digest
	 * @returns Matching entries (possibly empty)
	 */
	getByContentHash(contentHash: string): CacheEntry[] {
		return this.db
			.prepare<[string], CacheRow>(
				`SELECT ${COLUMNS} FROM recording_location_cache WHERE content_hash = ? ${NEWEST_FIRST}`
			)
			.all(contentHash)
			.map(toEntry);
	}

	/** @returns All entries, newest-created first */
	getAll(): CacheEntry[] {
		return this.db
			.prepare<[], CacheRow>(`SELECT ${COLUMNS} FROM recording_location_cache ${NEWEST_FIRST}`)
			.all()
			.map(toEntry);
	}

	/** @returns Number of cached recordings */
	count(): number {
		const row = this.db
			.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM recording_location_cache")
			.get();
		return row?.count ?? 0;
	}

	/**
	 * @param recordingId - Entry to remove
	 */
	delete(recordingId: string): void {
		this.db
			.prepare<[string]>("DELETE FROM recording_location_cache WHERE recording_id = ?")
			.run(recordingId);
	}

	/** Remove every entry. */
	clearAll(): void {
		this.db.prepare("DELETE FROM recording_location_cache").run();
		this.logger.info("cache", "cleared");
	}
}
