/**
 * SQLite storage shared by the location cache and the search index.
 *
 * One database file holds both tables. The FTS5 mirror of the index is
 * an external-content table kept in step by triggers, so every insert,
 * update, and delete on `transcription_index` lands in `transcription_fts`
 * inside the same transaction.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type CatalogDatabase = Database.Database;

const SCHEMA = `
	CREATE TABLE IF NOT EXISTS recording_location_cache (
		recording_id TEXT PRIMARY KEY,
		internal_id TEXT NOT NULL,
		directory_path TEXT NOT NULL,
		content_hash TEXT,
		created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
		updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
	);

	CREATE INDEX IF NOT EXISTS idx_cache_internal_id ON recording_location_cache(internal_id);
	CREATE INDEX IF NOT EXISTS idx_cache_content_hash ON recording_location_cache(content_hash);

	CREATE TABLE IF NOT EXISTS transcription_index (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		conversation_id TEXT NOT NULL,
		version_id TEXT NOT NULL,
		timestamp INTEGER NOT NULL,
		title TEXT NOT NULL,
		raw_transcription TEXT,
		preprocessed_transcription TEXT,
		llm_transcription TEXT,
		content_hash TEXT,
		duration REAL,
		language TEXT,
		model_name TEXT,
		language_model_name TEXT,
		mode_name TEXT,
		created_at TEXT,
		is_latest INTEGER NOT NULL DEFAULT 0,
		updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
		UNIQUE(conversation_id, version_id)
	);

	CREATE INDEX IF NOT EXISTS idx_index_latest_timestamp
		ON transcription_index(is_latest, timestamp DESC);
	CREATE INDEX IF NOT EXISTS idx_index_conversation
		ON transcription_index(conversation_id, timestamp DESC);

	CREATE VIRTUAL TABLE IF NOT EXISTS transcription_fts USING fts5(
		conversation_id UNINDEXED,
		version_id UNINDEXED,
		title,
		raw_transcription,
		preprocessed_transcription,
		llm_transcription,
		content=transcription_index,
		content_rowid=id,
		tokenize='porter unicode61'
	);

	CREATE TRIGGER IF NOT EXISTS transcription_index_ai AFTER INSERT ON transcription_index BEGIN
		INSERT INTO transcription_fts(
			rowid, conversation_id, version_id, title,
			raw_transcription, preprocessed_transcription, llm_transcription
		)
		VALUES (
			new.id, new.conversation_id, new.version_id, new.title,
			new.raw_transcription, new.preprocessed_transcription, new.llm_transcription
		);
	END;

	CREATE TRIGGER IF NOT EXISTS transcription_index_ad AFTER DELETE ON transcription_index BEGIN
		INSERT INTO transcription_fts(
			transcription_fts, rowid, conversation_id, version_id, title,
			raw_transcription, preprocessed_transcription, llm_transcription
		)
		VALUES (
			'delete', old.id, old.conversation_id, old.version_id, old.title,
			old.raw_transcription, old.preprocessed_transcription, old.llm_transcription
		);
	END;

	CREATE TRIGGER IF NOT EXISTS transcription_index_au AFTER UPDATE ON transcription_index BEGIN
		INSERT INTO transcription_fts(
			transcription_fts, rowid, conversation_id, version_id, title,
			raw_transcription, preprocessed_transcription, llm_transcription
		)
		VALUES (
			'delete', old.id, old.conversation_id, old.version_id, old.title,
			old.raw_transcription, old.preprocessed_transcription, old.llm_transcription
		);
		INSERT INTO transcription_fts(
			rowid, conversation_id, version_id, title,
			raw_transcription, preprocessed_transcription, llm_transcription
		)
		VALUES (
			new.id, new.conversation_id, new.version_id, new.title,
			new.raw_transcription, new.preprocessed_transcription, new.llm_transcription
		);
	END;
`;

/**
 * Open (or create) the catalog database and make sure the schema exists.
 *
 * @param dbPath - Path to the SQLite file, or ":memory:"
 * @returns Open better-sqlite3 handle
 */
export function openCatalogDatabase(dbPath: string): CatalogDatabase {
	if (dbPath !== ":memory:") {
		mkdirSync(dirname(dbPath), { recursive: true });
	}

	const db = new Database(dbPath);
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	ensureSchema(db);
	return db;
}

/**
 * Create tables, the FTS5 virtual table, and its triggers if missing.
 *
 * @param db - Open database
 */
export function ensureSchema(db: CatalogDatabase): void {
	db.exec(SCHEMA);
}
