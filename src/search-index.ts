/**
 * Search index: one row per (conversation, version) with an FTS5 mirror.
 *
 * Listing reads only the latest version of each conversation. Search runs
 * BM25 over title and raw transcription, returns one hit per conversation,
 * and attaches highlighted snippets.
 */

import type { CatalogDatabase } from "./database.js";
import { compileSearchQuery } from "./fts-query.js";
import { type Logger, silentLogger } from "./logger.js";
import type {
	IndexRow,
	IndexSummaryRow,
	Page,
	Recording,
	SearchHit,
	TimestampRange,
} from "./types.js";

/** Highlight markers wrapped around matched terms in snippets. */
export const HIGHLIGHT_OPEN = "<mark>";
export const HIGHLIGHT_CLOSE = "</mark>";
export const SNIPPET_ELLIPSIS = "...";

/** Token windows for the title and raw-text snippets. */
const TITLE_SNIPPET_TOKENS = 32;
const RAW_SNIPPET_TOKENS = 64;

/** Most snippets attached to one hit. */
export const MAX_SNIPPETS = 3;

/** FTS column positions (see the virtual table definition). */
const FTS_TITLE_COLUMN = 2;
const FTS_RAW_COLUMN = 3;

/** Input of {@link SearchIndex.upsert}. */
export interface IndexUpsert {
	conversationId: string;
	versionId: string;
	timestamp: number;
	recording: Recording;
	title: string;
	isLatest: boolean;
}

/** Raw listing columns as SQLite returns them. */
interface SummaryRowRecord {
	conversation_id: string;
	version_id: string;
	timestamp: number;
	title: string;
	content_hash: string | null;
	duration: number | null;
	language: string | null;
	created_at: string | null;
	updated_at: string;
}

interface FullRowRecord extends SummaryRowRecord {
	raw_transcription: string | null;
	preprocessed_transcription: string | null;
	llm_transcription: string | null;
	model_name: string | null;
	language_model_name: string | null;
	mode_name: string | null;
	is_latest: number;
}

interface HitRecord extends SummaryRowRecord {
	title_snippet: string | null;
	raw_snippet: string | null;
	score: number;
}

const SUMMARY_COLUMNS = `conversation_id, version_id, timestamp, title, content_hash, duration,
	language, created_at, updated_at`;

const FULL_COLUMNS = `${SUMMARY_COLUMNS}, raw_transcription, preprocessed_transcription,
	llm_transcription, model_name, language_model_name, mode_name, is_latest`;

function toSummaryRow(row: SummaryRowRecord): IndexSummaryRow {
	return {
		conversationId: row.conversation_id,
		versionId: row.version_id,
		timestamp: row.timestamp,
		title: row.title,
		contentHash: row.content_hash,
		duration: row.duration,
		language: row.language,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

function toFullRow(row: FullRowRecord): IndexRow {
	return {
		...toSummaryRow(row),
		rawTranscription: row.raw_transcription,
		preprocessedTranscription: row.preprocessed_transcription,
		llmTranscription: row.llm_transcription,
		modelName: row.model_name,
		languageModelName: row.language_model_name,
		modeName: row.mode_name,
		isLatest: row.is_latest === 1,
	};
}

/**
 * Keep snippets that actually carry a highlight, up to {@link MAX_SNIPPETS}.
 *
 * @param candidates - Snippets in display order
 * @returns Highlighted, non-blank snippets
 */
export function collectSnippets(candidates: ReadonlyArray<string | null>): string[] {
	const snippets: string[] = [];
	for (const snippet of candidates) {
		if (!snippet || !snippet.trim() || !snippet.includes(HIGHLIGHT_OPEN)) continue;
		snippets.push(snippet);
	}
	return snippets.slice(0, MAX_SNIPPETS);
}

/**
 * Build the timestamp filter shared by listing and search.
 *
 * @param range - Optional inclusive bounds
 * @param column - Qualified timestamp column
 * @returns SQL fragments (each starting with AND) and their parameters
 */
function rangeClause(
	range: TimestampRange | undefined,
	column: string
): { sql: string; params: number[] } {
	const parts: string[] = [];
	const params: number[] = [];
	if (range?.from !== undefined) {
		parts.push(`AND ${column} >= ?`);
		params.push(range.from);
	}
	if (range?.to !== undefined) {
		parts.push(`AND ${column} <= ?`);
		params.push(range.to);
	}
	return { sql: parts.join(" "), params };
}

/**
 * FTS5-backed transcription index over the shared catalog database.
 *
 * @example
 * ```typescript
 * const index = new SearchIndex(openCatalogDatabase(dbPath));
 * const { rows, total } = index.search("budget review", 1, 20);
 * ```
 */
export class SearchIndex {
	/**
	 * @param db - Open catalog database (schema already applied)
	 * @param logger - Diagnostic sink
	 */
	constructor(
		private readonly db: CatalogDatabase,
		private readonly logger: Logger = silentLogger
	) {}

	/**
	 * Run several writes as one transaction. Nested calls become savepoints.
	 *
	 * @param fn - Writes to apply
	 * @returns Whatever fn returns
	 */
	transaction<T>(fn: () => T): T {
		return this.db.transaction(fn)();
	}

	/**
	 * Insert or replace the row for (conversationId, versionId). The
	 * triggers mirror the change into the FTS table in the same transaction.
	 *
	 * @param entry - Row content
	 */
	upsert(entry: IndexUpsert): void {
		const { recording } = entry;
		const statement = this.db.prepare(
			`INSERT INTO transcription_index (
				conversation_id, version_id, timestamp, title,
				raw_transcription, preprocessed_transcription, llm_transcription,
				content_hash, duration, language, model_name, language_model_name,
				mode_name, created_at, is_latest
			)
			VALUES (
				@conversationId, @versionId, @timestamp, @title,
				@rawTranscription, @preprocessedTranscription, @llmTranscription,
				@contentHash, @duration, @language, @modelName, @languageModelName,
				@modeName, @createdAt, @isLatest
			)
			ON CONFLICT(conversation_id, version_id) DO UPDATE SET
				timestamp = excluded.timestamp,
				title = excluded.title,
				raw_transcription = excluded.raw_transcription,
				preprocessed_transcription = excluded.preprocessed_transcription,
				llm_transcription = excluded.llm_transcription,
				content_hash = excluded.content_hash,
				duration = excluded.duration,
				language = excluded.language,
				model_name = excluded.model_name,
				language_model_name = excluded.language_model_name,
				mode_name = excluded.mode_name,
				created_at = excluded.created_at,
				is_latest = excluded.is_latest,
				updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')`
		);

		this.transaction(() => {
			statement.run({
				conversationId: entry.conversationId,
				versionId: entry.versionId,
				timestamp: entry.timestamp,
				title: entry.title,
				rawTranscription: recording.rawTranscription ?? null,
				preprocessedTranscription: recording.preprocessedTranscription ?? null,
				llmTranscription: recording.llmTranscription ?? null,
				contentHash: recording.contentHash ?? null,
				duration: recording.duration ?? null,
				language: recording.language ?? null,
				modelName: recording.modelName ?? null,
				languageModelName: recording.languageModelName ?? null,
				modeName: recording.modeName ?? null,
				createdAt: recording.createdAt.toISOString(),
				isLatest: entry.isLatest ? 1 : 0,
			});
		});
	}

	/**
	 * Mark exactly one row of a conversation as latest: the greatest
	 * timestamp, ties going to the greatest version id. Rows whose flag
	 * already matches are left alone, so a repeat call changes nothing.
	 *
	 * @param conversationId - Conversation to recompute
	 */
	updateLatestFlags(conversationId: string): void {
		const statement = this.db.prepare<{ conversationId: string }>(
			`UPDATE transcription_index
			SET is_latest = CASE WHEN id = (
				SELECT id FROM transcription_index
				WHERE conversation_id = @conversationId
				ORDER BY timestamp DESC, version_id DESC
				LIMIT 1
			) THEN 1 ELSE 0 END
			WHERE conversation_id = @conversationId
				AND is_latest <> CASE WHEN id = (
					SELECT id FROM transcription_index
					WHERE conversation_id = @conversationId
					ORDER BY timestamp DESC, version_id DESC
					LIMIT 1
				) THEN 1 ELSE 0 END`
		);
		this.transaction(() => {
			statement.run({ conversationId });
		});
	}

	/**
	 * Latest version of each conversation, newest first.
	 *
	 * @param page - 1-indexed page number
	 * @param pageSize - Rows per page
	 * @param range - Optional inclusive timestamp bounds
	 * @returns Page rows and the number of conversations across all pages
	 */
	getPaginated(page: number, pageSize: number, range?: TimestampRange): Page<IndexSummaryRow> {
		const filter = rangeClause(range, "timestamp");
		const offset = (page - 1) * pageSize;

		const totalRow = this.db
			.prepare<number[], { total: number }>(
				`SELECT COUNT(DISTINCT conversation_id) AS total
				FROM transcription_index
				WHERE is_latest = 1 ${filter.sql}`
			)
			.get(...filter.params);

		const rows = this.db
			.prepare<number[], SummaryRowRecord>(
				`SELECT ${SUMMARY_COLUMNS}
				FROM transcription_index
				WHERE is_latest = 1 ${filter.sql}
				ORDER BY timestamp DESC, conversation_id ASC
				LIMIT ? OFFSET ?`
			)
			.all(...filter.params, pageSize, offset);

		return { rows: rows.map(toSummaryRow), total: totalRow?.total ?? 0 };
	}

	/**
	 * Ranked full-text search over title and raw transcription.
	 *
	 * Each conversation appears once, represented by its best-ranked
	 * matching version. Rows holding a multi-word query as an exact phrase
	 * come first; within each group order is BM25 (best first), then
	 * timestamp descending.
	 *
	 * @param query - User search text
	 * @param page - 1-indexed page number
	 * @param pageSize - Rows per page
	 * @param range - Optional inclusive timestamp bounds
	 * @returns Page of hits and the number of matching conversations
	 */
	search(query: string, page: number, pageSize: number, range?: TimestampRange): Page<SearchHit> {
		const compiled = compileSearchQuery(query);
		if (!compiled) return { rows: [], total: 0 };

		const filter = rangeClause(range, "ti.timestamp");
		const offset = (page - 1) * pageSize;

		const totalRow = this.db
			.prepare<Array<string | number>, { total: number }>(
				`SELECT COUNT(DISTINCT ti.conversation_id) AS total
				FROM transcription_fts
				JOIN transcription_index ti ON ti.id = transcription_fts.rowid
				WHERE transcription_fts MATCH ? ${filter.sql}`
			)
			.get(compiled.match, ...filter.params);

		const rows = this.db
			.prepare<Array<string | number>, HitRecord>(
				`WITH hits AS (
					SELECT
						ti.conversation_id, ti.version_id, ti.timestamp, ti.title, ti.content_hash,
						ti.duration, ti.language, ti.created_at, ti.updated_at,
						snippet(transcription_fts, ${FTS_TITLE_COLUMN}, '${HIGHLIGHT_OPEN}', '${HIGHLIGHT_CLOSE}', '${SNIPPET_ELLIPSIS}', ${TITLE_SNIPPET_TOKENS}) AS title_snippet,
						snippet(transcription_fts, ${FTS_RAW_COLUMN}, '${HIGHLIGHT_OPEN}', '${HIGHLIGHT_CLOSE}', '${SNIPPET_ELLIPSIS}', ${RAW_SNIPPET_TOKENS}) AS raw_snippet,
						bm25(transcription_fts) AS score,
						ti.id IN (
							SELECT rowid FROM transcription_fts WHERE transcription_fts MATCH ?
						) AS phrase_hit
					FROM transcription_fts
					JOIN transcription_index ti ON ti.id = transcription_fts.rowid
					WHERE transcription_fts MATCH ? ${filter.sql}
				),
				best AS (
					SELECT *, ROW_NUMBER() OVER (
						PARTITION BY conversation_id
						ORDER BY phrase_hit DESC, score, timestamp DESC, version_id DESC
					) AS position
					FROM hits
				)
				SELECT ${SUMMARY_COLUMNS}, title_snippet, raw_snippet, score
				FROM best
				WHERE position = 1
				ORDER BY phrase_hit DESC, score, timestamp DESC
				LIMIT ? OFFSET ?`
			)
			.all(compiled.phrase, compiled.match, ...filter.params, pageSize, offset);

		this.logger.debug("index", "search", {
			mode: compiled.mode,
			tokens: compiled.tokens.length,
			hits: rows.length,
			total: totalRow?.total ?? 0,
		});

		return {
			rows: rows.map((row) => ({
				...toSummaryRow(row),
				matchSnippets: collectSnippets([row.title_snippet, row.raw_snippet]),
				rank: row.score,
			})),
			total: totalRow?.total ?? 0,
		};
	}

	/**
	 * @param conversationId - Conversation to read
	 * @returns Every version, newest first
	 */
	getByConversationId(conversationId: string): IndexRow[] {
		return this.db
			.prepare<[string], FullRowRecord>(
				`SELECT ${FULL_COLUMNS}
				FROM transcription_index
				WHERE conversation_id = ?
				ORDER BY timestamp DESC, version_id DESC`
			)
			.all(conversationId)
			.map(toFullRow);
	}

	/** @returns Number of distinct conversations */
	getCount(): number {
		const row = this.db
			.prepare<[], { count: number }>(
				"SELECT COUNT(DISTINCT conversation_id) AS count FROM transcription_index"
			)
			.get();
		return row?.count ?? 0;
	}

	/** @returns Number of indexed versions (rows) */
	getVersionCount(): number {
		const row = this.db
			.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM transcription_index")
			.get();
		return row?.count ?? 0;
	}

	/**
	 * Delete rows that are not in `keep`, then recompute latest flags for
	 * conversations that lost a version but still have others.
	 *
	 * @param keep - `conversationId` → version ids that should remain
	 * @returns Number of rows deleted
	 */
	pruneExcept(keep: ReadonlyMap<string, ReadonlySet<string>>): number {
		const existing = this.db
			.prepare<[], { conversation_id: string; version_id: string }>(
				"SELECT conversation_id, version_id FROM transcription_index"
			)
			.all();

		const stale = existing.filter(
			(row) => !keep.get(row.conversation_id)?.has(row.version_id)
		);
		if (stale.length === 0) return 0;

		const remove = this.db.prepare<[string, string]>(
			"DELETE FROM transcription_index WHERE conversation_id = ? AND version_id = ?"
		);
		const touched = new Set<string>();

		this.transaction(() => {
			for (const row of stale) {
				remove.run(row.conversation_id, row.version_id);
				touched.add(row.conversation_id);
			}
			for (const conversationId of touched) {
				this.updateLatestFlags(conversationId);
			}
		});

		this.logger.info("index", "pruned", { rows: stale.length, conversations: touched.size });
		return stale.length;
	}

	/**
	 * @param conversationId - Conversation to remove (all versions)
	 */
	deleteByConversationId(conversationId: string): void {
		this.transaction(() => {
			this.db
				.prepare<[string]>("DELETE FROM transcription_index WHERE conversation_id = ?")
				.run(conversationId);
		});
	}

	/** Remove every row (and, through the triggers, every FTS entry). */
	clearAll(): void {
		this.transaction(() => {
			this.db.prepare("DELETE FROM transcription_index").run();
		});
		this.logger.info("index", "cleared");
	}
}
