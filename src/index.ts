/**
 * murmur
 *
 * Searchable catalog of voice-transcription recordings stored on disk.
 * Use createCatalog() to open one over a recordings directory.
 *
 * ```typescript
 * import { createCatalog } from "murmur";
 *
 * const catalog = createCatalog({
 *   recordingsDir: "/path/to/recordings",
 *   databasePath: "/path/to/catalog.db",
 * });
 *
 * await catalog.sync.ensureSync();
 * const { rows } = catalog.service.search({ query: "weekly planning", page: 1, pageSize: 10 });
 * await catalog.close();
 * ```
 */

// ── Catalog ──────────────────────────────────────────────────────────────────

export { type Catalog, type CatalogOptions, createCatalog } from "./catalog.js";
export {
	type AudioFileInfo,
	type AudioStream,
	CatalogService,
	MAX_PAGE_SIZE,
	type PageRequest,
	type SearchRequest,
} from "./catalog-service.js";

// ── Components ───────────────────────────────────────────────────────────────

export { type ByteRange, mimeTypeFor, parseByteRange } from "./audio-range.js";
export { hashAudioFile } from "./audio-hash.js";
export {
	buildConversation,
	conversationIdFor,
	generateTitle,
	groupIntoConversations,
	summarizeConversation,
	TITLE_MAX_LENGTH,
} from "./conversation-grouper.js";
export { type CatalogDatabase, openCatalogDatabase } from "./database.js";
export { type CompiledSearchQuery, compileSearchQuery } from "./fts-query.js";
export { LocationCache } from "./location-cache.js";
export { extractMatchContexts, findConversationMatches } from "./match-context.js";
export {
	AUDIO_FILE_NAMES,
	DirectoryRecordingStore,
	METADATA_FILE_NAMES,
	type RecordingStore,
} from "./recording-store.js";
export { type IndexUpsert, SearchIndex } from "./search-index.js";
export {
	type EnsureSyncOutcome,
	SyncCoordinator,
	type SyncStatus,
} from "./sync-coordinator.js";
export { type SyncResult, SyncTask, type SyncTaskState } from "./sync-task.js";

// ── Config, logging, errors ──────────────────────────────────────────────────

export {
	loadSettings,
	MURMUR_VERSION,
	type MurmurSettings,
	resolveMurmurHome,
	type SettingsOverrides,
} from "./config.js";
export {
	CatalogError,
	type CatalogErrorCode,
	InvalidRequestError,
	NotFoundError,
	SyncFailureError,
} from "./errors.js";
export { JsonlLogger, type Logger, MemoryLogger, silentLogger } from "./logger.js";

// ── Types ────────────────────────────────────────────────────────────────────

export type {
	CacheEntry,
	Conversation,
	ConversationSummary,
	ConversationVersion,
	IndexRow,
	IndexSummaryRow,
	Page,
	Recording,
	ScanSearchResult,
	SearchHit,
	Segment,
	TimestampRange,
} from "./types.js";
