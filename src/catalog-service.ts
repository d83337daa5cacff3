/**
 * Read API over the catalog: listing, conversation lookup, paginated and
 * full-text queries, and audio access.
 */

import { createReadStream, type ReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { mimeTypeFor, parseByteRange } from "./audio-range.js";
import {
	buildConversation,
	groupIntoConversations,
	summarizeConversation,
} from "./conversation-grouper.js";
import { hasErrnoCode, InvalidRequestError, NotFoundError } from "./errors.js";
import type { LocationCache } from "./location-cache.js";
import { type Logger, silentLogger } from "./logger.js";
import { findConversationMatches } from "./match-context.js";
import { parseTimestampDirectoryName, type RecordingStore } from "./recording-store.js";
import type { SearchIndex } from "./search-index.js";
import type {
	CacheEntry,
	Conversation,
	ConversationSummary,
	ConversationVersion,
	IndexSummaryRow,
	Page,
	Recording,
	ScanSearchResult,
	SearchHit,
} from "./types.js";

/** Largest page a caller may ask for. */
export const MAX_PAGE_SIZE = 100;

const TimestampBound = Type.Integer({ minimum: 0 });

export const PageRequestSchema = Type.Object({
	page: Type.Integer({ minimum: 1 }),
	pageSize: Type.Integer({ minimum: 1, maximum: MAX_PAGE_SIZE }),
	from: Type.Optional(TimestampBound),
	to: Type.Optional(TimestampBound),
});

export const SearchRequestSchema = Type.Object({
	query: Type.String({ minLength: 1 }),
	page: Type.Integer({ minimum: 1 }),
	pageSize: Type.Integer({ minimum: 1, maximum: MAX_PAGE_SIZE }),
	from: Type.Optional(TimestampBound),
	to: Type.Optional(TimestampBound),
});

export type PageRequest = Static<typeof PageRequestSchema>;
export type SearchRequest = Static<typeof SearchRequestSchema>;

/** Where a version's audio lives. */
export interface AudioFileInfo {
	path: string;
	size: number;
	mimeType: string;
	fileName: string;
}

/** Audio read stream plus what a ranged HTTP response needs. */
export interface AudioStream extends AudioFileInfo {
	stream: ReadStream;
	/** First byte served (inclusive). */
	start: number;
	/** Last byte served (inclusive); -1 for an empty file. */
	end: number;
	/** True when a range was requested and honored. */
	partial: boolean;
}

/**
 * Validate a request against its schema.
 *
 * @param schema - TypeBox schema
 * @param value - Caller input
 * @returns The input, typed
 * @throws {InvalidRequestError} On the first violation
 */
function validateRequest<T extends TSchema>(schema: T, value: unknown): Static<T> {
	if (Value.Check(schema, value)) return value;
	const first = Value.Errors(schema, value).First();
	const field = first?.path.replace(/^\//, "") || "request";
	throw new InvalidRequestError(`Invalid ${field}: ${first?.message ?? "invalid value"}`);
}

/** Reject a range whose lower bound is after its upper bound. */
function checkRange(from: number | undefined, to: number | undefined): void {
	if (from !== undefined && to !== undefined && from > to) {
		throw new InvalidRequestError(`Invalid range: from (${from}) is after to (${to})`);
	}
}

/**
 * Query service over the store, the location cache and the search index.
 *
 * @example
 * ```typescript
 * const service = new CatalogService(store, cache, index, logger);
 * const conversation = await service.getConversationOrThrow(id);
 * const hits = service.search({ query: "standup", page: 1, pageSize: 20 });
 * ```
 */
export class CatalogService {
	/**
	 * @param store - Recording source
	 * @param cache - Recording id → directory mapping
	 * @param index - Search index
	 * @param logger - Diagnostic sink
	 */
	constructor(
		private readonly store: RecordingStore,
		private readonly cache: LocationCache,
		private readonly index: SearchIndex,
		private readonly logger: Logger = silentLogger
	) {}

	/** @returns Every conversation from a fresh scan, most recently updated first */
	async listAllConversations(): Promise<Conversation[]> {
		return groupIntoConversations(await this.store.scan());
	}

	/** @returns The same conversations as list items */
	async listConversationSummaries(): Promise<ConversationSummary[]> {
		return (await this.listAllConversations()).map(summarizeConversation);
	}

	/**
	 * Case-insensitive substring search over a fresh scan: titles and all
	 * three text stages of every version. Works without the index.
	 *
	 * @param query - Substring to find
	 * @returns Matching conversations, most recently updated first, with
	 *   labelled contexts
	 * @throws {InvalidRequestError} On a blank query
	 */
	async searchAllConversations(query: string): Promise<ScanSearchResult[]> {
		if (!query.trim()) throw new InvalidRequestError("Invalid query: must not be blank");

		const results: ScanSearchResult[] = [];
		for (const conversation of await this.listAllConversations()) {
			const matches = findConversationMatches(conversation, query);
			if (matches.length > 0) results.push({ conversation, matches });
		}
		this.logger.info("query", "scan_search", { matches: results.length });
		return results;
	}

	/**
	 * Find a conversation by content hash, recording id, or timestamp.
	 *
	 * The location cache is tried first. Its answer is used only when every
	 * directory it points at still exists and the cache covers every
	 * directory on disk; otherwise a full scan decides.
	 *
	 * @param id - Conversation id, recorder recording id, or directory timestamp
	 * @returns The conversation, or null
	 */
	async getConversation(id: string): Promise<Conversation | null> {
		const targeted = await this.lookupTargeted(id);
		if (targeted && (await this.cacheCoversDisk())) {
			this.logger.debug("query", "conversation_cache_hit", { id });
			return targeted;
		}

		this.logger.debug("query", "conversation_full_scan", { id, stale: targeted === null });
		const conversations = await this.listAllConversations();
		const timestamp = parseTimestampDirectoryName(id);
		return (
			conversations.find((conversation) => conversation.conversationId === id) ??
			conversations.find((conversation) =>
				conversation.versions.some(
					(version) =>
						version.recording.recordingId === id ||
						(timestamp !== null && version.timestamp === timestamp)
				)
			) ??
			null
		);
	}

	/**
	 * @param id - As for {@link getConversation}
	 * @returns The conversation
	 * @throws {NotFoundError} When no conversation matches
	 */
	async getConversationOrThrow(id: string): Promise<Conversation> {
		const conversation = await this.getConversation(id);
		if (!conversation) throw new NotFoundError(`Conversation not found: ${id}`);
		return conversation;
	}

	/**
	 * Latest version of each indexed conversation, newest first.
	 *
	 * @param request - Page, page size, optional timestamp bounds
	 * @returns Page rows and total conversations
	 * @throws {InvalidRequestError} On out-of-range arguments
	 */
	listPage(request: PageRequest): Page<IndexSummaryRow> {
		const { page, pageSize, from, to } = validateRequest(PageRequestSchema, request);
		checkRange(from, to);
		return this.index.getPaginated(page, pageSize, { from, to });
	}

	/**
	 * Ranked full-text search, one hit per conversation.
	 *
	 * @param request - Query text, page, page size, optional timestamp bounds
	 * @returns Page of hits and total matching conversations
	 * @throws {InvalidRequestError} On an empty query or out-of-range arguments
	 */
	search(request: SearchRequest): Page<SearchHit> {
		const { query, page, pageSize, from, to } = validateRequest(SearchRequestSchema, request);
		if (!query.trim()) throw new InvalidRequestError("Invalid query: must not be blank");
		checkRange(from, to);

		const result = this.index.search(query, page, pageSize, { from, to });
		this.logger.info("query", "search", { page, pageSize, total: result.total });
		return result;
	}

	/**
	 * @param conversationId - Conversation id
	 * @param versionId - Version (timestamp) within it
	 * @returns Audio location, size, and type
	 * @throws {NotFoundError} When the conversation, version, or audio is missing
	 */
	async getAudioFile(conversationId: string, versionId: string): Promise<AudioFileInfo> {
		const { recording } = await this.resolveVersion(conversationId, versionId);
		const path = recording.audioFile;
		if (!path) {
			throw new NotFoundError(`No audio file for version ${versionId} of ${conversationId}`);
		}

		let size: number;
		try {
			size = (await stat(path)).size;
		} catch (error) {
			if (hasErrnoCode(error, "ENOENT")) {
				throw new NotFoundError(`Audio file no longer exists: ${path}`);
			}
			throw error;
		}
		return { path, size, mimeType: mimeTypeFor(path), fileName: basename(path) };
	}

	/**
	 * @param conversationId - Conversation id
	 * @param versionId - Version (timestamp) within it
	 * @returns Raw audio bytes
	 * @throws {NotFoundError} When the conversation, version, or audio is missing
	 */
	async readAudio(conversationId: string, versionId: string): Promise<Buffer> {
		const { recording } = await this.resolveVersion(conversationId, versionId);
		return this.store.readAudio(recording);
	}

	/**
	 * Open a read stream for a version's audio, honoring a `Range` header.
	 *
	 * @param conversationId - Conversation id
	 * @param versionId - Version (timestamp) within it
	 * @param rangeHeader - Raw `Range` header, if any
	 * @returns Stream and the byte span it covers
	 * @throws {NotFoundError} When the audio is missing
	 * @throws {InvalidRequestError} When the range lies outside the file
	 */
	async openAudioStream(
		conversationId: string,
		versionId: string,
		rangeHeader?: string
	): Promise<AudioStream> {
		const file = await this.getAudioFile(conversationId, versionId);
		const range = parseByteRange(rangeHeader, file.size);
		if (range === "unsatisfiable") {
			throw new InvalidRequestError(`Range not satisfiable: ${rangeHeader} (size ${file.size})`);
		}

		if (range) {
			return {
				...file,
				stream: createReadStream(file.path, { start: range.start, end: range.end }),
				start: range.start,
				end: range.end,
				partial: true,
			};
		}
		return {
			...file,
			stream: createReadStream(file.path),
			start: 0,
			end: file.size - 1,
			partial: false,
		};
	}

	private async resolveVersion(
		conversationId: string,
		versionId: string
	): Promise<ConversationVersion> {
		const conversation = await this.getConversationOrThrow(conversationId);
		const version = conversation.versions.find((candidate) => candidate.versionId === versionId);
		if (!version) {
			throw new NotFoundError(`Version ${versionId} not found in conversation ${conversationId}`);
		}
		return version;
	}

	// ─── Targeted lookup ─────────────────────────────────────────────────────

	/**
	 * Resolve through the location cache without scanning.
	 *
	 * @returns The conversation, or null on a miss or a stale entry
	 */
	private async lookupTargeted(id: string): Promise<Conversation | null> {
		const byHash = this.cache.getByContentHash(id);
		if (byHash.length > 0) return this.loadHashConversation(id, byHash);

		const entry = this.cache.getByRecordingId(id);
		if (entry) {
			return entry.contentHash
				? this.loadHashConversation(entry.contentHash, this.cache.getByContentHash(entry.contentHash))
				: this.loadCachedTimestamp(entry);
		}

		const timestamp = parseTimestampDirectoryName(id);
		return timestamp === null ? null : this.loadTimestamp(timestamp);
	}

	private async loadCachedTimestamp(entry: CacheEntry): Promise<Conversation | null> {
		const timestamp = parseTimestampDirectoryName(entry.internalId);
		return timestamp === null ? null : this.loadTimestamp(timestamp);
	}

	/**
	 * Load one directory; a recording with a hash resolves to its full
	 * hash conversation.
	 */
	private async loadTimestamp(timestamp: number): Promise<Conversation | null> {
		const recording = await this.store.getByTimestamp(timestamp);
		if (!recording) return null;
		if (!recording.contentHash) {
			return buildConversation(String(recording.timestamp), [recording]);
		}
		const entries = this.cache.getByContentHash(recording.contentHash);
		if (entries.length === 0) return null;
		return this.loadHashConversation(recording.contentHash, entries);
	}

	/**
	 * Load every cached directory of a hash. Any missing directory or changed
	 * audio makes the whole answer stale.
	 */
	private async loadHashConversation(
		contentHash: string,
		entries: CacheEntry[]
	): Promise<Conversation | null> {
		const recordings: Recording[] = [];
		const seen = new Set<number>();

		for (const entry of entries) {
			const timestamp = parseTimestampDirectoryName(entry.internalId);
			if (timestamp === null) return null;
			if (seen.has(timestamp)) continue;
			seen.add(timestamp);

			const recording = await this.store.getByTimestamp(timestamp);
			if (!recording || recording.contentHash !== contentHash) {
				this.logger.debug("cache", "stale_entry", {
					recordingId: entry.recordingId,
					internalId: entry.internalId,
				});
				return null;
			}
			recordings.push(recording);
		}

		return recordings.length > 0 ? buildConversation(contentHash, recordings) : null;
	}

	/** The cache holds one entry per directory on disk. */
	private async cacheCoversDisk(): Promise<boolean> {
		const cached = this.cache.count();
		const onDisk = await this.store.countRecordingDirectories();
		if (cached !== onDisk) {
			this.logger.debug("cache", "drift", { cached, onDisk });
		}
		return cached === onDisk;
	}
}
