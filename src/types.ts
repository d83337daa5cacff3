/** One timed span of a transcription. Times are in seconds. */
export interface Segment {
	start: number;
	end: number;
	text: string;
}

/** One scanned timestamp directory. Rebuilt from disk on every read. */
export interface Recording {
	/** Directory name as a Unix timestamp; unique per directory. */
	timestamp: number;
	directory: string;
	audioFile?: string;
	metadataFile?: string;
	/** Recorder-assigned identifier from the metadata document. */
	recordingId?: string;
	/** SHA-256 (hex) of the audio payload; absent without readable audio. */
	contentHash?: string;
	rawTranscription?: string;
	preprocessedTranscription?: string;
	llmTranscription?: string;
	segments: Segment[];
	/** Recording length in milliseconds, as the recorder reports it. */
	duration?: number;
	language?: string;
	modelName?: string;
	languageModelName?: string;
	modeName?: string;
	/** Total recorder processing time in milliseconds. */
	processingTime?: number;
	createdAt: Date;
}

/** A recording as it appears inside a conversation. */
export interface ConversationVersion {
	/** Timestamp as a string. */
	versionId: string;
	timestamp: number;
	recording: Recording;
	isLatest: boolean;
}

/** Every re-transcription of the same audio, newest first. */
export interface Conversation {
	/** Content hash, or the timestamp string when there is no hash. */
	conversationId: string;
	title: string;
	versions: ConversationVersion[];
	/** Alias of `versions[0]`. */
	latestVersion: ConversationVersion;
	createdAt?: Date;
	updatedAt?: Date;
}

/** List-view projection of a conversation. */
export interface ConversationSummary {
	conversationId: string;
	title: string;
	latestTimestamp: number;
	versionCount: number;
	createdAt?: Date;
	updatedAt?: Date;
}

/** Persisted recording id → location mapping. */
export interface CacheEntry {
	recordingId: string;
	/** Timestamp directory name. */
	internalId: string;
	directoryPath: string;
	contentHash: string | null;
	createdAt: string;
	updatedAt: string;
}

/** Listing columns of an index row. */
export interface IndexSummaryRow {
	conversationId: string;
	versionId: string;
	timestamp: number;
	title: string;
	contentHash: string | null;
	duration: number | null;
	language: string | null;
	createdAt: string | null;
	updatedAt: string;
}

/** Every column of an index row. */
export interface IndexRow extends IndexSummaryRow {
	rawTranscription: string | null;
	preprocessedTranscription: string | null;
	llmTranscription: string | null;
	modelName: string | null;
	languageModelName: string | null;
	modeName: string | null;
	isLatest: boolean;
}

/** A ranked full-text hit. */
export interface SearchHit extends IndexSummaryRow {
	/** Highlighted fragments, `<mark>`-delimited. */
	matchSnippets: string[];
	/** BM25 score; lower is more relevant. */
	rank: number;
}

/** A conversation found by substring search over a fresh scan. */
export interface ScanSearchResult {
	conversation: Conversation;
	/** Labelled contexts, e.g. `Raw: ...the budget review...`. */
	matches: string[];
}

/** One page of results plus the total across all pages. */
export interface Page<T> {
	rows: T[];
	total: number;
}

/** Inclusive Unix-timestamp bounds. */
export interface TimestampRange {
	from?: number;
	to?: number;
}
