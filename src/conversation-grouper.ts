/**
 * Groups recordings into conversations.
 *
 * Re-transcriptions of the same audio share a content hash; each hash
 * becomes one conversation whose versions are ordered newest first.
 * Pure functions only. Callers do the I/O.
 */

import { bestTranscriptionText } from "./recording-metadata.js";
import type { Conversation, ConversationSummary, ConversationVersion, Recording } from "./types.js";

/** Titles longer than this many characters are cut and get "...". */
export const TITLE_MAX_LENGTH = 50;

/**
 * Identity key of a recording: its content hash, else its timestamp.
 *
 * @param recording - Recording to key
 * @returns Conversation id
 */
export function conversationIdFor(recording: Pick<Recording, "contentHash" | "timestamp">): string {
	return recording.contentHash ? recording.contentHash : String(recording.timestamp);
}

/**
 * Derive a conversation title from a recording's text.
 *
 * Text preference is preprocessed → raw → LLM-refined, the same order the
 * index uses, so a conversation keeps one title everywhere.
 *
 * @param recording - Usually the latest version
 * @returns Up to 50 characters of text (plus "..."), or a date-based fallback
 */
export function generateTitle(recording: Recording): string {
	const text = bestTranscriptionText(recording)?.trim();
	if (text) {
		const chars = Array.from(text);
		return chars.length > TITLE_MAX_LENGTH
			? `${chars.slice(0, TITLE_MAX_LENGTH).join("")}...`
			: text;
	}
	return `Conversation on ${formatLocalDateTime(recording.createdAt)}`;
}

/**
 * @param date - Date to format
 * @returns "YYYY-MM-DD HH:MM:SS" in local time
 */
export function formatLocalDateTime(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}

/**
 * Build one conversation from recordings that share an identity key.
 *
 * @param conversationId - Shared key
 * @param recordings - Non-empty list, any order
 * @returns The conversation
 */
export function buildConversation(conversationId: string, recordings: Recording[]): Conversation {
	const ordered = [...recordings].sort((a, b) => b.timestamp - a.timestamp);
	const versions: ConversationVersion[] = ordered.map((recording, idx) => ({
		versionId: String(recording.timestamp),
		timestamp: recording.timestamp,
		recording,
		isLatest: idx === 0,
	}));
	const [latestVersion] = versions;
	const oldest = ordered[ordered.length - 1];

	return {
		conversationId,
		title: generateTitle(latestVersion.recording),
		versions,
		latestVersion,
		createdAt: oldest.createdAt,
		updatedAt: latestVersion.recording.createdAt,
	};
}

/**
 * Group recordings into conversations, most recently updated first.
 *
 * Ties on `updatedAt` fall back to the latest timestamp, then the id, so
 * the order is stable for identical input.
 *
 * @param recordings - Recordings in any order
 * @returns Conversations
 */
export function groupIntoConversations(recordings: readonly Recording[]): Conversation[] {
	const groups = new Map<string, Recording[]>();
	for (const recording of recordings) {
		const id = conversationIdFor(recording);
		const group = groups.get(id);
		if (group) {
			group.push(recording);
		} else {
			groups.set(id, [recording]);
		}
	}

	const conversations = [...groups].map(([id, group]) => buildConversation(id, group));

	return conversations.sort(
		(a, b) =>
			sortTime(b.updatedAt) - sortTime(a.updatedAt) ||
			b.latestVersion.timestamp - a.latestVersion.timestamp ||
			a.conversationId.localeCompare(b.conversationId)
	);
}

/** Missing dates sort as the oldest possible value. */
function sortTime(date: Date | undefined): number {
	return date ? date.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * @param conversation - Conversation to summarize
 * @returns List-view projection
 */
export function summarizeConversation(conversation: Conversation): ConversationSummary {
	return {
		conversationId: conversation.conversationId,
		title: conversation.title,
		latestTimestamp: conversation.latestVersion.timestamp,
		versionCount: conversation.versions.length,
		createdAt: conversation.createdAt,
		updatedAt: conversation.updatedAt,
	};
}
