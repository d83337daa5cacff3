/**
 * Case-insensitive substring matching over conversations loaded from disk.
 * Needs no index, so it answers before the first sync.
 */

import type { Conversation, Recording } from "./types.js";

/** Characters kept on each side of a match. */
export const CONTEXT_CHARS = 100;

/** Contexts taken from one text. */
export const MAX_CONTEXTS_PER_TEXT = 5;

/** Labelled matches kept per conversation. */
export const MAX_MATCHES_PER_CONVERSATION = 10;

type TextField = keyof Pick<
	Recording,
	"rawTranscription" | "preprocessedTranscription" | "llmTranscription"
>;

const TEXT_STAGES: ReadonlyArray<readonly [label: string, field: TextField]> = [
	["Raw", "rawTranscription"],
	["Preprocessed", "preprocessedTranscription"],
	["LLM", "llmTranscription"],
];

/**
 * Cut a window of text around each occurrence of `query`, with `...`
 * where the window does not reach the text's ends.
 *
 * @param text - Text to search
 * @param query - Substring to find, compared case-insensitively
 * @param contextChars - Characters kept before and after each match
 * @param limit - Most contexts returned
 * @returns Contexts in text order
 */
export function extractMatchContexts(
	text: string,
	query: string,
	contextChars = CONTEXT_CHARS,
	limit = MAX_CONTEXTS_PER_TEXT
): string[] {
	const needle = query.toLowerCase();
	if (!needle) return [];

	const haystack = text.toLowerCase();
	const contexts: string[] = [];
	let from = 0;

	while (contexts.length < limit) {
		const position = haystack.indexOf(needle, from);
		if (position === -1) break;

		const start = Math.max(0, position - contextChars);
		const end = Math.min(text.length, position + needle.length + contextChars);
		let context = text.slice(start, end);
		if (start > 0) context = `...${context}`;
		if (end < text.length) context = `${context}...`;

		contexts.push(context);
		from = position + needle.length;
	}

	return contexts;
}

/**
 * Labelled matches for one conversation: the title, then each version's
 * raw, preprocessed and LLM text, newest version first.
 *
 * @param conversation - Conversation to search
 * @param query - Substring to find, compared case-insensitively
 * @returns Up to {@link MAX_MATCHES_PER_CONVERSATION} lines such as `Raw: ...`
 */
export function findConversationMatches(conversation: Conversation, query: string): string[] {
	const needle = query.toLowerCase();
	if (!needle) return [];

	const matches: string[] = [];
	if (conversation.title.toLowerCase().includes(needle)) {
		matches.push(`Title: ${conversation.title}`);
	}

	for (const version of conversation.versions) {
		for (const [label, field] of TEXT_STAGES) {
			const text = version.recording[field];
			if (!text) continue;
			for (const context of extractMatchContexts(text, query)) {
				matches.push(`${label}: ${context}`);
			}
		}
	}

	return matches.slice(0, MAX_MATCHES_PER_CONVERSATION);
}
