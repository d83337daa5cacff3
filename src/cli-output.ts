/**
 * Plain-text rendering for CLI output. `--json` bypasses all of this.
 */

import { bestTranscriptionText } from "./recording-metadata.js";
import type { SyncStatus } from "./sync-coordinator.js";
import type {
	Conversation,
	ConversationSummary,
	IndexSummaryRow,
	Page,
	ScanSearchResult,
	SearchHit,
} from "./types.js";

/** ANSI highlight used in place of the index's `<mark>` tags on a TTY. */
const HIGHLIGHT_ON = "\x1b[1;33m";
const HIGHLIGHT_OFF = "\x1b[0m";

/**
 * @param timestamp - Unix seconds
 * @returns ISO 8601 in UTC, without milliseconds
 */
export function formatTimestamp(timestamp: number): string {
	return new Date(timestamp * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * @param ms - Duration in milliseconds, if known
 * @returns `m:ss`, or "-" when unknown
 */
export function formatDuration(ms: number | null | undefined): string {
	if (ms === null || ms === undefined || !Number.isFinite(ms) || ms < 0) return "-";
	const totalSeconds = Math.round(ms / 1000);
	const minutes = Math.floor(totalSeconds / 60);
	const seconds = totalSeconds % 60;
	return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

/**
 * Replace `<mark>` tags with ANSI bold, or with `[` `]` when not on a TTY.
 *
 * @param snippet - Highlighted snippet from the index
 * @param color - Whether to emit ANSI escapes
 * @returns Terminal-ready snippet
 */
export function renderSnippet(snippet: string, color: boolean): string {
	const open = color ? HIGHLIGHT_ON : "[";
	const close = color ? HIGHLIGHT_OFF : "]";
	return snippet.replaceAll("<mark>", open).replaceAll("</mark>", close).replace(/\s+/g, " ");
}

/**
 * @param page - Current page (1-indexed)
 * @param pageSize - Rows per page
 * @param total - Total rows across pages
 * @returns "Page 2 of 5 (123 conversations)"
 */
export function formatPageFooter(page: number, pageSize: number, total: number): string {
	const pages = Math.max(1, Math.ceil(total / pageSize));
	const noun = total === 1 ? "conversation" : "conversations";
	return `Page ${page} of ${pages} (${total} ${noun})`;
}

/**
 * @param page - Listing page from the index
 * @param pageNumber - Requested page
 * @param pageSize - Requested page size
 * @returns One line per conversation, then the footer
 */
export function formatListPage(
	page: Page<IndexSummaryRow>,
	pageNumber: number,
	pageSize: number
): string {
	const lines = page.rows.map(
		(row) =>
			`${formatTimestamp(row.timestamp)}  ${formatDuration(row.duration).padStart(6)}  ${row.title}  (${row.conversationId})`
	);
	if (lines.length === 0) lines.push("No conversations.");
	lines.push("", formatPageFooter(pageNumber, pageSize, page.total));
	return lines.join("\n");
}

/**
 * @param page - Search results
 * @param pageNumber - Requested page
 * @param pageSize - Requested page size
 * @param color - Whether to emit ANSI escapes
 * @returns Each hit with its snippets, then the footer
 */
export function formatSearchPage(
	page: Page<SearchHit>,
	pageNumber: number,
	pageSize: number,
	color: boolean
): string {
	const lines: string[] = [];
	for (const hit of page.rows) {
		lines.push(`${formatTimestamp(hit.timestamp)}  ${hit.title}  (${hit.conversationId})`);
		for (const snippet of hit.matchSnippets) {
			lines.push(`    ${renderSnippet(snippet, color)}`);
		}
	}
	if (lines.length === 0) lines.push("No matches.");
	lines.push("", formatPageFooter(pageNumber, pageSize, page.total));
	return lines.join("\n");
}

/**
 * @param results - Substring matches from a full scan
 * @returns Each conversation with its labelled contexts
 */
export function formatScanResults(results: ScanSearchResult[]): string {
	if (results.length === 0) return "No matches.";
	const lines: string[] = [];
	for (const { conversation, matches } of results) {
		lines.push(
			`${formatTimestamp(conversation.latestVersion.timestamp)}  ${conversation.title}  (${conversation.conversationId})`
		);
		for (const match of matches) {
			lines.push(`    ${match.replace(/\s+/g, " ")}`);
		}
	}
	return lines.join("\n");
}

/**
 * @param summaries - Conversations from a full scan
 * @returns One line per conversation
 */
export function formatSummaries(summaries: ConversationSummary[]): string {
	if (summaries.length === 0) return "No conversations.";
	return summaries
		.map((summary) => {
			const versions = summary.versionCount === 1 ? "1 version" : `${summary.versionCount} versions`;
			return `${formatTimestamp(summary.latestTimestamp)}  ${versions.padEnd(11)}  ${summary.title}  (${summary.conversationId})`;
		})
		.join("\n");
}

/**
 * @param conversation - Conversation to show
 * @returns Header, then each version with its best text
 */
export function formatConversation(conversation: Conversation): string {
	const lines = [
		conversation.title,
		`id: ${conversation.conversationId}`,
		`versions: ${conversation.versions.length}`,
		"",
	];
	for (const version of conversation.versions) {
		const { recording } = version;
		const marker = version.isLatest ? " (latest)" : "";
		lines.push(`── ${version.versionId}${marker}  ${formatTimestamp(version.timestamp)}`);
		const details = [
			recording.modelName && `model ${recording.modelName}`,
			recording.modeName && `mode ${recording.modeName}`,
			recording.language && `language ${recording.language}`,
			`duration ${formatDuration(recording.duration)}`,
		].filter((detail): detail is string => Boolean(detail));
		lines.push(`   ${details.join(", ")}`);
		const text = bestTranscriptionText(recording);
		lines.push(text ? `   ${text.trim()}` : "   (no transcription)", "");
	}
	return lines.join("\n").trimEnd();
}

/**
 * @param status - Coordinator snapshot
 * @param counts - Index and disk counters
 * @returns Multi-line status report
 */
export function formatStatus(
	status: SyncStatus,
	counts: { conversations: number; versions: number; cached: number; directories: number }
): string {
	const lines = [
		`sync:          ${status.state}`,
		`conversations: ${counts.conversations}`,
		`versions:      ${counts.versions}`,
		`directories:   ${counts.directories}`,
		`cached ids:    ${counts.cached}`,
	];
	if (status.lastResult) {
		const { recordings, conversations, indexed, failed, durationMs } = status.lastResult;
		lines.push(
			`last sync:     ${recordings} recordings, ${conversations} conversations, ${indexed} indexed, ${failed} failed in ${durationMs} ms`
		);
	}
	if (status.lastError) lines.push(`last error:    ${status.lastError}`);
	return lines.join("\n");
}
