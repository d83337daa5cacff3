#!/usr/bin/env node

/**
 * murmur CLI: browse and search local voice transcriptions.
 *
 * Usage:
 *   murmur sync                     Reconcile the index when it looks stale
 *   murmur sync --force             Rebuild the index unconditionally
 *   murmur list --page 2            Latest version of each conversation
 *   murmur search budget review     Ranked full-text search
 *   murmur show <id>                Every version of one conversation
 */

import {
	APP_NAME,
	loadSettings,
	type MurmurSettings,
	MURMUR_VERSION,
	resolveMurmurHome,
} from "./config.js";

// Fatal handlers register before anything opens the database.
import { registerFatalErrorHandlers } from "./fatal-errors.js";

registerFatalErrorHandlers(resolveMurmurHome());

import { Command, InvalidArgumentError } from "commander";
import { type Catalog, createCatalog } from "./catalog.js";
import {
	formatConversation,
	formatListPage,
	formatScanResults,
	formatSearchPage,
	formatStatus,
	formatSummaries,
} from "./cli-output.js";
import { CatalogError } from "./errors.js";
import { JsonlLogger, type Logger } from "./logger.js";

// ─── Options ─────────────────────────────────────────────────────────────────

/** Options every command inherits from the program. */
type GlobalOptions = {
	json?: boolean;
	recordings?: string;
	db?: string;
	debug?: boolean;
};

interface PageOptions {
	page: number;
	pageSize?: number;
	from?: number;
	to?: number;
}

/**
 * Commander argument parser for non-negative integers.
 *
 * @param value - Raw flag value
 * @returns Parsed integer
 */
function parseInteger(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Expected a non-negative integer.");
	}
	return Number(value);
}

/**
 * Commander argument parser for `--from` / `--to`: Unix seconds or an
 * ISO 8601 date.
 *
 * @param value - Raw flag value
 * @returns Unix timestamp in seconds
 */
function parseTimeBound(value: string): number {
	if (/^\d+$/.test(value)) return Number(value);
	const ms = Date.parse(value);
	if (Number.isNaN(ms)) {
		throw new InvalidArgumentError("Expected Unix seconds or an ISO 8601 date.");
	}
	return Math.floor(ms / 1000);
}

// ─── Runtime ─────────────────────────────────────────────────────────────────

interface CommandContext {
	catalog: Catalog;
	settings: MurmurSettings;
	logger: Logger;
	json: boolean;
}

/**
 * Open the catalog for one command, run it, and close the catalog.
 * Catalog errors become a one-line message and exit code 1; anything else
 * propagates to the fatal handlers.
 *
 * @param command - Commander command whose global options apply
 * @param body - Command implementation
 */
async function withCatalog(
	command: Command,
	body: (context: CommandContext) => Promise<void>
): Promise<void> {
	const globals: GlobalOptions = command.optsWithGlobals();
	const logger = new JsonlLogger(resolveMurmurHome(), { debug: globals.debug || undefined });
	const settings = loadSettings({ recordingsDir: globals.recordings, databasePath: globals.db }, logger);
	const catalog = createCatalog({
		recordingsDir: settings.recordingsDir,
		databasePath: settings.databasePath,
		logger,
	});

	try {
		await body({ catalog, settings, logger, json: globals.json === true });
	} catch (error) {
		if (!(error instanceof CatalogError)) throw error;
		logger.warn("error", "command_failed", { code: error.code, error });
		console.error(`Error: ${error.message}`);
		process.exitCode = 1;
	} finally {
		await catalog.close();
		logger.close();
	}
}

/**
 * Print a value as JSON or as text.
 *
 * @param context - Command context (decides the format)
 * @param value - Value for `--json`
 * @param text - Renders the human-readable form
 */
function emit(context: CommandContext, value: unknown, text: () => string): void {
	console.log(context.json ? JSON.stringify(value, null, 2) : text());
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

const program = new Command();

program
	.name(APP_NAME)
	.description("Browse and search local voice transcriptions.")
	.version(MURMUR_VERSION)
	.option("--json", "Print machine-readable JSON")
	.option("--recordings <dir>", "Recordings directory (overrides settings)")
	.option("--db <path>", "Catalog database path (overrides settings)")
	.option("--debug", "Write debug entries to the log");

program
	.command("sync")
	.description("Bring the search index up to date with the recordings directory")
	.option("-f, --force", "Rebuild even when the index looks current")
	.option("--background", "Start the sync and wait at most --wait milliseconds")
	.option("--wait <ms>", "Wait bound for --background", parseInteger)
	.action(async (opts: { force?: boolean; background?: boolean; wait?: number }, command: Command) => {
		await withCatalog(command, async (context) => {
			const { sync } = context.catalog;

			if (opts.background) {
				sync.startBackgroundSync();
				const ready = await sync.waitForSync(opts.wait ?? context.settings.syncWaitTimeoutMs);
				const status = sync.getStatus();
				emit(context, { ready, status }, () =>
					ready ? "Sync complete." : `Sync not complete (${status.state}).`
				);
				if (!ready && status.state === "failed") process.exitCode = 1;
				return;
			}

			const outcome = await sync.ensureSync(opts.force === true);
			const status = sync.getStatus();
			emit(context, { outcome, status }, () => {
				if (outcome === "skipped") return "Index already up to date.";
				const result = status.lastResult;
				return result
					? `Indexed ${result.indexed} of ${result.conversations} conversations (${result.recordings} recordings) in ${result.durationMs} ms.`
					: "Sync complete.";
			});
		});
	});

program
	.command("status")
	.description("Show index, cache and sync state")
	.action(async (_opts: unknown, command: Command) => {
		await withCatalog(command, async (context) => {
			const { sync, index, cache, store } = context.catalog;
			const counts = {
				conversations: index.getCount(),
				versions: index.getVersionCount(),
				cached: cache.count(),
				directories: await store.countRecordingDirectories(),
			};
			const status = sync.getStatus();
			emit(context, { ...counts, sync: status }, () => formatStatus(status, counts));
		});
	});

program
	.command("list")
	.description("List conversations (latest version of each), newest first")
	.option("--page <n>", "Page number", parseInteger, 1)
	.option("--page-size <n>", "Conversations per page", parseInteger)
	.option("--from <time>", "Only recordings at or after (Unix seconds or ISO date)", parseTimeBound)
	.option("--to <time>", "Only recordings at or before (Unix seconds or ISO date)", parseTimeBound)
	.action(async (opts: PageOptions, command: Command) => {
		await withCatalog(command, async (context) => {
			await context.catalog.sync.ensureSync();
			const pageSize = opts.pageSize ?? context.settings.pageSize;
			const page = context.catalog.service.listPage({
				page: opts.page,
				pageSize,
				from: opts.from,
				to: opts.to,
			});
			emit(context, page, () => formatListPage(page, opts.page, pageSize));
		});
	});

program
	.command("conversations")
	.description("List every conversation from a fresh scan of the recordings directory")
	.action(async (_opts: unknown, command: Command) => {
		await withCatalog(command, async (context) => {
			const summaries = await context.catalog.service.listConversationSummaries();
			emit(context, summaries, () => formatSummaries(summaries));
		});
	});

program
	.command("show")
	.description("Show every version of a conversation")
	.argument("<id>", "Conversation id, recording id, or directory timestamp")
	.action(async (id: string, _opts: unknown, command: Command) => {
		await withCatalog(command, async (context) => {
			const conversation = await context.catalog.service.getConversationOrThrow(id);
			emit(context, conversation, () => formatConversation(conversation));
		});
	});

program
	.command("search")
	.description("Full-text search over titles and raw transcriptions")
	.argument("<query...>", "Search words")
	.option("--page <n>", "Page number", parseInteger, 1)
	.option("--page-size <n>", "Results per page", parseInteger)
	.option("--from <time>", "Only recordings at or after (Unix seconds or ISO date)", parseTimeBound)
	.option("--to <time>", "Only recordings at or before (Unix seconds or ISO date)", parseTimeBound)
	.option("--scan", "Substring search over a fresh scan instead of the index")
	.action(async (words: string[], opts: PageOptions & { scan?: boolean }, command: Command) => {
		await withCatalog(command, async (context) => {
			if (opts.scan) {
				const results = await context.catalog.service.searchAllConversations(words.join(" "));
				emit(context, results, () => formatScanResults(results));
				return;
			}

			await context.catalog.sync.ensureSync();
			const pageSize = opts.pageSize ?? context.settings.pageSize;
			const result = context.catalog.service.search({
				query: words.join(" "),
				page: opts.page,
				pageSize,
				from: opts.from,
				to: opts.to,
			});
			emit(context, result, () =>
				formatSearchPage(result, opts.page, pageSize, process.stdout.isTTY === true)
			);
		});
	});

program
	.command("audio")
	.description("Print the audio file of one version")
	.argument("<conversationId>", "Conversation id")
	.argument("<versionId>", "Version id (directory timestamp)")
	.action(async (conversationId: string, versionId: string, _opts: unknown, command: Command) => {
		await withCatalog(command, async (context) => {
			const file = await context.catalog.service.getAudioFile(conversationId, versionId);
			emit(context, file, () => `${file.path}\n${file.mimeType}, ${file.size} bytes`);
		});
	});

program
	.command("home")
	.description("Print the murmur home directory")
	.action(() => {
		console.log(resolveMurmurHome());
	});

await program.parseAsync();
