import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { hasErrnoCode } from "./errors.js";
import type { Logger } from "./logger.js";

// ─── Identity ────────────────────────────────────────────────────────────────

export const APP_NAME = "murmur";
export const MURMUR_VERSION = "0.3.0";
export const CONFIG_DIR = ".murmur";

// ─── Paths ───────────────────────────────────────────────────────────────────

/**
 * Resolve the murmur home directory (settings, database, logs).
 *
 * @returns MURMUR_HOME when set, otherwise ~/.murmur
 */
export function resolveMurmurHome(): string {
	// Env override for CI, containers, and test isolation
	if (process.env.MURMUR_HOME) return process.env.MURMUR_HOME;
	return join(homedir(), CONFIG_DIR);
}

/** Default location the recorder app writes its timestamp directories to. */
export function getDefaultRecordingsDir(): string {
	return join(homedir(), "Documents", "superwhisper", "recordings");
}

// ─── Settings ────────────────────────────────────────────────────────────────

/** Shape of `<home>/settings.json`. Every key is optional. */
export const SettingsFileSchema = Type.Object({
	recordingsDir: Type.Optional(Type.String({ minLength: 1 })),
	databasePath: Type.Optional(Type.String({ minLength: 1 })),
	syncWaitTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })),
	pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
});

export type SettingsFile = Static<typeof SettingsFileSchema>;

/** Fully resolved runtime settings. */
export interface MurmurSettings {
	readonly home: string;
	readonly recordingsDir: string;
	readonly databasePath: string;
	readonly syncWaitTimeoutMs: number;
	readonly pageSize: number;
}

/** Explicit overrides, usually from CLI flags. */
export interface SettingsOverrides {
	readonly recordingsDir?: string;
	readonly databasePath?: string;
}

export const DEFAULT_SYNC_WAIT_TIMEOUT_MS = 30_000;
export const DEFAULT_PAGE_SIZE = 30;

/**
 * Read and validate settings.json from the home directory.
 *
 * A missing file is normal and yields `{}`. An unreadable or invalid file
 * also yields `{}`, with a warning on the logger.
 *
 * @param home - murmur home directory
 * @param logger - Receives a warning when the file is rejected
 * @returns Validated settings file contents
 */
export function readSettingsFile(home: string, logger?: Logger): SettingsFile {
	const settingsPath = join(home, "settings.json");

	let content: string;
	try {
		content = readFileSync(settingsPath, "utf-8");
	} catch (error) {
		if (hasErrnoCode(error, "ENOENT")) return {};
		logger?.warn("config", "settings_unreadable", {
			path: settingsPath,
			error: error instanceof Error ? error.message : String(error),
		});
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		logger?.warn("config", "settings_malformed", {
			path: settingsPath,
			error: error instanceof Error ? error.message : String(error),
		});
		return {};
	}

	if (!Value.Check(SettingsFileSchema, parsed)) {
		const first = Value.Errors(SettingsFileSchema, parsed).First();
		logger?.warn("config", "settings_invalid", {
			path: settingsPath,
			field: first?.path ?? "",
			error: first?.message ?? "invalid settings",
		});
		return {};
	}

	return parsed;
}

/**
 * Resolve runtime settings.
 *
 * Precedence (highest first): explicit overrides, MURMUR_RECORDINGS_DIR /
 * MURMUR_DB, settings.json, defaults.
 *
 * @param overrides - Values from CLI flags
 * @param logger - Receives settings.json warnings
 * @returns Resolved settings
 */
export function loadSettings(overrides: SettingsOverrides = {}, logger?: Logger): MurmurSettings {
	const home = resolveMurmurHome();
	const file = readSettingsFile(home, logger);

	const recordingsDir =
		overrides.recordingsDir ??
		process.env.MURMUR_RECORDINGS_DIR ??
		file.recordingsDir ??
		getDefaultRecordingsDir();

	const databasePath =
		overrides.databasePath ??
		process.env.MURMUR_DB ??
		file.databasePath ??
		join(home, "catalog.db");

	return {
		home,
		recordingsDir: expandHome(recordingsDir),
		databasePath: expandHome(databasePath),
		syncWaitTimeoutMs: file.syncWaitTimeoutMs ?? DEFAULT_SYNC_WAIT_TIMEOUT_MS,
		pageSize: file.pageSize ?? DEFAULT_PAGE_SIZE,
	};
}

/**
 * Expand a leading `~/` to the user's home directory. SQLite's `:memory:`
 * passes through untouched.
 *
 * @param path - Possibly home-relative path
 * @returns Absolute path
 */
export function expandHome(path: string): string {
	if (path === ":memory:") return path;
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return join(homedir(), path.slice(2));
	return resolve(path);
}
