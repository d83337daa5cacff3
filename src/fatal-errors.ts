/**
 * Unconditional fatal error handlers for uncaught exceptions and
 * unhandled promise rejections. Registered at CLI startup, before the
 * catalog opens, so a crash is always visible whatever the debug mode.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { resolveMurmurHome } from "./config.js";

/** Guard against recursive or duplicate fatal error handling. */
let handled = false;

/** Registration happens once per process. */
let registeredCrashLog: string | undefined;

/**
 * @param home - murmur home directory
 * @returns Path of the persistent crash log
 */
export function crashLogPath(home: string = resolveMurmurHome()): string {
	return join(home, "crash.log");
}

/**
 * Format one crash log entry.
 *
 * @param type - Error classification (e.g. "Uncaught exception")
 * @param error - The error that caused the crash
 * @param now - Entry time
 * @returns Entry text, ending with a separator line
 */
export function formatCrashEntry(type: string, error: Error, now: Date = new Date()): string {
	return [
		`[${now.toISOString()}] ${type}`,
		`Message: ${error.message}`,
		`Stack:\n${error.stack ?? "(no stack trace)"}`,
		"---\n",
	].join("\n");
}

/**
 * Append a timestamped crash entry to the persistent crash log.
 *
 * @param logPath - Crash log path
 * @param type - Error classification
 * @param error - The error that caused the crash
 */
function writeCrashLog(logPath: string, type: string, error: Error): void {
	try {
		mkdirSync(dirname(logPath), { recursive: true });
		appendFileSync(logPath, formatCrashEntry(type, error));
	} catch (writeError) {
		const reason = writeError instanceof Error ? writeError.message : String(writeError);
		process.stderr.write(`Could not write crash log ${logPath}: ${reason}\n`);
	}
}

/**
 * Build the fatal error banner shown on stderr.
 *
 * @param type - Human-readable error type
 * @param error - The error that caused the crash
 * @param logPath - Crash log path, shown for follow-up
 * @returns Banner text
 */
export function formatFatalBanner(type: string, error: Error, logPath: string): string {
	const message = error.message.length > 500 ? `${error.message.slice(0, 500)}…` : error.message;

	// First stack frame (file:line) for quick context
	const stackLine = error.stack
		?.split("\n")
		.find((l) => l.trimStart().startsWith("at "))
		?.trim();

	const lines = [
		"",
		`\x1b[41;97m FATAL \x1b[0m \x1b[1;31m${type}\x1b[0m`,
		"",
		`  ${message}`,
		...(stackLine ? [`  \x1b[2m${stackLine}\x1b[0m`] : []),
		"",
		`  \x1b[2mCrash log: ${logPath}\x1b[0m`,
		`  \x1b[2mSet MURMUR_DEBUG=1 for detailed logs\x1b[0m`,
		"",
	];
	return lines.join("\n");
}

/**
 * Handle a fatal error: write crash log, display banner, schedule exit.
 *
 * Exit runs on `process.nextTick` so other registered listeners finish first.
 */
function handleFatal(logPath: string, type: string, error: Error): void {
	if (handled) return;
	handled = true;

	writeCrashLog(logPath, type, error);
	process.stderr.write(formatFatalBanner(type, error, logPath));
	process.nextTick(() => process.exit(1));
}

/**
 * Register process-level handlers for uncaught exceptions and unhandled
 * promise rejections. Only the first call registers.
 *
 * @param home - murmur home directory for the crash log
 * @returns The crash log path
 */
export function registerFatalErrorHandlers(home: string = resolveMurmurHome()): string {
	if (registeredCrashLog) return registeredCrashLog;
	const logPath = crashLogPath(home);
	registeredCrashLog = logPath;

	process.on("uncaughtException", (err: Error) => {
		handleFatal(logPath, "Uncaught exception", err);
	});

	process.on("unhandledRejection", (reason: unknown) => {
		const err = reason instanceof Error ? reason : new Error(String(reason));
		handleFatal(logPath, "Unhandled promise rejection", err);
	});

	return logPath;
}
