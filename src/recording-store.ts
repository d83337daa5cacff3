/**
 * Recording store: reads the recorder's output tree.
 *
 * Expected layout:
 *
 *   <base>/
 *     1731462135/        one directory per recording, named by Unix timestamp
 *       output.wav
 *       meta.json
 *     1731462201/
 *       ...
 *
 * Directories whose name is not a decimal timestamp are ignored.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { hashAudioFile } from "./audio-hash.js";
import { hasErrnoCode, NotFoundError, toError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import {
	parseMetadataDocument,
	type RecordingMetadata,
	resolveCreatedAt,
} from "./recording-metadata.js";
import type { Recording } from "./types.js";

/** Audio payload names, in preference order. */
export const AUDIO_FILE_NAMES = [
	"output.wav",
	"audio.wav",
	"output.mp3",
	"audio.mp3",
	"output.m4a",
	"audio.m4a",
] as const;

/** Metadata document names, in preference order. */
export const METADATA_FILE_NAMES = ["meta.json", "metadata.json"] as const;

/**
 * Contract every recording source implements.
 * Recordings come back newest first.
 */
export interface RecordingStore {
	readonly baseDirectory: string;
	/** Load every recording, newest timestamp first. Missing base → []. */
	scan(): Promise<Recording[]>;
	/** Load one recording by its directory timestamp. */
	getByTimestamp(timestamp: number): Promise<Recording | null>;
	/**
	 * Read a recording's audio payload.
	 *
	 * @throws {NotFoundError} When the recording has no audio file
	 */
	readAudio(recording: Recording): Promise<Buffer>;
	/** Number of valid timestamp directories on disk. */
	countRecordingDirectories(): Promise<number>;
	/** Whether the base directory is present (an unmounted or moved tree is not). */
	exists(): Promise<boolean>;
}

/** Receives recording id → location mappings as recordings are loaded. */
export interface RecordingLocationSink {
	upsert(
		recordingId: string,
		internalId: string,
		directoryPath: string,
		contentHash?: string | null
	): void;
}

/** Construction options for {@link DirectoryRecordingStore}. */
export interface DirectoryRecordingStoreOptions {
	/** When present, every loaded recording with an id is written through to it. */
	readonly locationCache?: RecordingLocationSink;
	readonly logger?: Logger;
}

/** A timestamp directory found under the base directory. */
interface TimestampDirectory {
	timestamp: number;
	path: string;
}

/**
 * Parse a directory name as a non-negative decimal timestamp.
 *
 * @param name - Directory name
 * @returns The timestamp, or null for any other name
 */
export function parseTimestampDirectoryName(name: string): number | null {
	if (!/^\d+$/.test(name)) return null;
	const value = Number(name);
	return Number.isSafeInteger(value) ? value : null;
}

/**
 * Filesystem-backed recording store.
 *
 * @example
 * ```typescript
 * const store = new DirectoryRecordingStore("~/recordings", { locationCache: cache });
 * const recordings = await store.scan();
 * ```
 */
export class DirectoryRecordingStore implements RecordingStore {
	private readonly locationCache?: RecordingLocationSink;
	private readonly logger: Logger;

	/**
	 * @param baseDirectory - Directory holding the timestamp directories
	 * @param options - Optional location cache and logger
	 */
	constructor(
		readonly baseDirectory: string,
		options: DirectoryRecordingStoreOptions = {}
	) {
		this.locationCache = options.locationCache;
		this.logger = options.logger ?? silentLogger;
	}

	async scan(): Promise<Recording[]> {
		const directories = await this.listTimestampDirectories();
		const recordings: Recording[] = [];

		for (const directory of directories) {
			recordings.push(await this.loadRecording(directory.path, directory.timestamp));
		}

		recordings.sort((a, b) => b.timestamp - a.timestamp);
		this.logger.debug("scan", "scan_complete", {
			baseDirectory: this.baseDirectory,
			recordings: recordings.length,
		});
		return recordings;
	}

	async getByTimestamp(timestamp: number): Promise<Recording | null> {
		const directory = join(this.baseDirectory, String(timestamp));
		if (!(await isDirectory(directory))) return null;
		return this.loadRecording(directory, timestamp);
	}

	async readAudio(recording: Recording): Promise<Buffer> {
		if (!recording.audioFile) {
			throw new NotFoundError(`No audio file found for recording ${recording.timestamp}`);
		}
		try {
			return await readFile(recording.audioFile);
		} catch (error) {
			if (hasErrnoCode(error, "ENOENT")) {
				throw new NotFoundError(`Audio file for recording ${recording.timestamp} no longer exists`);
			}
			throw error;
		}
	}

	async countRecordingDirectories(): Promise<number> {
		return (await this.listTimestampDirectories()).length;
	}

	exists(): Promise<boolean> {
		return isDirectory(this.baseDirectory);
	}

	/**
	 * List immediate subdirectories named by a timestamp.
	 *
	 * @returns Directories in readdir order; [] when the base is missing
	 */
	private async listTimestampDirectories(): Promise<TimestampDirectory[]> {
		let entries: Dirent[];
		try {
			entries = await readdir(this.baseDirectory, { withFileTypes: true });
		} catch (error) {
			if (hasErrnoCode(error, "ENOENT") || hasErrnoCode(error, "ENOTDIR")) {
				return [];
			}
			throw error;
		}

		const directories: TimestampDirectory[] = [];
		for (const entry of entries) {
			const timestamp = parseTimestampDirectoryName(entry.name);
			if (timestamp === null) continue;

			const path = join(this.baseDirectory, entry.name);
			const isDir = entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectory(path)));
			if (isDir) directories.push({ timestamp, path });
		}
		return directories;
	}

	/**
	 * Build a recording from one timestamp directory.
	 *
	 * Unreadable or malformed metadata leaves the metadata fields empty;
	 * unreadable audio leaves the content hash empty. Neither fails the load.
	 *
	 * @param directory - Absolute directory path
	 * @param timestamp - Directory name as a number
	 * @returns The recording
	 */
	private async loadRecording(directory: string, timestamp: number): Promise<Recording> {
		const audioFile = await findFirstFile(directory, AUDIO_FILE_NAMES);
		const metadataFile = await findFirstFile(directory, METADATA_FILE_NAMES);
		const metadata = metadataFile ? await this.readMetadata(metadataFile) : null;
		const contentHash = audioFile ? await this.computeHash(audioFile) : undefined;

		const recording: Recording = {
			timestamp,
			directory,
			audioFile,
			metadataFile,
			recordingId: metadata?.recordingId,
			contentHash,
			rawTranscription: metadata?.rawTranscription,
			preprocessedTranscription: metadata?.preprocessedTranscription,
			llmTranscription: metadata?.llmTranscription,
			segments: metadata?.segments ?? [],
			duration: metadata?.duration,
			language: metadata?.language,
			modelName: metadata?.modelName,
			languageModelName: metadata?.languageModelName,
			modeName: metadata?.modeName,
			processingTime: metadata?.processingTime,
			createdAt: resolveCreatedAt(metadata?.datetime, timestamp),
		};

		if (recording.recordingId) {
			this.rememberLocation(recording.recordingId, recording);
		}

		return recording;
	}

	/**
	 * @param metadataFile - Path to the metadata document
	 * @returns Parsed metadata, or null when unreadable or malformed
	 */
	private async readMetadata(metadataFile: string): Promise<RecordingMetadata | null> {
		let content: string;
		try {
			content = await readFile(metadataFile, "utf-8");
		} catch (error) {
			this.logger.warn("scan", "metadata_unreadable", {
				path: metadataFile,
				error: toError(error).message,
			});
			return null;
		}

		const metadata = parseMetadataDocument(content);
		if (!metadata) {
			this.logger.warn("scan", "metadata_malformed", { path: metadataFile });
		}
		return metadata;
	}

	/**
	 * @param audioFile - Path to the audio payload
	 * @returns Hex digest, or undefined when the file cannot be read
	 */
	private async computeHash(audioFile: string): Promise<string | undefined> {
		try {
			return await hashAudioFile(audioFile);
		} catch (error) {
			this.logger.warn("scan", "audio_unreadable", {
				path: audioFile,
				error: toError(error).message,
			});
			return undefined;
		}
	}

	/**
	 * Write the recording's location through to the cache. A failed write
	 * only costs a later rescan, so it is logged and the load continues.
	 */
	private rememberLocation(recordingId: string, recording: Recording): void {
		if (!this.locationCache) return;
		try {
			this.locationCache.upsert(
				recordingId,
				String(recording.timestamp),
				recording.directory,
				recording.contentHash ?? null
			);
		} catch (error) {
			this.logger.error("cache", "upsert_failed", {
				recordingId,
				error: toError(error).message,
			});
		}
	}
}

/**
 * @param path - Path to check
 * @returns True when the path exists and is a directory
 */
async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Return the first candidate that exists as a regular file.
 *
 * @param directory - Directory to look in
 * @param names - Candidate file names, in preference order
 * @returns Absolute path, or undefined
 */
async function findFirstFile(
	directory: string,
	names: readonly string[]
): Promise<string | undefined> {
	for (const name of names) {
		const candidate = join(directory, name);
		if (await isFile(candidate)) return candidate;
	}
	return undefined;
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}
