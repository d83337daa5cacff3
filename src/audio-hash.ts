import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** Read size for hashing; large recordings never sit in memory whole. */
export const HASH_CHUNK_SIZE = 64 * 1024;

/**
 * SHA-256 of a file's full byte stream, as lowercase hex.
 *
 * @param filePath - Audio file to hash
 * @returns Hex digest
 * @throws {Error} When the file cannot be opened or read
 */
export async function hashAudioFile(filePath: string): Promise<string> {
	const hash = createHash("sha256");
	const stream = createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });
	for await (const chunk of stream) {
		hash.update(chunk);
	}
	return hash.digest("hex");
}
