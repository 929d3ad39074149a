import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import type { FingerprintAlgorithm } from "../types/config.js";

const READ_CHUNK_BYTES = 1024 * 1024;

/** Hash a stream chunk by chunk; the stream is fully consumed. */
export async function fingerprintStream(stream: Readable, algorithm: FingerprintAlgorithm): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/** Compute the hex digest of a file without loading it into memory. */
export function fingerprintFile(filePath: string, algorithm: FingerprintAlgorithm): Promise<string> {
  return fingerprintStream(createReadStream(filePath, { highWaterMark: READ_CHUNK_BYTES }), algorithm);
}

/** Compute the hex digest of a string/buffer. */
export function fingerprintContent(content: string | Buffer, algorithm: FingerprintAlgorithm): string {
  return createHash(algorithm).update(content).digest("hex");
}
