import { createHash } from "node:crypto";
import { createWriteStream } from "node:fs";
import { rm } from "node:fs/promises";
import path from "node:path";
import archiver from "archiver";
import { ArchiveError } from "../core/errors.js";
import type { FingerprintAlgorithm } from "../types/config.js";
import type { FileEntry } from "../types/manifest.js";

export type BuildOptions = {
  /** zlib level 0-9; 0 stores entries uncompressed. */
  compressionLevel: number;
  algorithm: FingerprintAlgorithm;
};

export type BuiltBundle = {
  path: string;
  /** Fingerprint of the bytes as they were written. */
  fingerprint: string;
};

export type BundleBuilder = (
  root: string,
  files: readonly FileEntry[],
  bundlePath: string,
  opts: BuildOptions,
) => Promise<BuiltBundle>;

/**
 * Reject a file set whose aggregate size exceeds `limitBytes`.
 * Runs before anything is written, so a rejected request leaves no bundle behind.
 */
export function checkSizeLimit(files: readonly FileEntry[], limitBytes: number, subject: string): void {
  const total = files.reduce((sum, f) => sum + f.size, 0);
  if (total > limitBytes) {
    throw new ArchiveError(
      "SizeLimitExceeded",
      `Total size of files in ${subject} (${formatBytes(total)}) exceeds the limit of ${formatBytes(limitBytes)}`,
      { subject },
    );
  }
}

/**
 * Stream the enumerated files into a single zip bundle.
 * Entries are named by their relative path and added one at a time from lazy
 * read streams; no file is buffered whole. The output is fingerprinted on its
 * way to disk. A failed build removes the partial bundle.
 */
export const buildBundle: BundleBuilder = async (root, files, bundlePath, opts) => {
  const hash = createHash(opts.algorithm);
  try {
    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(bundlePath);
      const archive = archiver("zip", { zlib: { level: opts.compressionLevel } });

      const fail = (e: unknown): void => {
        archive.abort();
        output.destroy();
        reject(e);
      };

      output.on("close", () => resolve());
      output.on("error", fail);
      archive.on("error", fail);
      // ENOENT and friends arrive as warnings; a missing file is fatal here.
      archive.on("warning", fail);

      archive.pipe(output);
      archive.on("data", (chunk: Buffer) => hash.update(chunk));
      for (const file of files) {
        archive.file(path.join(root, ...file.path.split("/")), { name: file.path });
      }
      archive.finalize().catch(fail);
    });
  } catch (e: unknown) {
    await rm(bundlePath, { force: true });
    throw e;
  }
  return { path: bundlePath, fingerprint: hash.digest("hex") };
};

export function formatBytes(size: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = size;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}
