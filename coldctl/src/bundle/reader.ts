import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { Open } from "unzipper";
import { ArchiveError } from "../core/errors.js";
import { fingerprintStream } from "../integrity/fingerprint.js";
import type { FingerprintAlgorithm } from "../types/config.js";
import type { FileEntry } from "../types/manifest.js";

/**
 * Read every file member of a bundle and fingerprint it.
 * Members are streamed one at a time in central-directory order.
 */
export async function readBundleEntries(bundlePath: string, algorithm: FingerprintAlgorithm): Promise<FileEntry[]> {
  const directory = await Open.file(bundlePath);
  const entries: FileEntry[] = [];

  for (const member of directory.files) {
    if (member.type !== "File") continue;
    const fingerprint = await fingerprintStream(member.stream(), algorithm);
    entries.push({ path: member.path, size: member.uncompressedSize, fingerprint });
  }

  return entries;
}

/** List member names without reading their data. */
export async function listBundleMembers(bundlePath: string): Promise<string[]> {
  const directory = await Open.file(bundlePath);
  return directory.files.filter((f) => f.type === "File").map((f) => f.path);
}

/**
 * Unpack a bundle into `targetDir`, creating parent directories as needed.
 * Returns the relative paths written.
 */
export async function extractBundle(bundlePath: string, targetDir: string): Promise<string[]> {
  const root = path.resolve(targetDir);
  const directory = await Open.file(bundlePath);
  const written: string[] = [];

  for (const member of directory.files) {
    if (member.type !== "File") continue;
    const dest = path.resolve(root, member.path);
    const rel = path.relative(root, dest);
    if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new ArchiveError("InvalidInputPath", `Bundle member escapes the restore directory: ${member.path}`, {
        subject: bundlePath,
      });
    }

    await mkdir(path.dirname(dest), { recursive: true });
    await pipeline(member.stream(), createWriteStream(dest));
    written.push(member.path);
  }

  return written;
}
