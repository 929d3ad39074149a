import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import { isArtifactName } from "../core/archive-id.js";
import { mapWithConcurrency } from "../core/concurrency.js";
import { ArchiveError } from "../core/errors.js";
import { fingerprintFile } from "../integrity/fingerprint.js";
import type { FingerprintAlgorithm } from "../types/config.js";
import type { FileEntry } from "../types/manifest.js";

export type EnumerateOptions = {
  /** Artifact prefix; bundles, sidecars and the lock file with this prefix are skipped. */
  artifactPrefix: string;
  algorithm: FingerprintAlgorithm;
  concurrency: number;
  /** Extra minimatch globs matched against the relative path. */
  exclude?: string[];
};

export type Enumeration = {
  /** Directory the entry paths are relative to; the bundle is written here. */
  root: string;
  files: FileEntry[];
};

/**
 * Enumerate and fingerprint the files under `inputPath`.
 *
 * A single file yields one entry relative to its parent directory. A directory is
 * walked in name order at every level, skipping hidden entries and this tool's own
 * artifacts, so the same tree always produces the same list.
 */
export async function enumerateFiles(inputPath: string, opts: EnumerateOptions): Promise<Enumeration> {
  const absolute = path.resolve(inputPath);
  const stat = await fs.stat(absolute).catch(() => null);

  if (stat?.isFile()) {
    const root = path.dirname(absolute);
    const name = path.basename(absolute);
    const fingerprint = await fingerprintFile(absolute, opts.algorithm);
    return { root, files: [{ path: name, size: stat.size, fingerprint }] };
  }

  if (!stat?.isDirectory()) {
    throw new ArchiveError("InvalidInputPath", `'${absolute}' is not a valid file or directory path`, {
      subject: absolute,
    });
  }

  const relPaths: string[] = [];
  await walk(absolute, "", opts, relPaths);

  if (relPaths.length === 0) {
    throw new ArchiveError("EmptyFileSet", `No files found in ${absolute}`, { subject: absolute });
  }

  const files = await mapWithConcurrency(relPaths, opts.concurrency, async (rel) => {
    const full = path.join(absolute, ...rel.split("/"));
    const [s, fingerprint] = await Promise.all([fs.stat(full), fingerprintFile(full, opts.algorithm)]);
    return { path: rel, size: s.size, fingerprint };
  });

  return { root: absolute, files };
}

async function walk(root: string, rel: string, opts: EnumerateOptions, out: string[]): Promise<void> {
  const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const childRel = rel ? `${rel}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      await walk(root, childRel, opts, out);
    } else if (entry.isFile()) {
      if (isArtifactName(opts.artifactPrefix, entry.name)) continue;
      if (isExcluded(childRel, opts.exclude)) continue;
      out.push(childRel);
    }
  }
}

function isExcluded(relPath: string, patterns: string[] | undefined): boolean {
  return (patterns ?? []).some((p) => minimatch(relPath, p, { dot: true, matchBase: true }));
}

/** Sum of entry sizes in bytes. */
export function totalSize(files: readonly FileEntry[]): number {
  return files.reduce((sum, f) => sum + f.size, 0);
}
