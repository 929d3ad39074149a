import { readdir, rm, rmdir, stat, unlink } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { BackendDescriptor, BackendKind, TransferBackend } from "../backend/backend.js";
import { buildBundle as defaultBuilder, checkSizeLimit, formatBytes, type BundleBuilder } from "../bundle/builder.js";
import { readBundleEntries } from "../bundle/reader.js";
import { enumerateFiles, totalSize, type Enumeration } from "../enumerate/file-enumerator.js";
import { verifyBuild, verifyTransfer } from "../integrity/verifier.js";
import { silentLogger, type Logger } from "../log/logger.js";
import { buildManifest } from "../manifest/manifest-builder.js";
import type { ManifestStore } from "../manifest/store.js";
import type { ColdctlConfig } from "../types/config.js";
import type { Manifest, ManifestLocation } from "../types/manifest.js";
import { artifactNames, isBundleName, lockName, parseArtifactId } from "./archive-id.js";
import { acquireDirectoryLock } from "./concurrency.js";
import { ArchiveError } from "./errors.js";

export type ArchiveRequest = {
  path: string;
  /** Where the bundle goes; null for a dry run (bundle built and verified, nothing uploaded or recorded). */
  target: BackendDescriptor | null;
  /** `path` is a bundle this tool built earlier; archive it as is. */
  existingBundle?: boolean;
  force?: boolean;
  overwrite?: boolean;
  /** Keep the archived source files after a successful upload. */
  keep?: boolean;
  /** Keep bundles that failed verification or were built for a dry run. */
  keepArtifacts?: boolean;
};

export type ArchiveOutcome = {
  manifest: Manifest;
  /** Null for a dry run. */
  sidecarPath: string | null;
  bundlePath: string;
  removedSources: number;
};

export type ArchivePipelineDeps = {
  config: ColdctlConfig;
  store: ManifestStore;
  resolveBackend: (kind: BackendKind) => TransferBackend;
  logger?: Logger;
  buildBundle?: BundleBuilder;
  now?: () => Date;
};

type Prepared = {
  id: string;
  enumeration: Enumeration;
  bundlePath: string;
  /** Fingerprint the builder saw while writing; null for an existing bundle. */
  written: string | null;
  /** True when this run produced the bundle (and may delete it). */
  built: boolean;
};

/**
 * Archive one file or directory: identity → enumerate → size check → build →
 * verify → upload → record → clean up. Nothing is written before the size
 * check passes, and local files go only after the sidecar is on disk.
 */
export async function runArchive(request: ArchiveRequest, deps: ArchivePipelineDeps): Promise<ArchiveOutcome> {
  const { config, store } = deps;
  const logger = deps.logger ?? silentLogger;
  const prefix = config.archive_name;
  const algorithm = config.fingerprint_algorithm;

  const inputPath = path.resolve(request.path);
  const inputStat = await stat(inputPath).catch(() => null);
  if (!inputStat || (!inputStat.isFile() && !inputStat.isDirectory())) {
    throw new ArchiveError("InvalidInputPath", `'${inputPath}' is not a valid file or directory path`, {
      subject: inputPath,
    });
  }
  const dir = inputStat.isDirectory() ? inputPath : path.dirname(inputPath);

  const release = await acquireDirectoryLock(dir, lockName(prefix));
  try {
    const prepared = request.existingBundle
      ? await prepareExistingBundle(inputPath, request, deps)
      : await prepareNewBundle(inputPath, dir, request, deps, logger);
    const { id, enumeration, bundlePath } = prepared;
    const discard = async (): Promise<void> => {
      if (prepared.built && !request.keepArtifacts) await rm(bundlePath, { force: true });
    };

    let bundleFingerprint: string;
    try {
      bundleFingerprint = await verifyBuild(bundlePath, enumeration.files, {
        algorithm,
        mode: config.integrity_mode,
        written: prepared.written,
      });
    } catch (e) {
      await discard();
      throw e;
    }
    logger.info("BUNDLE_VERIFIED", `Verified ${enumeration.files.length} files in ${path.basename(bundlePath)}`, {
      bundle: bundlePath,
      fingerprint: bundleFingerprint,
    });

    const location: ManifestLocation = request.target ? request.target.kind : "dry_run";
    const owner = config.owner || os.userInfo().username;
    const manifestFor = (archivePath: string): Manifest =>
      buildManifest({
        id,
        location,
        filename: path.basename(bundlePath),
        localPath: enumeration.root,
        archivePath,
        files: enumeration.files,
        bundleFingerprint,
        fingerprintAlgorithm: algorithm,
        owner,
        timestamp: deps.now?.(),
      });

    if (!request.target) {
      await discard();
      logger.info("DRY_RUN", `Dry run complete for ${enumeration.root}; nothing uploaded`, { id });
      return { manifest: manifestFor(""), sidecarPath: null, bundlePath, removedSources: 0 };
    }

    // The bundle must still be the one that was verified.
    try {
      await verifyTransfer(bundlePath, bundleFingerprint, { algorithm, phase: "TransferTime" });
    } catch (e) {
      await discard();
      throw e;
    }

    const descriptor: BackendDescriptor = {
      ...request.target,
      overwrite: request.target.overwrite ?? request.overwrite ?? false,
    };
    const backend = deps.resolveBackend(descriptor.kind);
    const label = path.basename(bundlePath);
    const locator = await backend.upload(bundlePath, descriptor, (transferred, total) =>
      logger.progress(label, transferred, total),
    );
    logger.info("UPLOADED", `Uploaded ${label} to ${locator.container}`, { id, container: locator.container, key: locator.key });

    // Record the archive before anything local is deleted.
    const manifest = manifestFor(locator.container);
    const sidecarPath = await store.persist(manifest);
    logger.info("MANIFEST_WRITTEN", `Wrote ${sidecarPath}`, { id, sidecar: sidecarPath });

    await rm(bundlePath, { force: true });

    let removedSources = 0;
    if (!request.keep && prepared.built) {
      removedSources = await removeSources(enumeration, inputStat.isDirectory());
      logger.info("SOURCES_REMOVED", `Removed ${removedSources} archived files from ${enumeration.root}`, { id });
    }

    return { manifest, sidecarPath, bundlePath, removedSources };
  } finally {
    await release();
  }
}

async function prepareNewBundle(
  inputPath: string,
  dir: string,
  request: ArchiveRequest,
  deps: ArchivePipelineDeps,
  logger: Logger,
): Promise<Prepared> {
  const { config, store } = deps;
  const prefix = config.archive_name;

  // An earlier archive may have removed the sources, so check for one first.
  const identity = await store.create(dir, { force: request.force, overwrite: request.overwrite });

  const enumeration = await enumerateFiles(inputPath, {
    artifactPrefix: prefix,
    algorithm: config.fingerprint_algorithm,
    concurrency: config.enumeration.concurrency,
    exclude: config.enumeration.exclude,
  });

  checkSizeLimit(enumeration.files, config.size_limit_bytes, enumeration.root);

  const bundlePath = path.join(enumeration.root, artifactNames(prefix, identity.id).bundle);

  logger.info(
    "ARCHIVING",
    `Archiving ${enumeration.files.length} files in ${enumeration.root} (${formatBytes(totalSize(enumeration.files))})`,
    { id: identity.id, files: enumeration.files.length, bytes: totalSize(enumeration.files) },
  );

  const build = deps.buildBundle ?? defaultBuilder;
  const built = await build(enumeration.root, enumeration.files, bundlePath, {
    compressionLevel: config.bundle.compression_level,
    algorithm: config.fingerprint_algorithm,
  });
  logger.info("BUNDLE_BUILT", `Built ${path.basename(bundlePath)}`, { bundle: bundlePath });

  return { id: identity.id, enumeration, bundlePath, written: built.fingerprint, built: true };
}

async function prepareExistingBundle(inputPath: string, request: ArchiveRequest, deps: ArchivePipelineDeps): Promise<Prepared> {
  const prefix = deps.config.archive_name;
  const name = path.basename(inputPath);
  const id = parseArtifactId(prefix, name);
  if (!id || !isBundleName(prefix, name)) {
    throw new ArchiveError("InvalidInputPath", `'${inputPath}' is not a ${prefix} bundle`, { subject: inputPath });
  }

  const root = path.dirname(inputPath);
  const sidecar = artifactNames(prefix, id).sidecar;
  const recorded = (await deps.store.listSidecars(root)).some((p) => path.basename(p) === sidecar);
  if (recorded && !request.force && !request.overwrite) {
    throw new ArchiveError("DuplicateArchiveExists", `Bundle ${name} is already recorded in ${path.join(root, sidecar)}`, {
      subject: inputPath,
    });
  }

  const files = await readBundleEntries(inputPath, deps.config.fingerprint_algorithm);
  if (files.length === 0) {
    throw new ArchiveError("EmptyFileSet", `Bundle ${inputPath} has no files`, { subject: inputPath });
  }
  checkSizeLimit(files, deps.config.size_limit_bytes, inputPath);

  return { id, enumeration: { root, files }, bundlePath: inputPath, written: null, built: false };
}

/** Delete archived source files, then prune directories left empty (hidden ones are left alone). */
async function removeSources(enumeration: Enumeration, prune: boolean): Promise<number> {
  let removed = 0;
  for (const file of enumeration.files) {
    const full = path.join(enumeration.root, ...file.path.split("/"));
    const s = await stat(full).catch(() => null);
    if (s?.isFile()) {
      await unlink(full);
      removed++;
    }
  }
  if (prune) await pruneEmptyDirs(enumeration.root, true);
  return removed;
}

async function pruneEmptyDirs(dir: string, isRoot: boolean): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true });
  let empty = true;
  for (const entry of entries) {
    if (entry.isDirectory() && !entry.name.startsWith(".")) {
      if (!(await pruneEmptyDirs(path.join(dir, entry.name), false))) empty = false;
    } else {
      empty = false;
    }
  }
  if (empty && !isRoot) {
    await rmdir(dir);
  }
  return empty;
}
