import type { FingerprintAlgorithm } from "../types/config.js";
import { MANIFEST_SCHEMA_VERSION, type FileEntry, type Manifest, type ManifestLocation } from "../types/manifest.js";

export const DRY_RUN_ARCHIVE_PATH = "(dry run)";

export type ManifestBuildInput = {
  id: string;
  location: ManifestLocation;
  filename: string;
  localPath: string;
  archivePath: string;
  files: readonly FileEntry[];
  bundleFingerprint: string;
  fingerprintAlgorithm: FingerprintAlgorithm;
  owner: string;
  timestamp?: Date;
};

/**
 * Build a manifest from the given inputs.
 * The file list is copied so later changes to the caller's array cannot leak in.
 */
export function buildManifest(input: ManifestBuildInput): Manifest {
  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    id: input.id,
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    location: input.location,
    filename: input.filename,
    localPath: input.localPath,
    archivePath: input.location === "dry_run" ? DRY_RUN_ARCHIVE_PATH : input.archivePath,
    files: input.files.map((f) => ({ path: f.path, size: f.size, fingerprint: f.fingerprint })),
    bundleFingerprint: input.bundleFingerprint,
    fingerprintAlgorithm: input.fingerprintAlgorithm,
    owner: input.owner,
  };
}
