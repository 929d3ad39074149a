import type { FingerprintAlgorithm } from "./config.js";

/** One archived file. Identity is (path, fingerprint). */
export type FileEntry = {
  /** Path relative to the archived directory, "/"-separated. */
  path: string;
  size: number;
  fingerprint: string;
};

export type ManifestLocation = "cold_storage" | "remote_archive" | "dry_run";

export const MANIFEST_SCHEMA_VERSION = "1.0.0";

/**
 * Archive manifest: the durable record of one archive operation.
 * Persisted as a sidecar next to the archived content and mirrored into the index.
 */
export type Manifest = {
  schemaVersion: string;
  id: string;
  timestamp: string;
  location: ManifestLocation;
  filename: string;
  localPath: string;
  archivePath: string;
  files: FileEntry[];
  bundleFingerprint: string;
  fingerprintAlgorithm?: FingerprintAlgorithm;
  owner: string;
};
