import { ArchiveError } from "../core/errors.js";
import type { StorageClass } from "../types/config.js";
import type { Manifest } from "../types/manifest.js";

export type BackendKind = "cold_storage" | "remote_archive";

export type ColdStorageDescriptor = {
  kind: "cold_storage";
  bucket: string;
  region: string;
  storageClass: StorageClass;
  /** Replace an object that already exists under the same key. */
  overwrite?: boolean;
};

export type RemoteArchiveDescriptor = {
  kind: "remote_archive";
  /** Transfer-agent endpoint (collection) id. */
  endpoint: string;
  /** Base directory on the endpoint. */
  path: string;
  overwrite?: boolean;
};

export type BackendDescriptor = ColdStorageDescriptor | RemoteArchiveDescriptor;

/** Where a bundle lives remotely: bucket + key, or endpoint directory + file name. */
export type RemoteLocator = {
  kind: BackendKind;
  container: string;
  key: string;
};

/** Storage tier as reported by a backend. */
export type StorageTier = StorageClass | "REMOTE_ARCHIVE" | (string & {});

export type TierClass = "instant" | "archival" | "unsupported";

const INSTANT_TIERS: readonly string[] = ["STANDARD", "STANDARD_IA", "GLACIER_IR"];
const ARCHIVAL_TIERS: readonly string[] = ["GLACIER", "DEEP_ARCHIVE"];

export function classifyTier(tier: StorageTier): TierClass {
  if (INSTANT_TIERS.includes(tier)) return "instant";
  if (ARCHIVAL_TIERS.includes(tier)) return "archival";
  return "unsupported";
}

export type RestoreStatus =
  | { state: "none" }
  | { state: "ongoing"; raw: string }
  | { state: "completed"; raw: string; expiry: string | null };

/**
 * Parse an object-storage restore header, e.g.
 * `ongoing-request="false", expiry-date="Fri, 23 Dec 2022 00:00:00 GMT"`.
 */
export function parseRestoreStatus(header: string | null | undefined): RestoreStatus {
  if (!header) return { state: "none" };
  const ongoing = /ongoing-request="(true|false)"/.exec(header);
  if (!ongoing) return { state: "none" };
  if (ongoing[1] === "true") return { state: "ongoing", raw: header };
  const expiry = /expiry-date="([^"]+)"/.exec(header);
  return { state: "completed", raw: header, expiry: expiry ? expiry[1] : null };
}

export type ProgressFn = (transferred: number, total: number) => void;

/**
 * Moves bundles to and from one kind of remote location.
 * Implementations reject descriptors and locators of another kind.
 */
export interface TransferBackend {
  readonly kind: BackendKind;
  upload(localBundlePath: string, descriptor: BackendDescriptor, onProgress?: ProgressFn): Promise<RemoteLocator>;
  locatorExists(descriptor: BackendDescriptor, name: string): Promise<boolean>;
  tierOf(locator: RemoteLocator): Promise<StorageTier>;
  /** Null when the object does not exist. */
  restoreStatus(locator: RemoteLocator): Promise<RestoreStatus | null>;
  requestRestore(locator: RemoteLocator): Promise<void>;
  download(locator: RemoteLocator, localPath: string): Promise<void>;
}

/** Rebuild the remote locator recorded in a manifest. Dry-run manifests have none. */
export function locatorFor(manifest: Manifest): RemoteLocator | null {
  if (manifest.location === "dry_run") return null;
  return { kind: manifest.location, container: manifest.archivePath, key: manifest.filename };
}

export function describeLocator(locator: RemoteLocator): string {
  return locator.kind === "cold_storage"
    ? `s3://${locator.container}/${locator.key}`
    : `${locator.container.replace(/\/+$/, "")}/${locator.key}`;
}

export function wrongKind(expected: BackendKind, got: BackendKind): ArchiveError {
  return new ArchiveError("TransferFailed", `Backend ${expected} cannot handle a ${got} location`, { subject: got });
}
