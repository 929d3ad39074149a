/** Configuration types: layered config system (base.yaml ← env.yaml ← COLDCTL_* env). */
export type FingerprintAlgorithm = "md5" | "sha256";

/** "set" compares fingerprint sets; "path" compares the path → fingerprint mapping. */
export type IntegrityMode = "set" | "path";

export type StorageClass = "STANDARD" | "STANDARD_IA" | "GLACIER_IR" | "GLACIER" | "DEEP_ARCHIVE";

export type RetrievalTier = "Bulk" | "Standard" | "Expedited";

export type EnumerationConfig = {
  concurrency: number;
  exclude: string[];
};

export type BundleConfig = {
  compression_level: number;
};

export type ColdStorageConfig = {
  bucket: string;
  region: string;
  storage_class: StorageClass;
  multipart_threshold_mb: number;
  multipart_chunk_mb: number;
  max_concurrency: number;
};

export type RemoteArchiveConfig = {
  endpoint: string;
  path: string;
};

export type RestoreConfig = {
  poll_interval_seconds: number;
  timeout_seconds: number;
  days: number;
  retrieval_tier: RetrievalTier;
};

export type IndexConfig = {
  /** SQLite file; empty disables index mirroring. */
  path: string;
  table: string;
};

export type ColdctlConfig = {
  schema_version: string;
  /** Prefix of bundle, sidecar and lock file names. */
  archive_name: string;
  owner?: string;
  size_limit_bytes: number;
  fingerprint_algorithm: FingerprintAlgorithm;
  integrity_mode: IntegrityMode;
  enumeration: EnumerationConfig;
  bundle: BundleConfig;
  cold_storage: ColdStorageConfig;
  remote_archive: RemoteArchiveConfig;
  restore: RestoreConfig;
  index: IndexConfig;
};
