export { runArchive, type ArchiveRequest, type ArchiveOutcome, type ArchivePipelineDeps } from "./core/archive-pipeline.js";
export {
  RestoreOrchestrator,
  type RestoreResult,
  type RestoreState,
  type RestoreOrchestratorOptions,
  type RestoreRunOptions,
} from "./core/restore-orchestrator.js";
export { nextPhase, isTerminal, RESTORE_PHASES, type RestorePhase, type RestoreEvent } from "./core/state-machine.js";
export { ArchiveError, isArchiveError, type ArchiveErrorCode, type IntegrityPhase } from "./core/errors.js";
export { generateArchiveId, artifactNames, isArtifactName } from "./core/archive-id.js";

export { enumerateFiles, type Enumeration, type EnumerateOptions } from "./enumerate/file-enumerator.js";
export { buildBundle, checkSizeLimit, type BuiltBundle, type BundleBuilder } from "./bundle/builder.js";
export { readBundleEntries, extractBundle } from "./bundle/reader.js";
export { reconcile, verifyBuild, verifyMembers, verifyTransfer } from "./integrity/verifier.js";
export { fingerprintFile, fingerprintStream } from "./integrity/fingerprint.js";

export { ManifestStore, atomicWriteJson } from "./manifest/store.js";
export { ArchiveIndex, explodeManifest, formatTsv, type IndexRow } from "./manifest/index-db.js";
export { buildManifest } from "./manifest/manifest-builder.js";

export {
  classifyTier,
  parseRestoreStatus,
  locatorFor,
  type TransferBackend,
  type BackendDescriptor,
  type RemoteLocator,
  type RestoreStatus,
  type StorageTier,
} from "./backend/backend.js";
export { ColdStorageBackend, type ObjectStorageClient, type ObjectHead } from "./backend/cold-storage.js";
export { S3ObjectStorageClient } from "./backend/s3-client.js";
export { RemoteArchiveBackend, type TransferAgent } from "./backend/remote-archive.js";
export { GlobusTransferAgent, type ExecFn } from "./backend/globus-agent.js";

export { loadConfig } from "./config/loader.js";
export { createLogger, silentLogger, type Logger, type OutputFormat } from "./log/logger.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";

export type { Manifest, FileEntry, ManifestLocation } from "./types/manifest.js";
export type { ColdctlConfig, FingerprintAlgorithm, IntegrityMode, StorageClass } from "./types/config.js";
