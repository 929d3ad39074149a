import path from "node:path";
import type { BackendKind, TransferBackend } from "../backend/backend.js";
import { ColdStorageBackend } from "../backend/cold-storage.js";
import { GlobusTransferAgent } from "../backend/globus-agent.js";
import { RemoteArchiveBackend } from "../backend/remote-archive.js";
import { S3ObjectStorageClient } from "../backend/s3-client.js";
import { loadConfig } from "../config/loader.js";
import type { Logger } from "../log/logger.js";
import { ArchiveIndex } from "../manifest/index-db.js";
import { ManifestStore } from "../manifest/store.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ColdctlConfig, ColdStorageConfig } from "../types/config.js";

export type BackendOverrides = Partial<Record<BackendKind, TransferBackend>>;

export type ContextOpts = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  schemaDir?: string;
  /** SQLite index file; overrides `index.path` from config. */
  indexPath?: string;
  coldStorage?: Partial<ColdStorageConfig>;
  /** Backends to use instead of the AWS and Globus ones. */
  backends?: BackendOverrides;
  logger?: Logger;
};

export type CommandContext = {
  config: ColdctlConfig;
  registry: SchemaRegistry;
  store: ManifestStore;
  index: ArchiveIndex | null;
  resolveBackend: (kind: BackendKind) => TransferBackend;
  close(): void;
};

/** Load config and wire the store, index and backends a command needs. */
export async function openContext(opts: ContextOpts = {}): Promise<CommandContext> {
  const loaded = await loadConfig(opts.envName, opts.configDir, opts.env);
  const config: ColdctlConfig = {
    ...loaded,
    cold_storage: { ...loaded.cold_storage, ...opts.coldStorage },
  };

  const registry = await createRegistry(opts.schemaDir);
  const indexPath = opts.indexPath ?? config.index.path;
  const index = indexPath ? await ArchiveIndex.open(path.resolve(indexPath), config.index.table) : null;
  const store = new ManifestStore(config.archive_name, registry, index, opts.logger);

  const cache = new Map<BackendKind, TransferBackend>();
  const resolveBackend = (kind: BackendKind): TransferBackend => {
    const override = opts.backends?.[kind];
    if (override) return override;
    const cached = cache.get(kind);
    if (cached) return cached;

    const backend: TransferBackend =
      kind === "cold_storage"
        ? new ColdStorageBackend(new S3ObjectStorageClient(config.cold_storage), {
            days: config.restore.days,
            tier: config.restore.retrieval_tier,
          })
        : new RemoteArchiveBackend(new GlobusTransferAgent());
    cache.set(kind, backend);
    return backend;
  };

  return {
    config,
    registry,
    store,
    index,
    resolveBackend,
    close: () => index?.close(),
  };
}
