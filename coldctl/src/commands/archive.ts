import type { BackendDescriptor } from "../backend/backend.js";
import { runArchive, type ArchiveOutcome } from "../core/archive-pipeline.js";
import { ArchiveError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { StorageClass } from "../types/config.js";
import { openContext, type BackendOverrides, type CommandContext } from "./context.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export const STORAGE_CLASSES: readonly StorageClass[] = ["STANDARD", "STANDARD_IA", "GLACIER_IR", "GLACIER", "DEEP_ARCHIVE"];

export type ArchiveTarget = "cold_storage" | "remote_archive" | "dry_run";

export type ArchiveCommandOpts = {
  paths: string[];
  target: ArchiveTarget;
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  bucket?: string;
  region?: string;
  storageClass?: string;
  endpoint?: string;
  archivePath?: string;
  /** Each path is an existing bundle. */
  bundle?: boolean;
  force?: boolean;
  overwrite?: boolean;
  keep?: boolean;
  keepArtifacts?: boolean;
  indexPath?: string;
  logger?: Logger;
  backends?: BackendOverrides;
};

export type ArchiveCommandResult =
  | { ok: true; archives: ArchiveOutcome[] }
  | { ok: false; error: string; code: string; exitCode: ExitCode; archives: ArchiveOutcome[] };

function isStorageClass(value: string): value is StorageClass {
  return STORAGE_CLASSES.some((c) => c === value);
}

/**
 * Archive each path in turn. Stops at the first failure; archives that
 * completed before it are reported alongside the error.
 */
export async function archive(opts: ArchiveCommandOpts): Promise<ArchiveCommandResult> {
  const logger = opts.logger ?? silentLogger;
  const archives: ArchiveOutcome[] = [];

  if (opts.paths.length === 0) {
    return { ok: false, error: "No paths given", code: "INVALID_ARGS", exitCode: EXIT.INVALID_ARGS, archives };
  }
  if (opts.storageClass !== undefined && !isStorageClass(opts.storageClass)) {
    return {
      ok: false,
      error: `Unknown storage class ${opts.storageClass} (expected one of ${STORAGE_CLASSES.join(", ")})`,
      code: "INVALID_ARGS",
      exitCode: EXIT.INVALID_ARGS,
      archives,
    };
  }

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext({
      configDir: opts.configDir,
      envName: opts.envName,
      env: opts.env,
      indexPath: opts.indexPath,
      coldStorage: opts.region ? { region: opts.region } : undefined,
      backends: opts.backends,
      logger,
    });
    const { config } = ctx;
    let target: BackendDescriptor | null = null;
    if (opts.target === "cold_storage") {
      target = {
        kind: "cold_storage",
        bucket: opts.bucket ?? config.cold_storage.bucket,
        region: config.cold_storage.region,
        storageClass: opts.storageClass !== undefined && isStorageClass(opts.storageClass) ? opts.storageClass : config.cold_storage.storage_class,
      };
    } else if (opts.target === "remote_archive") {
      target = {
        kind: "remote_archive",
        endpoint: opts.endpoint ?? config.remote_archive.endpoint,
        path: opts.archivePath ?? config.remote_archive.path,
      };
      if (!target.endpoint) {
        throw new ArchiveError("InvalidConfig", "No remote archive endpoint configured (remote_archive.endpoint)");
      }
    }

    for (const p of opts.paths) {
      const outcome = await runArchive(
        {
          path: p,
          target,
          existingBundle: opts.bundle,
          force: opts.force,
          overwrite: opts.overwrite,
          keep: opts.keep,
          keepArtifacts: opts.keepArtifacts,
        },
        { config, store: ctx.store, resolveBackend: ctx.resolveBackend, logger },
      );
      archives.push(outcome);
    }
    return { ok: true, archives };
  } catch (e: unknown) {
    return fail(e, archives);
  } finally {
    ctx?.close();
  }
}

function fail(e: unknown, archives: ArchiveOutcome[]): ArchiveCommandResult {
  return {
    ok: false,
    error: errorMessage(e),
    code: e instanceof ArchiveError ? e.code : "ERROR",
    exitCode: exitCodeFor(e),
    archives,
  };
}
