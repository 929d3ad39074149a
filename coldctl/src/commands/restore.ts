import path from "node:path";
import { RestoreOrchestrator, type TransitionListener } from "../core/restore-orchestrator.js";
import type { RestorePhase } from "../core/state-machine.js";
import { ArchiveError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { Manifest } from "../types/manifest.js";
import { openContext, type BackendOverrides, type CommandContext } from "./context.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type RestoreCommandOpts = {
  dir: string;
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  deleteBundle?: boolean;
  /** Overrides restore.timeout_seconds. */
  timeoutSeconds?: number;
  /** Overrides restore.poll_interval_seconds. */
  pollIntervalSeconds?: number;
  signal?: AbortSignal;
  logger?: Logger;
  backends?: BackendOverrides;
};

export type RestoreCommandResult =
  | { ok: true; manifest: Manifest; trace: RestorePhase[]; files: string[] }
  | { ok: false; error: string; code: string; exitCode: ExitCode; trace: RestorePhase[] };

/** Restore the newest archive recorded in `dir` back into `dir`. */
export async function restore(opts: RestoreCommandOpts): Promise<RestoreCommandResult> {
  const logger = opts.logger ?? silentLogger;
  const dir = path.resolve(opts.dir);

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext({
      configDir: opts.configDir,
      envName: opts.envName,
      env: opts.env,
      backends: opts.backends,
      logger,
    });
    const { config } = ctx;
    const manifest = await ctx.store.load(dir);
    logger.info("MANIFEST_LOADED", `Restoring ${manifest.filename} (${manifest.files.length} files) from ${manifest.archivePath}`, {
      id: manifest.id,
      location: manifest.location,
    });

    const onTransition: TransitionListener = (from, to, state) =>
      logger.info("RESTORE_PHASE", `${from} -> ${to}${state.restoreStatus ? ` (${state.restoreStatus})` : ""}`, {
        id: manifest.id,
        from,
        to,
        tier: state.tier,
      });

    const orchestrator = new RestoreOrchestrator({
      resolveBackend: ctx.resolveBackend,
      pollIntervalMs: (opts.pollIntervalSeconds ?? config.restore.poll_interval_seconds) * 1000,
      timeoutMs: (opts.timeoutSeconds ?? config.restore.timeout_seconds) * 1000,
      algorithm: config.fingerprint_algorithm,
      integrityMode: config.integrity_mode,
      onTransition,
    });

    const result = await orchestrator.restore(manifest, {
      targetDir: dir,
      deleteBundle: opts.deleteBundle,
      signal: opts.signal,
    });

    if (!result.success) {
      return {
        ok: false,
        error: result.error.message,
        code: result.error.code,
        exitCode: exitCodeFor(result.error),
        trace: result.trace,
      };
    }

    logger.info("RESTORED", `${manifest.filename} restored (${result.files.length} files)`, { id: manifest.id });
    return { ok: true, manifest, trace: result.trace, files: result.files };
  } catch (e: unknown) {
    return {
      ok: false,
      error: errorMessage(e),
      code: e instanceof ArchiveError ? e.code : "ERROR",
      exitCode: exitCodeFor(e),
      trace: [],
    };
  } finally {
    ctx?.close();
  }
}
