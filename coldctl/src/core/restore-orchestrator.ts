import { rm } from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import {
  classifyTier,
  describeLocator,
  locatorFor,
  type BackendKind,
  type RemoteLocator,
  type RestoreStatus,
  type StorageTier,
  type TransferBackend,
} from "../backend/backend.js";
import { extractBundle } from "../bundle/reader.js";
import { verifyMembers, verifyTransfer } from "../integrity/verifier.js";
import type { FingerprintAlgorithm, IntegrityMode } from "../types/config.js";
import type { Manifest } from "../types/manifest.js";
import { ArchiveError, errorMessage } from "./errors.js";
import { isTerminal, nextPhase, type RestoreEvent, type RestorePhase } from "./state-machine.js";

/** In-memory state of one restore invocation; never persisted. */
export type RestoreState = {
  phase: RestorePhase;
  trace: RestorePhase[];
  tier: StorageTier | null;
  restoreStatus: string | null;
};

export type RestoreResult =
  | {
      success: true;
      final_phase: "extracted";
      trace: RestorePhase[];
      locator: RemoteLocator;
      bundlePath: string;
      files: string[];
    }
  | {
      success: false;
      final_phase: RestorePhase;
      trace: RestorePhase[];
      error: ArchiveError;
    };

export type TransitionListener = (from: RestorePhase, to: RestorePhase, state: RestoreState) => void;

export type RestoreOrchestratorOptions = {
  resolveBackend: (kind: BackendKind) => TransferBackend;
  pollIntervalMs: number;
  /** Deadline for the whole restore, polling included. */
  timeoutMs: number;
  /** Used when the manifest does not name its algorithm. */
  algorithm: FingerprintAlgorithm;
  integrityMode: IntegrityMode;
  onTransition?: TransitionListener;
};

export type RestoreRunOptions = {
  /** Directory the bundle is downloaded to and extracted into. */
  targetDir: string;
  /** Remove the downloaded bundle after a successful extraction. */
  deleteBundle?: boolean;
  signal?: AbortSignal;
};

/**
 * RestoreOrchestrator: drives an archived bundle back to verified, extracted
 * files through the restore state machine.
 *
 * Instant tiers go straight to download. Archival tiers request a restore
 * (unless one is already under way or done) and poll until the restored copy
 * is readable or the deadline passes.
 */
export class RestoreOrchestrator {
  constructor(private readonly opts: RestoreOrchestratorOptions) {}

  async restore(manifest: Manifest, run: RestoreRunOptions): Promise<RestoreResult> {
    const state: RestoreState = { phase: "idle", trace: ["idle"], tier: null, restoreStatus: null };
    const advance = (event: RestoreEvent): void => {
      const from = state.phase;
      state.phase = nextPhase(from, event);
      state.trace.push(state.phase);
      this.opts.onTransition?.(from, state.phase, state);
    };

    const deadline = startDeadline(this.opts.timeoutMs);
    const signal = run.signal ? AbortSignal.any([deadline.signal, run.signal]) : deadline.signal;

    try {
      const locator = locatorFor(manifest);
      if (!locator) {
        throw new ArchiveError("RestoreUnsupported", `Archive ${manifest.id} was a dry run; nothing was uploaded`, {
          subject: manifest.id,
        });
      }

      const backend = this.opts.resolveBackend(locator.kind);
      const tier = await backend.tierOf(locator);
      state.tier = tier;

      switch (classifyTier(tier)) {
        case "instant":
          advance("instant_access");
          break;
        case "archival":
          await this.awaitRestoredCopy(backend, locator, state, advance, signal);
          break;
        case "unsupported":
          throw unsupportedTier(locator, tier, run.targetDir);
      }

      const bundlePath = path.join(run.targetDir, manifest.filename);
      await backend.download(locator, bundlePath);
      advance("downloaded");

      const algorithm = manifest.fingerprintAlgorithm ?? this.opts.algorithm;
      await verifyTransfer(bundlePath, manifest.bundleFingerprint, { algorithm, phase: "RestoreTime" });
      await verifyMembers(bundlePath, manifest.files, { algorithm, mode: this.opts.integrityMode, phase: "RestoreTime" });
      advance("verified");

      const files = await extractBundle(bundlePath, run.targetDir);
      advance("extracted");

      if (run.deleteBundle) {
        await rm(bundlePath, { force: true });
      }

      return { success: true, final_phase: "extracted", trace: state.trace, locator, bundlePath, files };
    } catch (e: unknown) {
      const error =
        e instanceof ArchiveError
          ? e
          : new ArchiveError("TransferFailed", errorMessage(e), { subject: manifest.id, cause: e });
      if (!isTerminal(state.phase)) advance("failure");
      return { success: false, final_phase: state.phase, trace: state.trace, error };
    } finally {
      deadline.clear();
    }
  }

  private async awaitRestoredCopy(
    backend: TransferBackend,
    locator: RemoteLocator,
    state: RestoreState,
    advance: (event: RestoreEvent) => void,
    signal: AbortSignal,
  ): Promise<void> {
    const initial = await this.readStatus(backend, locator, state);

    if (initial.state === "completed") {
      advance("restore_available");
      return;
    }
    if (initial.state === "none") {
      await backend.requestRestore(locator);
      advance("restore_requested");
    } else {
      advance("restore_ongoing");
    }

    for (;;) {
      try {
        await sleep(Math.min(this.opts.pollIntervalMs, MAX_TIMER_MS), undefined, { signal });
      } catch (e: unknown) {
        if (signal.aborted) {
          throw new ArchiveError(
            "RestoreTimeout",
            `Restore of ${describeLocator(locator)} did not complete in time (last status: ${state.restoreStatus ?? "none"})`,
            { subject: describeLocator(locator), cause: e },
          );
        }
        throw e;
      }

      const status = await this.readStatus(backend, locator, state);
      if (status.state === "none") {
        throw new ArchiveError("TransferFailed", `No restore status reported for ${describeLocator(locator)}`, {
          subject: describeLocator(locator),
        });
      }
      advance(status.state === "completed" ? "restore_completed" : "restore_ongoing");
      if (status.state === "completed") return;
    }
  }

  private async readStatus(backend: TransferBackend, locator: RemoteLocator, state: RestoreState): Promise<RestoreStatus> {
    const status = await backend.restoreStatus(locator);
    if (!status) {
      throw new ArchiveError("TransferFailed", `${describeLocator(locator)} no longer exists`, {
        subject: describeLocator(locator),
      });
    }
    state.restoreStatus = status.state === "none" ? null : status.raw;
    return status;
  }
}

/** Largest delay a Node timer honours; longer delays fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

type Deadline = { signal: AbortSignal; clear: () => void };

/** Aborts after `ms`, re-arming the timer in chunks no longer than MAX_TIMER_MS. */
function startDeadline(ms: number): Deadline {
  const controller = new AbortController();
  const end = Date.now() + ms;
  let timer: NodeJS.Timeout | undefined;

  const arm = (): void => {
    const left = end - Date.now();
    if (left <= 0) {
      controller.abort();
      return;
    }
    timer = setTimeout(arm, Math.min(left, MAX_TIMER_MS));
    timer.unref();
  };
  arm();

  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

function unsupportedTier(locator: RemoteLocator, tier: StorageTier, targetDir: string): ArchiveError {
  const where = describeLocator(locator);
  const reason = locator.kind === "remote_archive" ? "Self-service restore from the remote archive is not possible" : `Storage class ${tier} is not supported`;
  return new ArchiveError(
    "RestoreUnsupported",
    `${reason}. Submit a ticket to request restore of ${where} --> ${path.join(targetDir, locator.key)}`,
    { subject: where },
  );
}
