import { readBundleEntries } from "../bundle/reader.js";
import { ArchiveError, errorMessage, integrityMismatch, type IntegrityPhase } from "../core/errors.js";
import type { FingerprintAlgorithm, IntegrityMode } from "../types/config.js";
import type { FileEntry } from "../types/manifest.js";
import { fingerprintFile } from "./fingerprint.js";

export type Reconciliation = {
  ok: boolean;
  /** Recorded but absent from the bundle (fingerprints in "set" mode, paths in "path" mode). */
  missing: string[];
  /** Present in the bundle but not recorded. */
  unexpected: string[];
};

/**
 * Compare recorded entries against entries read back from a bundle.
 *
 * "set" compares the sets of fingerprints only: a bundle that drops a file whose
 * content duplicates another file still passes. "path" requires every path to map
 * to the same fingerprint on both sides.
 */
export function reconcile(recorded: readonly FileEntry[], actual: readonly FileEntry[], mode: IntegrityMode): Reconciliation {
  if (mode === "set") {
    const want = new Set(recorded.map((f) => f.fingerprint));
    const have = new Set(actual.map((f) => f.fingerprint));
    const missing = [...want].filter((fp) => !have.has(fp));
    const unexpected = [...have].filter((fp) => !want.has(fp));
    return { ok: missing.length === 0 && unexpected.length === 0, missing, unexpected };
  }

  const want = new Map(recorded.map((f) => [f.path, f.fingerprint]));
  const have = new Map<string, string>();
  const unexpected: string[] = [];
  for (const f of actual) {
    if (have.has(f.path)) unexpected.push(f.path); // duplicate member
    have.set(f.path, f.fingerprint);
  }
  const missing: string[] = [];
  for (const [p, fp] of want) {
    const got = have.get(p);
    if (got === undefined) missing.push(p);
    else if (got !== fp) {
      missing.push(p);
      unexpected.push(p);
    }
  }
  for (const p of have.keys()) {
    if (!want.has(p)) unexpected.push(p);
  }
  return { ok: missing.length === 0 && unexpected.length === 0, missing, unexpected };
}

/**
 * Re-read every member of a bundle and reconcile its fingerprints with the
 * recorded entries. An unreadable bundle counts as a mismatch.
 */
export async function verifyMembers(
  bundlePath: string,
  recorded: readonly FileEntry[],
  opts: { algorithm: FingerprintAlgorithm; mode: IntegrityMode; phase: IntegrityPhase },
): Promise<void> {
  let actual: FileEntry[];
  try {
    actual = await readBundleEntries(bundlePath, opts.algorithm);
  } catch (e: unknown) {
    if (e instanceof ArchiveError) throw e;
    throw integrityMismatch(opts.phase, `Bundle ${bundlePath} could not be read back: ${errorMessage(e)}`, bundlePath);
  }

  const result = reconcile(recorded, actual, opts.mode);
  if (!result.ok) {
    const detail = [
      result.missing.length > 0 ? `missing: ${result.missing.join(", ")}` : null,
      result.unexpected.length > 0 ? `unexpected: ${result.unexpected.join(", ")}` : null,
    ]
      .filter((s) => s !== null)
      .join("; ");
    throw integrityMismatch(opts.phase, `Bundle ${bundlePath} does not match its file list (${detail})`, bundlePath);
  }
}

/**
 * Build-time check: the bundle on disk is byte for byte what the builder wrote
 * (when `written` is known) and holds exactly the enumerated content.
 * Returns the whole-bundle fingerprint.
 */
export async function verifyBuild(
  bundlePath: string,
  recorded: readonly FileEntry[],
  opts: { algorithm: FingerprintAlgorithm; mode: IntegrityMode; written: string | null },
): Promise<string> {
  const actual = await fingerprintFile(bundlePath, opts.algorithm);
  if (opts.written !== null && actual !== opts.written) {
    throw integrityMismatch(
      "BuildTime",
      `Bundle ${bundlePath} changed after it was written: expected ${opts.written}, got ${actual}`,
      bundlePath,
    );
  }
  await verifyMembers(bundlePath, recorded, { algorithm: opts.algorithm, mode: opts.mode, phase: "BuildTime" });
  return actual;
}

/**
 * Post-transfer check: the whole-bundle fingerprint equals the recorded one.
 * Returns the fingerprint it computed.
 */
export async function verifyTransfer(
  bundlePath: string,
  expectedFingerprint: string,
  opts: { algorithm: FingerprintAlgorithm; phase: Exclude<IntegrityPhase, "BuildTime"> },
): Promise<string> {
  const actual = await fingerprintFile(bundlePath, opts.algorithm);
  if (actual !== expectedFingerprint) {
    throw integrityMismatch(
      opts.phase,
      `Bundle fingerprint mismatch for ${bundlePath}: expected ${expectedFingerprint}, got ${actual}`,
      bundlePath,
    );
  }
  return actual;
}
