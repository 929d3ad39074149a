import { randomInt } from "node:crypto";

const ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const ID_LENGTH = 20;

export const BUNDLE_EXTENSION = "zip";
export const SIDECAR_EXTENSION = "json";

export type ArtifactNames = {
  bundle: string;
  sidecar: string;
  lock: string;
};

/**
 * Generate an archive ID.
 * Format: 20 random letters and digits, e.g. "q3ZtK0aB9xLm2NwPc7Ty".
 */
export function generateArchiveId(): string {
  let id = "";
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_ALPHABET[randomInt(ID_ALPHABET.length)];
  }
  return id;
}

/** Names of the artifacts written next to archived content: `<prefix>.<id>.zip`, `<prefix>.<id>.json`. */
export function artifactNames(prefix: string, id: string): ArtifactNames {
  return {
    bundle: `${prefix}.${id}.${BUNDLE_EXTENSION}`,
    sidecar: `${prefix}.${id}.${SIDECAR_EXTENSION}`,
    lock: lockName(prefix),
  };
}

export function lockName(prefix: string): string {
  return `${prefix}.lock`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function artifactPattern(prefix: string): RegExp {
  // Also matches in-flight sidecar temp files (<sidecar>.tmp.<pid>.<ts>).
  return new RegExp(`^${escapeRegExp(prefix)}\\.(?:lock|([A-Za-z0-9]+)\\.(${BUNDLE_EXTENSION}|${SIDECAR_EXTENSION})(?:\\.tmp\\.\\S+)?)$`);
}

/** True for any bundle, sidecar or lock file this tool writes. Such files are never enumerated. */
export function isArtifactName(prefix: string, name: string): boolean {
  return artifactPattern(prefix).test(name);
}

/** Extract the archive id from a bundle or sidecar file name. */
export function parseArtifactId(prefix: string, name: string): string | null {
  const m = artifactPattern(prefix).exec(name);
  if (!m || !m[1] || name.includes(".tmp.")) return null;
  return m[1];
}

export function isSidecarName(prefix: string, name: string): boolean {
  return parseArtifactId(prefix, name) !== null && name.endsWith(`.${SIDECAR_EXTENSION}`);
}

export function isBundleName(prefix: string, name: string): boolean {
  return parseArtifactId(prefix, name) !== null && name.endsWith(`.${BUNDLE_EXTENSION}`);
}
