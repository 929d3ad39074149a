import { mkdir, open, readdir, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { artifactNames, generateArchiveId, isSidecarName, parseArtifactId } from "../core/archive-id.js";
import { ArchiveError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { Manifest } from "../types/manifest.js";
import type { ArchiveIndex } from "./index-db.js";

export type CreateOptions = {
  /** Archive again next to existing artifacts under a fresh id. */
  force?: boolean;
  /** Replace the newest existing archive, keeping its id. */
  overwrite?: boolean;
};

export type ArchiveIdentity = {
  id: string;
  /** Id of the archive this one supersedes (overwrite only). */
  supersedes: string | null;
};

type Sidecar = { path: string; manifest: Manifest; ctimeMs: number };

/**
 * Manifest store: owns the sidecar files written next to archived content
 * and mirrors each persisted manifest into the archive index.
 */
export class ManifestStore {
  constructor(
    private readonly prefix: string,
    private readonly registry: SchemaRegistry,
    private readonly index: ArchiveIndex | null = null,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Sidecar paths in `dir`, in name order. */
  async listSidecars(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true }).catch(() => []);
    return entries
      .filter((e) => e.isFile() && isSidecarName(this.prefix, e.name))
      .map((e) => path.join(dir, e.name))
      .sort();
  }

  /**
   * Decide the identity of a new archive of `dir`.
   * Refuses when `dir` already has a sidecar, unless forced or overwriting;
   * overwrite reuses the id of the newest existing sidecar.
   */
  async create(dir: string, opts: CreateOptions = {}): Promise<ArchiveIdentity> {
    const existing = await this.listSidecars(dir);
    if (existing.length === 0) {
      return { id: generateArchiveId(), supersedes: null };
    }

    if (opts.overwrite) {
      const newest = await this.newest(existing);
      const id = parseArtifactId(this.prefix, path.basename(newest.path));
      if (!id) throw new ArchiveError("InvalidManifest", `Cannot read archive id from ${newest.path}`, { subject: newest.path });
      return { id, supersedes: id };
    }

    if (opts.force) {
      return { id: generateArchiveId(), supersedes: null };
    }

    throw new ArchiveError(
      "DuplicateArchiveExists",
      `Archive files already exist in ${dir} (${existing.map((p) => path.basename(p)).join(", ")}); use force or overwrite`,
      { subject: dir },
    );
  }

  /**
   * Write the sidecar into the manifest's local path and mirror it into the index.
   * Returns the sidecar path.
   */
  async persist(manifest: Manifest): Promise<string> {
    const sidecarPath = path.join(manifest.localPath, artifactNames(this.prefix, manifest.id).sidecar);
    await atomicWriteJson(sidecarPath, manifest);
    if (this.index) {
      this.index.createTable();
      this.index.insertManifest(manifest);
    }
    return sidecarPath;
  }

  /**
   * Load the newest valid manifest in `dir` (last write wins).
   * Sidecars are validated against the manifest schema once, here; unreadable
   * ones are skipped with a warning.
   */
  async load(dir: string): Promise<Manifest> {
    const sidecars = await this.listSidecars(dir);
    if (sidecars.length === 0) {
      throw new ArchiveError("ManifestNotFound", `No archive manifest found in ${dir}`, { subject: dir });
    }
    return (await this.newest(sidecars)).manifest;
  }

  /** Read and validate a single sidecar file. */
  async read(sidecarPath: string): Promise<Manifest> {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(sidecarPath, "utf8"));
    } catch (e: unknown) {
      throw new ArchiveError("InvalidManifest", `Cannot read manifest ${sidecarPath}: ${errorMessage(e)}`, {
        subject: sidecarPath,
        cause: e,
      });
    }

    try {
      return await this.registry.parse<Manifest>("manifest", data);
    } catch (e: unknown) {
      throw new ArchiveError("InvalidManifest", `Manifest ${sidecarPath} is invalid: ${errorMessage(e)}`, {
        subject: sidecarPath,
        cause: e,
      });
    }
  }

  private async newest(sidecarPaths: string[]): Promise<Sidecar> {
    const sidecars: Sidecar[] = [];
    let firstError: unknown = null;
    for (const p of sidecarPaths) {
      try {
        const [manifest, s] = await Promise.all([this.read(p), stat(p)]);
        sidecars.push({ path: p, manifest, ctimeMs: s.ctimeMs });
      } catch (e: unknown) {
        firstError ??= e;
        this.logger.warn("MANIFEST_SKIPPED", `Skipping ${path.basename(p)}: ${errorMessage(e)}`, { path: p });
      }
    }
    sidecars.sort((a, b) => {
      const byTimestamp = Date.parse(b.manifest.timestamp) - Date.parse(a.manifest.timestamp);
      return byTimestamp !== 0 ? byTimestamp : b.ctimeMs - a.ctimeMs;
    });

    const [newest] = sidecars;
    if (!newest) {
      throw firstError ?? new ArchiveError("ManifestNotFound", "No archive manifest given");
    }
    return newest;
  }
}

/** Write JSON via a synced temp file and rename, so readers never see a partial sidecar. */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, filePath);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}
