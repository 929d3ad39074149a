import fs from "node:fs";
import { copyFile, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type {
  BackendDescriptor,
  ProgressFn,
  RemoteLocator,
  RestoreStatus,
  StorageTier,
  TransferBackend,
} from "../src/backend/backend.js";
import type { ObjectHead, ObjectStorageClient } from "../src/backend/cold-storage.js";
import type { TaskStatus, TransferAgent } from "../src/backend/remote-archive.js";
import { buildBundle } from "../src/bundle/builder.js";
import { artifactNames } from "../src/core/archive-id.js";
import { loadConfig } from "../src/config/loader.js";
import { enumerateFiles } from "../src/enumerate/file-enumerator.js";
import { buildManifest } from "../src/manifest/manifest-builder.js";
import type { ColdctlConfig, RetrievalTier, StorageClass } from "../src/types/config.js";
import type { Manifest } from "../src/types/manifest.js";

export const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");
export const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `coldctl-${prefix}-`));
}

/** Write `files` (relative path → content) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

/** Relative path → content for every file under `root`, hidden ones included. */
export function readTree(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  const walk = (rel: string): void => {
    for (const entry of fs.readdirSync(path.join(root, rel), { withFileTypes: true })) {
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) walk(childRel);
      else out[childRel] = fs.readFileSync(path.join(root, childRel), "utf8");
    }
  };
  walk("");
  return out;
}

/** Bundled base config with the COLDCTL_* environment ignored. */
export async function testConfig(patch: Partial<ColdctlConfig> = {}): Promise<ColdctlConfig> {
  const base = await loadConfig(undefined, CONFIG_DIR, {});
  return { ...base, owner: "tester", ...patch };
}

type StoredObject = { data: Buffer; storageClass: string; restore: string | null };

/** In-memory object store. Restore requests complete immediately unless `restoreCompletes` is false. */
export class FakeObjectStorage implements ObjectStorageClient {
  readonly buckets = new Set<string>();
  readonly objects = new Map<string, StoredObject>();
  readonly calls: string[] = [];
  restoreCompletes = true;

  constructor(...buckets: string[]) {
    for (const b of buckets) this.buckets.add(b);
  }

  put(bucket: string, key: string, data: Buffer, storageClass = "STANDARD"): void {
    this.objects.set(`${bucket}/${key}`, { data, storageClass, restore: null });
  }

  get(bucket: string, key: string): StoredObject | undefined {
    return this.objects.get(`${bucket}/${key}`);
  }

  async headBucket(bucket: string): Promise<boolean> {
    this.calls.push(`headBucket ${bucket}`);
    return this.buckets.has(bucket);
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead | null> {
    this.calls.push(`headObject ${bucket}/${key}`);
    const obj = this.get(bucket, key);
    return obj ? { storageClass: obj.storageClass, restore: obj.restore, size: obj.data.length } : null;
  }

  async uploadObject(
    localPath: string,
    bucket: string,
    key: string,
    storageClass: StorageClass,
    onProgress?: ProgressFn,
  ): Promise<void> {
    this.calls.push(`uploadObject ${bucket}/${key} ${storageClass}`);
    const data = await readFile(localPath);
    onProgress?.(data.length, data.length);
    this.put(bucket, key, data, storageClass);
  }

  async downloadObject(bucket: string, key: string, localPath: string): Promise<void> {
    this.calls.push(`downloadObject ${bucket}/${key}`);
    const obj = this.get(bucket, key);
    if (!obj) throw new Error(`NoSuchKey: ${bucket}/${key}`);
    await writeFile(localPath, obj.data);
  }

  async restoreObject(bucket: string, key: string, days: number, tier: RetrievalTier): Promise<void> {
    this.calls.push(`restoreObject ${bucket}/${key} ${days} ${tier}`);
    const obj = this.get(bucket, key);
    if (!obj) throw new Error(`NoSuchKey: ${bucket}/${key}`);
    obj.restore = this.restoreCompletes
      ? 'ongoing-request="false", expiry-date="Fri, 23 Dec 2033 00:00:00 GMT"'
      : 'ongoing-request="true"';
  }
}

/** Transfer agent over a local directory standing in for the remote endpoint's filesystem. */
export class FakeTransferAgent implements TransferAgent {
  readonly calls: string[] = [];
  loggedIn = true;
  finalStatus: TaskStatus = "SUCCEEDED";
  private readonly tasks = new Map<string, { source: string; destination: string }>();

  constructor(private readonly remoteRoot: string) {}

  private local(qualified: string): string {
    const p = qualified.slice(qualified.indexOf(":") + 1);
    return path.join(this.remoteRoot, p);
  }

  async checkSession(): Promise<void> {
    this.calls.push("checkSession");
    if (!this.loggedIn) throw new Error("not logged in");
  }

  async pathExists(qualifiedPath: string): Promise<boolean> {
    this.calls.push(`pathExists ${qualifiedPath}`);
    return fs.existsSync(this.local(qualifiedPath));
  }

  async createDirectory(qualifiedPath: string): Promise<void> {
    this.calls.push(`createDirectory ${qualifiedPath}`);
    fs.mkdirSync(this.local(qualifiedPath), { recursive: true });
  }

  async submitTransfer(source: string, destination: string, opts: { verifyChecksum: boolean; overwrite: boolean }): Promise<string> {
    const taskId = `task-${this.tasks.size + 1}`;
    this.calls.push(`submitTransfer ${destination} verify=${opts.verifyChecksum} overwrite=${opts.overwrite}`);
    this.tasks.set(taskId, { source: source.slice(source.indexOf(":") + 1), destination: this.local(destination) });
    return taskId;
  }

  async waitForTask(taskId: string): Promise<void> {
    this.calls.push(`waitForTask ${taskId}`);
    const task = this.tasks.get(taskId);
    if (task && this.finalStatus === "SUCCEEDED") await copyFile(task.source, task.destination);
  }

  async taskStatus(taskId: string): Promise<TaskStatus> {
    this.calls.push(`taskStatus ${taskId}`);
    return this.finalStatus;
  }
}

/**
 * Backend whose restore statuses are played back from a script; `download`
 * copies a prepared bundle.
 */
export class ScriptedBackend implements TransferBackend {
  readonly kind = "cold_storage";
  readonly calls: string[] = [];

  constructor(
    private readonly opts: { tier: StorageTier; statuses?: Array<RestoreStatus | null>; bundle?: string },
  ) {}

  async upload(localBundlePath: string, descriptor: BackendDescriptor): Promise<RemoteLocator> {
    this.calls.push("upload");
    return { kind: this.kind, container: descriptor.kind === "cold_storage" ? descriptor.bucket : descriptor.path, key: path.basename(localBundlePath) };
  }

  async locatorExists(): Promise<boolean> {
    return true;
  }

  async tierOf(): Promise<StorageTier> {
    this.calls.push("tierOf");
    return this.opts.tier;
  }

  async restoreStatus(): Promise<RestoreStatus | null> {
    this.calls.push("restoreStatus");
    const statuses = this.opts.statuses ?? [];
    // The last scripted status repeats.
    return statuses.length > 1 ? (statuses.shift() ?? null) : (statuses[0] ?? null);
  }

  async requestRestore(): Promise<void> {
    this.calls.push("requestRestore");
  }

  async download(_locator: RemoteLocator, localPath: string): Promise<void> {
    this.calls.push("download");
    if (!this.opts.bundle) throw new Error("no bundle scripted");
    await copyFile(this.opts.bundle, localPath);
  }
}

export const ONGOING: RestoreStatus = { state: "ongoing", raw: 'ongoing-request="true"' };
export const COMPLETED: RestoreStatus = { state: "completed", raw: 'ongoing-request="false"', expiry: null };
export const NO_RESTORE: RestoreStatus = { state: "none" };

/**
 * Build a bundle and manifest for the tree under `dir` without uploading,
 * as if archived to `bucket`. The bundle is written to `bundleDir`.
 */
export async function prepareArchive(
  dir: string,
  bundleDir: string,
  config: ColdctlConfig,
  bucket = "test-bucket",
): Promise<{ manifest: Manifest; bundlePath: string }> {
  const enumeration = await enumerateFiles(dir, {
    artifactPrefix: config.archive_name,
    algorithm: config.fingerprint_algorithm,
    concurrency: 2,
  });
  const id = "AbCdEfGhIjKlMnOpQrSt";
  const bundlePath = path.join(bundleDir, artifactNames(config.archive_name, id).bundle);
  const built = await buildBundle(enumeration.root, enumeration.files, bundlePath, {
    compressionLevel: 6,
    algorithm: config.fingerprint_algorithm,
  });
  const manifest = buildManifest({
    id,
    location: "cold_storage",
    filename: path.basename(bundlePath),
    localPath: enumeration.root,
    archivePath: bucket,
    files: enumeration.files,
    bundleFingerprint: built.fingerprint,
    fingerprintAlgorithm: config.fingerprint_algorithm,
    owner: "tester",
  });
  return { manifest, bundlePath };
}
