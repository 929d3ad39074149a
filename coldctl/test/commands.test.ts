import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ColdStorageBackend } from "../src/backend/cold-storage.js";
import { RemoteArchiveBackend } from "../src/backend/remote-archive.js";
import { archive } from "../src/commands/archive.js";
import type { BackendOverrides } from "../src/commands/context.js";
import { indexCreate, indexDump, indexImport, indexSearch } from "../src/commands/db.js";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { restore } from "../src/commands/restore.js";
import { validateAll } from "../src/commands/validate.js";
import { ArchiveError } from "../src/core/errors.js";
import { CONFIG_DIR, FakeObjectStorage, FakeTransferAgent, makeTmpDir, readTree, writeTree } from "./helpers.js";

const TREE = { "a.txt": "alpha", "nested/b.txt": "bravo" };

describe("commands", () => {
  let work: string;
  let src: string;
  let indexPath: string;
  let storage: FakeObjectStorage;
  let backends: BackendOverrides;
  const common = { configDir: CONFIG_DIR, env: {} };

  beforeEach(() => {
    work = makeTmpDir("commands");
    src = path.join(work, "data");
    writeTree(src, TREE);
    indexPath = path.join(work, "index.sqlite");
    storage = new FakeObjectStorage("lab-archive");
    backends = { cold_storage: new ColdStorageBackend(storage, { days: 7, tier: "Bulk" }) };
  });

  afterEach(() => {
    fs.rmSync(work, { recursive: true, force: true });
  });

  describe("archive", () => {
    it("archives to the configured bucket and class, then restores", async () => {
      const archived = await archive({ ...common, paths: [src], target: "cold_storage", backends, indexPath });

      expect(archived.ok).toBe(true);
      if (!archived.ok) return;
      const [{ manifest }] = archived.archives;
      expect(manifest.archivePath).toBe("lab-archive");
      expect(storage.get("lab-archive", manifest.filename)?.storageClass).toBe("STANDARD_IA");
      expect(readTree(src)).toEqual({ [`coldarchive.${manifest.id}.json`]: expect.any(String) });

      const restored = await restore({ ...common, dir: src, backends, deleteBundle: true });
      expect(restored.ok).toBe(true);
      if (!restored.ok) return;
      expect(restored.trace).toEqual(["idle", "ready", "downloaded", "verified", "extracted"]);
      expect(restored.files.sort()).toEqual(["a.txt", "nested/b.txt"]);
      expect(fs.readFileSync(path.join(src, "nested/b.txt"), "utf8")).toBe("bravo");
    });

    it("honours bucket and storage class flags", async () => {
      storage.buckets.add("other-bucket");
      const archived = await archive({
        ...common,
        paths: [src],
        target: "cold_storage",
        bucket: "other-bucket",
        storageClass: "GLACIER",
        keep: true,
        backends,
      });

      expect(archived.ok).toBe(true);
      expect([...storage.objects.values()].map((o) => o.storageClass)).toEqual(["GLACIER"]);
      expect(storage.calls.some((c) => c.startsWith("uploadObject other-bucket/"))).toBe(true);
    });

    it("rejects an unknown storage class before touching anything", async () => {
      const result = await archive({ ...common, paths: [src], target: "cold_storage", storageClass: "COLDEST", backends });

      expect(result).toMatchObject({ ok: false, code: "INVALID_ARGS", exitCode: EXIT.INVALID_ARGS });
      expect(storage.calls).toEqual([]);
    });

    it("rejects an empty path list", async () => {
      const result = await archive({ ...common, paths: [], target: "dry_run" });
      expect(result).toMatchObject({ ok: false, exitCode: EXIT.INVALID_ARGS, error: "No paths given" });
    });

    it("reports completed archives alongside the first failure", async () => {
      const result = await archive({
        ...common,
        paths: [src, path.join(work, "missing")],
        target: "cold_storage",
        backends,
      });

      expect(result.ok).toBe(false);
      expect(result.archives).toHaveLength(1);
      if (result.ok) return;
      expect(result.code).toBe("InvalidInputPath");
      expect(result.exitCode).toBe(EXIT.INVALID_ARGS);
    });

    it("maps a second archive of the same directory to a conflict", async () => {
      await archive({ ...common, paths: [src], target: "cold_storage", keep: true, backends });
      const again = await archive({ ...common, paths: [src], target: "cold_storage", keep: true, backends });

      expect(again).toMatchObject({ ok: false, code: "DuplicateArchiveExists", exitCode: EXIT.CONCURRENT_CONFLICT });
    });

    it("dry-runs without a backend", async () => {
      const result = await archive({ ...common, paths: [src], target: "dry_run" });

      expect(result.ok).toBe(true);
      expect(result.archives[0].sidecarPath).toBeNull();
      expect(readTree(src)).toEqual(TREE);
    });

    it("needs an endpoint for the remote archive", async () => {
      const result = await archive({ ...common, paths: [src], target: "remote_archive" });
      expect(result).toMatchObject({ ok: false, code: "InvalidConfig", exitCode: EXIT.INVALID_ARGS });
    });

    it("archives to the remote archive and explains how to get it back", async () => {
      const remoteRoot = path.join(work, "remote");
      const agent = new FakeTransferAgent(remoteRoot);
      const remote = { remote_archive: new RemoteArchiveBackend(agent) };

      const archived = await archive({
        ...common,
        paths: [src],
        target: "remote_archive",
        endpoint: "ep-1234",
        archivePath: "/archive/lab",
        backends: remote,
      });
      expect(archived.ok).toBe(true);
      if (!archived.ok) return;
      const { manifest } = archived.archives[0];
      expect(manifest.location).toBe("remote_archive");
      expect(manifest.archivePath).toBe("/archive/lab");
      expect(fs.existsSync(path.join(remoteRoot, "archive/lab", manifest.filename))).toBe(true);

      const restored = await restore({ ...common, dir: src, backends: remote });
      expect(restored).toMatchObject({ ok: false, code: "RestoreUnsupported", exitCode: EXIT.RESTORE_UNSUPPORTED });
      expect(restored.trace).toEqual(["idle", "failed"]);
    });
  });

  describe("restore", () => {
    it("fails with INVALID_ARGS where nothing was archived", async () => {
      const result = await restore({ ...common, dir: src, backends });
      expect(result).toMatchObject({ ok: false, code: "ManifestNotFound", exitCode: EXIT.INVALID_ARGS, trace: [] });
    });

    it("exits RESTORE_PENDING while an archival restore is still running", async () => {
      storage.restoreCompletes = false;
      const archived = await archive({ ...common, paths: [src], target: "cold_storage", storageClass: "DEEP_ARCHIVE", backends });
      expect(archived.ok).toBe(true);

      const result = await restore({ ...common, dir: src, backends, timeoutSeconds: 0.05, pollIntervalSeconds: 0.005 });

      expect(result).toMatchObject({ ok: false, code: "RestoreTimeout", exitCode: EXIT.RESTORE_PENDING });
      expect(storage.calls.filter((c) => c.startsWith("restoreObject"))).toHaveLength(1);
    });
  });

  describe("index", () => {
    it("mirrors archives into the index for dump and search", async () => {
      const archived = await archive({ ...common, paths: [src], target: "cold_storage", backends, indexPath });
      expect(archived.ok).toBe(true);

      const dump = await indexDump({ ...common, indexPath });
      expect(dump.ok).toBe(true);
      if (!dump.ok) return;
      expect(dump.rows.map((r) => r.file)).toEqual(["a.txt", "nested/b.txt"]);
      expect(dump.tsv.split("\n")).toHaveLength(4);

      const search = await indexSearch({ ...common, indexPath, term: "b.txt" });
      expect(search.ok && search.rows.map((r) => r.file)).toEqual(["nested/b.txt"]);
    });

    it("imports sidecars written without an index", async () => {
      await archive({ ...common, paths: [src], target: "cold_storage", backends });

      const imported = await indexImport({ ...common, indexPath, dirs: [src] });
      expect(imported.ok && imported.rows.map((r) => [r.record, r.file])).toEqual([
        [1, "a.txt"],
        [2, "nested/b.txt"],
      ]);
    });

    it("creates an empty table", async () => {
      const created = await indexCreate({ ...common, indexPath });
      expect(created).toEqual({ ok: true, rows: [], tsv: expect.stringMatching(/^record\tid\t.*\towner\n$/) });
      expect(fs.existsSync(indexPath)).toBe(true);
    });

    it("needs an index path", async () => {
      expect(await indexDump(common)).toMatchObject({ ok: false, exitCode: EXIT.INVALID_ARGS });
    });
  });

  describe("validate", () => {
    it("accepts the bundled config layers", async () => {
      const result = await validateAll({ configDir: CONFIG_DIR });
      expect(result.ok && result.checked.map((f) => path.basename(f))).toEqual(["base.yaml", "deep-archive.yaml"]);
    });

    it("fails when the config dir is missing", async () => {
      const result = await validateAll({ configDir: path.join(work, "definitely-not-here") });
      expect(result.ok ? [] : result.errors.map((d) => d.code)).toEqual(["CONFIG_DIR_MISSING"]);
    });

    it("reports a broken overlay and a missing base", async () => {
      const dir = path.join(work, "config");
      writeTree(dir, { "broken.yaml": "restore:\n  retrieval_tier: Instant\n" });

      const result = await validateAll({ configDir: dir });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map((d) => d.code)).toEqual(["CONFIG_NO_BASE", "CONFIG_INVALID"]);
    });

    it("checks sidecars in a directory", async () => {
      const archived = await archive({ ...common, paths: [src], target: "cold_storage", keep: true, backends });
      expect(archived.ok).toBe(true);
      fs.writeFileSync(path.join(work, "coldarchive.Bad1.json"), JSON.stringify({ id: "Bad1" }));

      const good = await validateAll({ configDir: CONFIG_DIR, manifestsDir: src });
      expect(good.ok && good.checked.filter((f) => f.endsWith(".json"))).toHaveLength(1);

      const bad = await validateAll({ configDir: CONFIG_DIR, manifestsDir: work });
      expect(bad.ok ? [] : bad.errors.map((d) => d.code)).toEqual(["MANIFEST_INVALID"]);
    });
  });
});

describe("exitCodeFor", () => {
  it("maps error codes to exit codes", () => {
    expect(exitCodeFor(new ArchiveError("IntegrityMismatch", "x", { phase: "BuildTime" }))).toBe(EXIT.INTEGRITY_FAILED);
    expect(exitCodeFor(new ArchiveError("LockHeld", "x"))).toBe(EXIT.CONCURRENT_CONFLICT);
    expect(exitCodeFor(new ArchiveError("SizeLimitExceeded", "x"))).toBe(EXIT.INVALID_ARGS);
    expect(exitCodeFor(new ArchiveError("RestoreTimeout", "x"))).toBe(EXIT.RESTORE_PENDING);
    expect(exitCodeFor(new ArchiveError("RestoreUnsupported", "x"))).toBe(EXIT.RESTORE_UNSUPPORTED);
    expect(exitCodeFor(new ArchiveError("BackendUnavailable", "x"))).toBe(EXIT.OPERATION_FAILED);
    expect(exitCodeFor(new Error("boom"))).toBe(EXIT.OPERATION_FAILED);
  });
});
