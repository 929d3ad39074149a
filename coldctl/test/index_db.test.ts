import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ArchiveIndex, explodeManifest, formatTsv } from "../src/manifest/index-db.js";
import { buildManifest } from "../src/manifest/manifest-builder.js";
import type { Manifest } from "../src/types/manifest.js";
import { makeTmpDir } from "./helpers.js";

function manifest(id: string, localPath: string, files: string[]): Manifest {
  return buildManifest({
    id,
    location: "cold_storage",
    filename: `coldarchive.${id}.zip`,
    localPath,
    archivePath: "test-bucket",
    files: files.map((p, i) => ({ path: p, size: i + 1, fingerprint: `${i}`.repeat(32) })),
    bundleFingerprint: "c".repeat(32),
    fingerprintAlgorithm: "md5",
    owner: "tester",
    timestamp: new Date("2024-02-02T02:02:02.000Z"),
  });
}

describe("explodeManifest", () => {
  it("yields one row per file sharing the scalar fields", () => {
    const rows = explodeManifest(manifest("Run1", "/data/run1", ["a.txt", "b/c.txt"]));
    expect(rows).toEqual([
      {
        id: "Run1",
        timestamp: "2024-02-02T02:02:02.000Z",
        location: "cold_storage",
        filename: "coldarchive.Run1.zip",
        local_path: "/data/run1",
        archive_path: "test-bucket",
        file: "a.txt",
        size: 1,
        fingerprint: "0".repeat(32),
        bundle_fingerprint: "c".repeat(32),
        owner: "tester",
      },
      expect.objectContaining({ file: "b/c.txt", size: 2, fingerprint: "1".repeat(32) }),
    ]);
  });
});

describe("ArchiveIndex", () => {
  let index: ArchiveIndex;

  beforeEach(async () => {
    index = await ArchiveIndex.open(":memory:", "archives");
    index.createTable();
  });

  afterEach(() => {
    index.close();
  });

  it("rejects table names that are not identifiers", async () => {
    await expect(ArchiveIndex.open(":memory:", "archives; DROP TABLE x")).rejects.toThrow("Invalid index table name");
  });

  it("is idempotent to create", () => {
    expect(() => index.createTable()).not.toThrow();
  });

  it("keeps its rows in the database file across opens", async () => {
    const dir = makeTmpDir("index");
    const dbPath = path.join(dir, "nested", "index.db");
    try {
      const first = await ArchiveIndex.open(dbPath, "archives");
      first.createTable();
      first.insertManifest(manifest("Run1", "/data/run1", ["a.txt", "b.txt"]));
      first.close();
      expect(fs.readdirSync(path.dirname(dbPath))).toEqual(["index.db"]);

      const second = await ArchiveIndex.open(dbPath, "archives");
      try {
        second.createTable();
        second.insertManifest(manifest("Run2", "/data/run2", ["c.txt"]));
        expect(second.selectAll().map((r) => [r.record, r.id, r.file])).toEqual([
          [1, "Run1", "a.txt"],
          [2, "Run1", "b.txt"],
          [3, "Run2", "c.txt"],
        ]);
      } finally {
        second.close();
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("numbers rows independently of the archive id", () => {
    expect(index.insertManifest(manifest("Run1", "/data/run1", ["a.txt", "b.txt"]))).toBe(2);
    expect(index.insertManifest(manifest("Run1", "/data/run1", ["a.txt"]))).toBe(1);

    const rows = index.selectAll();
    expect(rows.map((r) => [r.record, r.id, r.file])).toEqual([
      [1, "Run1", "a.txt"],
      [2, "Run1", "b.txt"],
      [3, "Run1", "a.txt"],
    ]);
  });

  it("searches file, bundle, local path and id by substring", () => {
    index.insertManifest(manifest("Run1", "/data/run1", ["reads/sample_1.fastq", "notes.txt"]));
    index.insertManifest(manifest("Run2", "/data/run2", ["sample_10.fastq"]));

    expect(index.search("sample").map((r) => r.file)).toEqual(["reads/sample_1.fastq", "sample_10.fastq"]);
    expect(index.search("run2").map((r) => r.id)).toEqual(["Run2"]);
    expect(index.search("Run1.zip").map((r) => r.file)).toEqual(["reads/sample_1.fastq", "notes.txt"]);
    expect(index.search("missing")).toEqual([]);
  });

  it("treats LIKE wildcards in the term literally", () => {
    index.insertManifest(manifest("Run1", "/data/run1", ["sample_1.fastq", "sampleX1.fastq"]));

    expect(index.search("e_1").map((r) => r.file)).toEqual(["sample_1.fastq"]);
    expect(index.search("%")).toEqual([]);
  });
});

describe("formatTsv", () => {
  it("writes a header and one tab-separated line per row", () => {
    const out = formatTsv([
      {
        record: 7,
        id: "Run1",
        timestamp: "2024-02-02T02:02:02.000Z",
        location: "cold_storage",
        filename: "coldarchive.Run1.zip",
        local_path: "/data/run1",
        archive_path: "test-bucket",
        file: "a.txt",
        size: 12,
        fingerprint: "f0",
        bundle_fingerprint: "b0",
        owner: "tester",
      },
    ]);
    expect(out).toBe(
      "record\tid\ttimestamp\tlocation\tfilename\tlocal_path\tarchive_path\tfile\tsize\tfingerprint\tbundle_fingerprint\towner\n" +
        "7\tRun1\t2024-02-02T02:02:02.000Z\tcold_storage\tcoldarchive.Run1.zip\t/data/run1\ttest-bucket\ta.txt\t12\tf0\tb0\ttester\n",
    );
  });

  it("writes only the header for no rows", () => {
    expect(formatTsv([]).split("\n")).toHaveLength(2);
  });
});
