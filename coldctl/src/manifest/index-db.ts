import fs from "node:fs";
import path from "node:path";
import sqlJs, { type Database, type ParamsObject } from "sql.js";
import type { Manifest } from "../types/manifest.js";

/** One (manifest, file) pair. `record` is the row identity, separate from the archive id. */
export type IndexRow = {
  record: number;
  id: string;
  timestamp: string;
  location: string;
  filename: string;
  local_path: string;
  archive_path: string;
  file: string;
  size: number;
  fingerprint: string;
  bundle_fingerprint: string;
  owner: string;
};

export type NewIndexRow = Omit<IndexRow, "record">;

export const INDEX_COLUMNS = [
  "record",
  "id",
  "timestamp",
  "location",
  "filename",
  "local_path",
  "archive_path",
  "file",
  "size",
  "fingerprint",
  "bundle_fingerprint",
  "owner",
] as const;

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const MEMORY = ":memory:";

/** Explode a manifest's file list into one row per file sharing the scalar fields. */
export function explodeManifest(manifest: Manifest): NewIndexRow[] {
  return manifest.files.map((f) => ({
    id: manifest.id,
    timestamp: manifest.timestamp,
    location: manifest.location,
    filename: manifest.filename,
    local_path: manifest.localPath,
    archive_path: manifest.archivePath,
    file: f.path,
    size: f.size,
    fingerprint: f.fingerprint,
    bundle_fingerprint: manifest.bundleFingerprint,
    owner: manifest.owner,
  }));
}

/**
 * Archive index: a SQLite table answering "which archive contains file X"
 * without opening every sidecar. The database runs in memory (sql.js) and is
 * written back to `dbPath` after every change.
 */
export class ArchiveIndex {
  private constructor(
    private readonly db: Database,
    private readonly dbPath: string | null,
    private readonly table: string,
  ) {}

  /** Open (or start) the index at `dbPath`; ":memory:" keeps it off disk. */
  static async open(dbPath: string, table: string): Promise<ArchiveIndex> {
    if (!TABLE_NAME.test(table)) {
      throw new Error(`Invalid index table name: ${table}`);
    }
    // sql.js is CommonJS; `default` names the init function under either interop.
    const SQL = await sqlJs.default();
    if (dbPath === MEMORY) {
      return new ArchiveIndex(new SQL.Database(), null, table);
    }
    const existing = fs.existsSync(dbPath) ? fs.readFileSync(dbPath) : null;
    return new ArchiveIndex(new SQL.Database(existing), dbPath, table);
  }

  /** Create the table if it does not exist yet. */
  createTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        record INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        location TEXT NOT NULL,
        filename TEXT NOT NULL,
        local_path TEXT NOT NULL,
        archive_path TEXT NOT NULL,
        file TEXT NOT NULL,
        size INTEGER NOT NULL,
        fingerprint TEXT NOT NULL,
        bundle_fingerprint TEXT NOT NULL,
        owner TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ${this.table}_file ON ${this.table} (file);
      CREATE INDEX IF NOT EXISTS ${this.table}_id ON ${this.table} (id);
    `);
    this.save();
  }

  /** Insert rows in one transaction; returns the number inserted. */
  insertRows(rows: readonly NewIndexRow[]): number {
    const stmt = this.db.prepare(
      `INSERT INTO ${this.table}
        (id, timestamp, location, filename, local_path, archive_path, file, size, fingerprint, bundle_fingerprint, owner)
       VALUES
        ($id, $timestamp, $location, $filename, $local_path, $archive_path, $file, $size, $fingerprint, $bundle_fingerprint, $owner)`,
    );
    this.db.exec("BEGIN");
    try {
      for (const row of rows) {
        stmt.run({
          $id: row.id,
          $timestamp: row.timestamp,
          $location: row.location,
          $filename: row.filename,
          $local_path: row.local_path,
          $archive_path: row.archive_path,
          $file: row.file,
          $size: row.size,
          $fingerprint: row.fingerprint,
          $bundle_fingerprint: row.bundle_fingerprint,
          $owner: row.owner,
        });
      }
      this.db.exec("COMMIT");
    } catch (e) {
      this.db.exec("ROLLBACK");
      throw e;
    } finally {
      stmt.free();
    }
    this.save();
    return rows.length;
  }

  insertManifest(manifest: Manifest): number {
    return this.insertRows(explodeManifest(manifest));
  }

  selectAll(): IndexRow[] {
    return this.query(`SELECT * FROM ${this.table} ORDER BY record`, {});
  }

  /** Rows whose file, bundle filename, local path or archive id contain `term`. */
  search(term: string): IndexRow[] {
    const like = `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
    return this.query(
      `SELECT * FROM ${this.table}
       WHERE file LIKE $like ESCAPE '\\' OR filename LIKE $like ESCAPE '\\'
          OR local_path LIKE $like ESCAPE '\\' OR id LIKE $like ESCAPE '\\'
       ORDER BY record`,
      { $like: like },
    );
  }

  close(): void {
    this.db.close();
  }

  private query(sql: string, params: ParamsObject): IndexRow[] {
    const stmt = this.db.prepare(sql, params);
    try {
      const rows: IndexRow[] = [];
      while (stmt.step()) rows.push(toIndexRow(stmt.getAsObject()));
      return rows;
    } finally {
      stmt.free();
    }
  }

  /** Write the database image next to its file and rename it into place. */
  private save(): void {
    if (!this.dbPath) return;
    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const tmp = `${this.dbPath}.tmp.${process.pid}`;
    fs.writeFileSync(tmp, this.db.export());
    fs.renameSync(tmp, this.dbPath);
  }
}

function toIndexRow(o: ParamsObject): IndexRow {
  const text = (key: string): string => String(o[key] ?? "");
  return {
    record: Number(o.record),
    id: text("id"),
    timestamp: text("timestamp"),
    location: text("location"),
    filename: text("filename"),
    local_path: text("local_path"),
    archive_path: text("archive_path"),
    file: text("file"),
    size: Number(o.size),
    fingerprint: text("fingerprint"),
    bundle_fingerprint: text("bundle_fingerprint"),
    owner: text("owner"),
  };
}

/** Tab-separated dump with a header line. */
export function formatTsv(rows: readonly IndexRow[]): string {
  const lines = [INDEX_COLUMNS.join("\t")];
  for (const row of rows) {
    lines.push(INDEX_COLUMNS.map((c) => String(row[c])).join("\t"));
  }
  return lines.join("\n") + "\n";
}
