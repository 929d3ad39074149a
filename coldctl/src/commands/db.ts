import path from "node:path";
import { ArchiveError, errorMessage } from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import { formatTsv, type ArchiveIndex, type IndexRow } from "../manifest/index-db.js";
import type { ManifestStore } from "../manifest/store.js";
import { openContext, type CommandContext } from "./context.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type IndexCommandOpts = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  /** Overrides index.path from config. */
  indexPath?: string;
  logger?: Logger;
};

export type IndexCommandResult =
  | { ok: true; rows: IndexRow[]; tsv: string }
  | { ok: false; error: string; code: string; exitCode: ExitCode };

type IndexAction = (index: ArchiveIndex, store: ManifestStore) => IndexRow[] | Promise<IndexRow[]>;

async function withIndex(opts: IndexCommandOpts, action: IndexAction): Promise<IndexCommandResult> {
  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext({
      configDir: opts.configDir,
      envName: opts.envName,
      env: opts.env,
      indexPath: opts.indexPath,
      logger: opts.logger,
    });
    if (!ctx.index) {
      return {
        ok: false,
        error: "No index configured (set index.path or pass --db)",
        code: "INVALID_ARGS",
        exitCode: EXIT.INVALID_ARGS,
      };
    }
    ctx.index.createTable();
    const rows = await action(ctx.index, ctx.store);
    return { ok: true, rows, tsv: formatTsv(rows) };
  } catch (e: unknown) {
    return {
      ok: false,
      error: errorMessage(e),
      code: e instanceof ArchiveError ? e.code : "ERROR",
      exitCode: exitCodeFor(e),
    };
  } finally {
    ctx?.close();
  }
}

/** Create the index table (no-op when it exists). */
export function indexCreate(opts: IndexCommandOpts): Promise<IndexCommandResult> {
  return withIndex(opts, () => []);
}

/** Every indexed row, oldest first. */
export function indexDump(opts: IndexCommandOpts): Promise<IndexCommandResult> {
  return withIndex(opts, (index) => index.selectAll());
}

/** Rows whose file, bundle name, local path or archive id contain `term`. */
export function indexSearch(opts: IndexCommandOpts & { term: string }): Promise<IndexCommandResult> {
  return withIndex(opts, (index) => index.search(opts.term));
}

/**
 * Record the newest sidecar of each directory in the index, e.g. for
 * archives made before an index was configured. Returns the rows added.
 */
export function indexImport(opts: IndexCommandOpts & { dirs: string[] }): Promise<IndexCommandResult> {
  return withIndex(opts, async (index, store) => {
    const before = index.selectAll().length;
    for (const dir of opts.dirs) {
      index.insertManifest(await store.load(path.resolve(dir)));
    }
    return index.selectAll().slice(before);
  });
}
