#!/usr/bin/env node

import { Command, Option } from "commander";
import { archive, type ArchiveTarget } from "./commands/archive.js";
import { indexCreate, indexDump, indexImport, indexSearch, type IndexCommandResult } from "./commands/db.js";
import { EXIT } from "./commands/exit-codes.js";
import { DEFAULT_CONFIG_DIR } from "./config/loader.js";
import { MAX_POLL_SECONDS } from "./config/validator.js";
import { restore } from "./commands/restore.js";
import { validateAll } from "./commands/validate.js";
import { createLogger, type Logger, type OutputFormat } from "./log/logger.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name("coldctl")
  .description("Archive directories into verified bundles on cold storage, and restore them")
  .version("0.1.0");

function common(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (default: bundled config)")
    .option("--env <name>", "Config overlay to apply over base.yaml (e.g. deep-archive)")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

function fail(logger: Logger, res: { error: string; code: string; exitCode: number }): never {
  logger.error(res.code, res.error, { exitCode: res.exitCode });
  process.exit(res.exitCode);
}

function seconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`Not a positive number of seconds: ${value}`);
  return n;
}

function pollSeconds(value: string): number {
  const n = seconds(value);
  if (n > MAX_POLL_SECONDS) throw new Error(`Poll interval must be at most ${MAX_POLL_SECONDS} seconds: ${value}`);
  return n;
}

common(
  program
    .command("archive")
    .description("Bundle, verify and upload files or directories, then record a manifest next to them")
    .argument("<paths...>", "Files or directories to archive")
    .addOption(new Option("--cold-storage", "Upload to object storage").conflicts(["remoteArchive", "dryRun"]))
    .addOption(new Option("--remote-archive", "Transfer to the remote archive").conflicts(["dryRun"]))
    .option("--dry-run", "Build and verify the bundle; upload and record nothing")
    .option("--bundle", "Paths are bundles built earlier; archive them as they are")
    .option("--force", "Archive again even though a manifest exists (new archive id)")
    .option("--overwrite", "Replace the existing archive, keeping its id")
    .option("--keep", "Keep source files after a successful upload")
    .option("--keep-artifacts", "Keep bundles that fail verification or were built for a dry run")
    .option("--bucket <name>", "Object storage bucket")
    .option("--region <name>", "Object storage region")
    .option("--storage-class <class>", "Object storage class")
    .option("--endpoint <id>", "Remote archive endpoint")
    .option("--archive-path <path>", "Directory on the remote archive endpoint")
    .option("--db <path>", "SQLite index to record the archive in"),
).action(
  async (
    paths: string[],
    opts: CommonOpts & {
      coldStorage?: boolean;
      remoteArchive?: boolean;
      dryRun?: boolean;
      bundle?: boolean;
      force?: boolean;
      overwrite?: boolean;
      keep?: boolean;
      keepArtifacts?: boolean;
      bucket?: string;
      region?: string;
      storageClass?: string;
      endpoint?: string;
      archivePath?: string;
      db?: string;
    },
  ) => {
    const logger = createLogger(opts.format);
    const target: ArchiveTarget | null = opts.dryRun
      ? "dry_run"
      : opts.coldStorage
        ? "cold_storage"
        : opts.remoteArchive
          ? "remote_archive"
          : null;
    if (!target) {
      fail(logger, {
        code: "INVALID_ARGS",
        error: "Choose a destination: --cold-storage, --remote-archive or --dry-run",
        exitCode: EXIT.INVALID_ARGS,
      });
    }

    const res = await archive({
      paths,
      target,
      configDir: opts.config,
      envName: opts.env,
      bucket: opts.bucket,
      region: opts.region,
      storageClass: opts.storageClass,
      endpoint: opts.endpoint,
      archivePath: opts.archivePath,
      bundle: opts.bundle,
      force: opts.force,
      overwrite: opts.overwrite,
      keep: opts.keep,
      keepArtifacts: opts.keepArtifacts,
      indexPath: opts.db,
      logger,
    });
    if (!res.ok) fail(logger, res);

    for (const { manifest, sidecarPath } of res.archives) {
      logger.info("OK", sidecarPath ? `${manifest.id}: ${manifest.filename} -> ${manifest.archivePath}` : `${manifest.id}: dry run`, {
        id: manifest.id,
        sidecar: sidecarPath,
      });
    }
  },
);

common(
  program
    .command("restore")
    .description("Retrieve, verify and extract the newest archive recorded in a directory")
    .argument("<dir>", "Directory holding the archive manifest")
    .option("--delete-bundle", "Remove the downloaded bundle after extraction")
    .option("--timeout <seconds>", "Give up waiting for an archival restore after this long", seconds)
    .option("--poll-interval <seconds>", "Seconds between restore status checks", pollSeconds),
).action(
  async (dir: string, opts: CommonOpts & { deleteBundle?: boolean; timeout?: number; pollInterval?: number }) => {
    const logger = createLogger(opts.format);
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());

    const res = await restore({
      dir,
      configDir: opts.config,
      envName: opts.env,
      deleteBundle: opts.deleteBundle,
      timeoutSeconds: opts.timeout,
      pollIntervalSeconds: opts.pollInterval,
      signal: controller.signal,
      logger,
    });
    if (!res.ok) fail(logger, res);
    logger.info("OK", `${res.manifest.id}: ${res.files.length} files restored`, { id: res.manifest.id, trace: res.trace });
  },
);

const index = program.command("index").description("Query the archive index");

function printIndex(format: OutputFormat, res: IndexCommandResult): void {
  const logger = createLogger(format);
  if (!res.ok) fail(logger, res);
  if (format === "jsonl") {
    for (const row of res.rows) process.stdout.write(JSON.stringify(row) + "\n");
  } else {
    process.stdout.write(res.tsv);
  }
}

common(index.command("create").description("Create the index table").option("--db <path>", "SQLite index file")).action(
  async (opts: CommonOpts & { db?: string }) => {
    const res = await indexCreate({ configDir: opts.config, envName: opts.env, indexPath: opts.db });
    const logger = createLogger(opts.format);
    if (!res.ok) fail(logger, res);
    logger.info("OK", "Index ready");
  },
);

common(index.command("dump").description("Print every indexed row as TSV").option("--db <path>", "SQLite index file")).action(
  async (opts: CommonOpts & { db?: string }) => {
    printIndex(opts.format, await indexDump({ configDir: opts.config, envName: opts.env, indexPath: opts.db }));
  },
);

common(
  index
    .command("search")
    .description("Find archives by file, bundle name, local path or archive id")
    .argument("<term>", "Substring to look for")
    .option("--db <path>", "SQLite index file"),
).action(async (term: string, opts: CommonOpts & { db?: string }) => {
  printIndex(opts.format, await indexSearch({ term, configDir: opts.config, envName: opts.env, indexPath: opts.db }));
});

common(
  index
    .command("import")
    .description("Add the newest manifest of each directory to the index")
    .argument("<dirs...>", "Directories holding archive manifests")
    .option("--db <path>", "SQLite index file"),
).action(async (dirs: string[], opts: CommonOpts & { db?: string }) => {
  const logger = createLogger(opts.format);
  printIndex(opts.format, await indexImport({ dirs, configDir: opts.config, envName: opts.env, indexPath: opts.db, logger }));
});

program
  .command("validate")
  .description("Validate config layers and (optionally) the manifests in a directory")
  .option("--config <path>", "Path to config directory", DEFAULT_CONFIG_DIR)
  .option("--manifests <dir>", "Directory whose archive manifests to validate")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
  .action(async (opts: { config: string; manifests?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, manifestsDir: opts.manifests });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) {
          process.stdout.write(JSON.stringify(err) + "\n");
        }
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", checked: res.checked }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.OPERATION_FAILED);
});
