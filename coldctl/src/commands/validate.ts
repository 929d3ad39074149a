import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadConfig } from "../config/loader.js";
import { errorMessage } from "../core/errors.js";
import { ManifestStore } from "../manifest/store.js";
import { createRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

function listYamlFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".yaml"))
    .map((e) => path.join(dir, e.name))
    .sort();
}

/**
 * Validate every config layer (base.yaml alone and base.yaml under each
 * override file) and, optionally, the sidecar manifests in a directory.
 */
export async function validateAll(opts: {
  configDir: string;
  manifestsDir?: string;
  schemaDir?: string;
  archiveName?: string;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const checked: string[] = [];
  const configDir = path.resolve(opts.configDir);

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  const files = listYamlFiles(configDir);
  if (!files.some((f) => path.basename(f) === "base.yaml")) {
    errors.push(diag("error", "CONFIG_NO_BASE", `No base.yaml in config dir: ${configDir}`, { path: configDir }));
  }

  let archiveName = opts.archiveName;
  for (const file of files) {
    const rel = path.relative(process.cwd(), file);
    try {
      YAML.parse(fs.readFileSync(file, "utf8"));
    } catch (e: unknown) {
      errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config (${rel}): ${errorMessage(e)}`, { path: file }));
      continue;
    }

    const stem = path.basename(file).replace(/\.yaml$/, "");
    const envName = stem === "base" ? undefined : stem;
    try {
      // No COLDCTL_* overrides: each file is checked as written.
      const config = await loadConfig(envName, configDir, {});
      archiveName ??= config.archive_name;
      checked.push(file);
    } catch (e: unknown) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid (${rel}): ${errorMessage(e)}`, { path: file }));
    }
  }

  if (opts.manifestsDir) {
    const manifestsDir = path.resolve(opts.manifestsDir);
    const registry = await createRegistry(opts.schemaDir);
    const store = new ManifestStore(archiveName ?? "coldarchive", registry);
    const sidecars = await store.listSidecars(manifestsDir);
    if (sidecars.length === 0) {
      errors.push(diag("error", "MANIFEST_NOT_FOUND", `No archive manifest found in ${manifestsDir}`, { path: manifestsDir }));
    }
    for (const sidecar of sidecars) {
      try {
        await store.read(sidecar);
        checked.push(sidecar);
      } catch (e: unknown) {
        errors.push(diag("error", "MANIFEST_INVALID", errorMessage(e), { path: sidecar }));
      }
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
