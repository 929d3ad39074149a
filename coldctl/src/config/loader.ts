import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ArchiveError } from "../core/errors.js";
import type { ColdctlConfig } from "../types/config.js";
import { parseConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");
const ENV_PREFIX = "COLDCTL_";

type ConfigTree = Record<string, unknown>;

function isTree(v: unknown): v is ConfigTree {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val) && isTree(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return isTree(parsed) ? parsed : {};
}

/** Numeric strings become numbers where the layered value is already numeric. */
function coerce(value: string, current: unknown): unknown {
  if (typeof current === "number" && value.trim() !== "" && !Number.isNaN(Number(value))) return Number(value);
  if (typeof current === "boolean") return value === "true" || value === "1";
  return value;
}

/**
 * Apply COLDCTL_ prefixed environment variable overrides.
 * A double underscore descends one level: COLDCTL_COLD_STORAGE__BUCKET → cold_storage.bucket.
 */
function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv): ConfigTree {
  const result = deepMerge({}, config);
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf) continue;

    let node = result;
    for (const segment of segments) {
      const child = node[segment];
      const next: ConfigTree = isTree(child) ? { ...child } : {};
      node[segment] = next;
      node = next;
    }
    node[leaf] = coerce(value, node[leaf]);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables, then validate it.
 *
 * @param envName - Optional environment name (e.g., "deep-archive").
 *                  Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export async function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Promise<ColdctlConfig> {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  // Layer 1: base.yaml
  const base = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  merged = applyEnvOverrides(merged, env);

  const result = await parseConfig(merged);
  if (!result.ok) {
    throw new ArchiveError("InvalidConfig", `Invalid configuration in ${dir}: ${result.errors}`, { subject: dir });
  }
  return result.config;
}
