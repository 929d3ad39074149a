import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type ValidationOutcome = { valid: boolean; errors: string | null };

const SCHEMA_SUFFIX = ".schema.json";

/**
 * Schema registry: the `*.schema.json` documents of one directory, compiled
 * lazily and cached per name. Sidecar manifests are checked through it.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly compiled = new Map<string, AjvValidateFn>();

  private constructor(
    private readonly ajv: AjvInstance,
    entries: readonly SchemaEntry[],
  ) {
    for (const entry of entries) this.entries.set(entry.name, entry);
  }

  static async fromDirectory(schemaDir: string): Promise<SchemaRegistry> {
    const info = await stat(schemaDir).catch(() => null);
    if (!info?.isDirectory()) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }

    const files = (await readdir(schemaDir)).filter((f) => f.endsWith(SCHEMA_SUFFIX));
    const entries = await Promise.all(
      files.map(async (file): Promise<SchemaEntry> => {
        const filePath = path.join(schemaDir, file);
        const schema: unknown = JSON.parse(await readFile(filePath, "utf8"));
        return {
          name: file.slice(0, -SCHEMA_SUFFIX.length),
          version: versionFromId(schema) ?? "1.0.0",
          filePath,
          schema,
        };
      }),
    );

    return new SchemaRegistry(await loadAjv(), entries);
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  async validate(name: string, data: unknown): Promise<ValidationOutcome> {
    const check = this.validator(name);
    const valid = check(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(check.errors) };
  }

  /**
   * Validate `data` and hand it back typed. The caller names the type that the
   * schema describes; throws with the ajv error text when validation fails.
   */
  async parse<T>(name: string, data: unknown): Promise<T> {
    const check = this.validator(name);
    if (!conforms<T>(check, data)) {
      throw new Error(this.ajv.errorsText(check.errors));
    }
    return data;
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const check = this.ajv.compile(entry.schema);
    this.compiled.set(name, check);
    return check;
  }
}

function conforms<T>(check: AjvValidateFn, data: unknown): data is T {
  return check(data);
}

/** `https://.../manifest@1.0.0` → `1.0.0` */
function versionFromId(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(id);
  return m ? m[1] : null;
}

/** Load the registry from `schemaDir`, or from the package's bundled `schemas/`. */
export function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const dir = schemaDir ?? path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");
  return SchemaRegistry.fromDirectory(dir);
}
