import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { ColdctlConfig } from "../types/config.js";

const STORAGE_CLASSES = ["STANDARD", "STANDARD_IA", "GLACIER_IR", "GLACIER", "DEEP_ARCHIVE"];

/** Node timers cannot wait longer than 2^31 - 1 ms. */
export const MAX_POLL_SECONDS = 2147483;

/** Config schema: required fields, enums and numeric bounds. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "archive_name",
    "size_limit_bytes",
    "fingerprint_algorithm",
    "integrity_mode",
    "enumeration",
    "bundle",
    "cold_storage",
    "remote_archive",
    "restore",
    "index",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    archive_name: { type: "string", pattern: "^[A-Za-z0-9_-]+$" },
    owner: { type: "string" },
    size_limit_bytes: { type: "number", exclusiveMinimum: 0 },
    fingerprint_algorithm: { type: "string", enum: ["md5", "sha256"] },
    integrity_mode: { type: "string", enum: ["set", "path"] },
    enumeration: {
      type: "object",
      required: ["concurrency", "exclude"],
      properties: {
        concurrency: { type: "integer", minimum: 1 },
        exclude: { type: "array", items: { type: "string" } },
      },
    },
    bundle: {
      type: "object",
      required: ["compression_level"],
      properties: {
        compression_level: { type: "integer", minimum: 0, maximum: 9 },
      },
    },
    cold_storage: {
      type: "object",
      required: ["bucket", "region", "storage_class", "multipart_threshold_mb", "multipart_chunk_mb", "max_concurrency"],
      properties: {
        bucket: { type: "string" },
        region: { type: "string" },
        storage_class: { type: "string", enum: STORAGE_CLASSES },
        multipart_threshold_mb: { type: "integer", minimum: 5 },
        multipart_chunk_mb: { type: "integer", minimum: 5 },
        max_concurrency: { type: "integer", minimum: 1 },
      },
    },
    remote_archive: {
      type: "object",
      required: ["endpoint", "path"],
      properties: {
        endpoint: { type: "string" },
        path: { type: "string" },
      },
    },
    restore: {
      type: "object",
      required: ["poll_interval_seconds", "timeout_seconds", "days", "retrieval_tier"],
      properties: {
        poll_interval_seconds: { type: "number", minimum: 0, maximum: MAX_POLL_SECONDS },
        timeout_seconds: { type: "number", exclusiveMinimum: 0 },
        days: { type: "integer", minimum: 1 },
        retrieval_tier: { type: "string", enum: ["Bulk", "Standard", "Expedited"] },
      },
    },
    index: {
      type: "object",
      required: ["path", "table"],
      properties: {
        path: { type: "string" },
        table: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
      },
    },
  },
};

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

export type ConfigParseResult = { ok: true; config: ColdctlConfig } | { ok: false; errors: string };

let compiled: AjvValidateFn<ColdctlConfig> | null = null;
let errorsText: ((errors: unknown) => string) | null = null;

async function validator(): Promise<{ validate: AjvValidateFn<ColdctlConfig>; errorsText: (errors: unknown) => string }> {
  if (!compiled || !errorsText) {
    const ajv = await loadAjv();
    compiled = ajv.compile<ColdctlConfig>(CONFIG_SCHEMA);
    errorsText = (errors) => ajv.errorsText(errors);
  }
  return { validate: compiled, errorsText };
}

/** Validate a loaded config and return it typed. */
export async function parseConfig(config: unknown): Promise<ConfigParseResult> {
  const { validate, errorsText: text } = await validator();
  if (validate(config)) return { ok: true, config };
  return { ok: false, errors: text(validate.errors) };
}

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const result = await parseConfig(config);
  return {
    valid: result.ok,
    errors: result.ok ? null : result.errors,
  };
}
