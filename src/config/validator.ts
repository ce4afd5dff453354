import { compileCheck, loadAjv } from "../schema/ajv.js";
import type { PinConfig } from "../types/config.js";

const SRI_SHA256 = "^sha256-[A-Za-z0-9+/]{43}=$";

/** Config schema: every key is required once the layers are merged. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "manifest_path",
    "product_key",
    "deps_key",
    "version_fields",
    "root",
    "hash",
    "conditions",
    "recurse",
    "exclude",
    "network",
    "fix_hashes",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manifest_path: { type: "string", minLength: 1 },
    product_key: { type: "string", minLength: 1 },
    deps_key: { type: "string", minLength: 1 },
    version_fields: { type: "array", items: { type: "string", minLength: 1 } },
    root: {
      type: "object",
      required: ["path", "url", "deps_file"],
      properties: {
        path: { type: "string", minLength: 1 },
        url: { type: "string", format: "uri" },
        deps_file: { type: "string", minLength: 1 },
      },
    },
    hash: {
      type: "object",
      required: ["mode", "placeholder"],
      properties: {
        mode: { type: "string", enum: ["compute", "placeholder"] },
        placeholder: { type: "string", pattern: SRI_SHA256 },
      },
    },
    conditions: {
      type: "object",
      required: ["mode", "vars"],
      properties: {
        mode: { type: "string", enum: ["passthrough", "evaluate"] },
        vars: {
          type: "object",
          additionalProperties: { anyOf: [{ type: "string" }, { type: "boolean" }] },
        },
      },
    },
    recurse: { type: "boolean" },
    exclude: { type: "array", items: { type: "string" } },
    network: {
      type: "object",
      required: ["timeout_ms", "retries", "backoff_ms", "concurrency"],
      properties: {
        timeout_ms: { type: "integer", minimum: 1 },
        retries: { type: "integer", minimum: 0 },
        backoff_ms: { type: "integer", minimum: 0 },
        concurrency: { type: "integer", minimum: 1 },
      },
    },
    fix_hashes: {
      type: "object",
      required: ["build_command", "max_iterations"],
      properties: {
        build_command: { type: "string", minLength: 1 },
        max_iterations: { type: "integer", minimum: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: PinConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const result = compileCheck<PinConfig>(await loadAjv(), CONFIG_SCHEMA)(config);
  return result.valid ? { valid: true, config: result.value, errors: null } : result;
}
