import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import type { PinConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
const ENV_PREFIX = "PINCTL_";

type ConfigLayer = Record<string, unknown>;

function isPlainObject(val: unknown): val is ConfigLayer {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Build an override layer from PINCTL_ prefixed environment variables.
 * PINCTL_MANIFEST_PATH → manifest_path, PINCTL_NETWORK__CONCURRENCY → network.concurrency.
 * Values are read as YAML scalars, so "4" becomes a number and "false" a boolean.
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let target = layer;
    for (const segment of segments.slice(0, -1)) {
      const next = target[segment];
      if (isPlainObject(next)) {
        target = next;
      } else {
        const created: ConfigLayer = {};
        target[segment] = created;
        target = created;
      }
    }
    target[segments[segments.length - 1]] = YAML.parse(value);
  }
  return layer;
}

export type LoadConfigOptions = {
  /** Loads `config/{envName}.yaml` as an override layer. */
  envName?: string;
  configDir?: string;
  /** Highest-precedence layer, usually built from CLI flags. */
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← {env}.yaml ← PINCTL_* variables ← overrides.
 * Throws ConfigError when the merged result does not validate.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<PinConfig> {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = deepMerge(merged, envOverrides(opts.env));
  if (opts.overrides) {
    merged = deepMerge(merged, opts.overrides);
  }

  const result = await validateConfig(merged);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration: ${result.errors}`);
  }
  return result.config;
}
