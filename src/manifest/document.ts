import fs from "node:fs/promises";
import { ParseError } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { JsonObject, JsonValue, ManifestDepEntry, ManifestDeps, ManifestDocument, ManifestFormat } from "../types/manifest.js";

const DEFAULT_FORMAT: ManifestFormat = { indent: 2, trailingNewline: true };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

/** Indentation and trailing newline of an existing JSON file. */
export function detectFormat(raw: string): ManifestFormat {
  const indentMatch = /^([ \t]+)\S/m.exec(raw);
  let indent: string | number = DEFAULT_FORMAT.indent;
  if (indentMatch) {
    const ws = indentMatch[1];
    indent = ws.includes("\t") ? ws : ws.length;
  }
  return { indent, trailingNewline: raw.length === 0 ? true : raw.endsWith("\n") };
}

export function parseManifest(raw: string, filePath: string): JsonObject {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ParseError(`Manifest ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, filePath);
  }
  if (!isJsonObject(parsed)) {
    throw new ParseError(`Manifest ${filePath} must contain a JSON object`, filePath);
  }
  return parsed;
}

/** Read the manifest once. A missing file reads as an empty document. */
export async function readManifest(filePath: string): Promise<ManifestDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      return { data: {}, format: DEFAULT_FORMAT, raw: null };
    }
    throw e;
  }
  return { data: parseManifest(raw, filePath), format: detectFormat(raw), raw };
}

function toDepEntry(value: JsonValue): ManifestDepEntry | null {
  if (!isJsonObject(value)) return null;
  const { url, rev, hash, condition } = value;
  if (typeof url !== "string" || typeof rev !== "string" || typeof hash !== "string") return null;
  const entry: ManifestDepEntry = { url, rev, hash };
  if (typeof condition === "string") entry.condition = condition;
  return entry;
}

/**
 * Dependency subtree of `productKey`, validated against the manifest-deps
 * schema. Absent subtrees read as empty.
 */
export function readManifestDeps(
  data: JsonObject,
  productKey: string,
  depsKey: string,
  registry: SchemaRegistry,
): ManifestDeps {
  const product = data[productKey];
  if (product === undefined) return {};
  if (!isJsonObject(product)) {
    throw new ParseError(`"${productKey}" must be an object`, productKey);
  }
  const subtree = product[depsKey];
  if (subtree === undefined) return {};

  const { valid, errors } = registry.validate("manifest-deps", subtree);
  if (!valid || !isJsonObject(subtree)) {
    throw new ParseError(`Invalid dependency subtree: ${errors ?? "not an object"}`, `${productKey}.${depsKey}`);
  }

  const deps: ManifestDeps = {};
  for (const [depPath, value] of Object.entries(subtree)) {
    const entry = toDepEntry(value);
    if (entry) deps[depPath] = entry;
  }
  return deps;
}
