import type { DependencyGraph } from "../types/deps.js";
import type { JsonObject, ManifestFormat } from "../types/manifest.js";
import { isJsonObject } from "./document.js";

export type ManifestUpdate = {
  productKey: string;
  depsKey: string;
  versionFields: string[];
  version: string;
  graph: DependencyGraph;
  /** Written for entries whose hash is not known yet. */
  placeholder: string;
};

export function renderDeps(graph: DependencyGraph, placeholder: string): JsonObject {
  const deps: JsonObject = {};
  for (const entry of graph) {
    const persisted: JsonObject = { url: entry.url, rev: entry.rev, hash: entry.hash ?? placeholder };
    if (entry.condition) persisted.condition = entry.condition;
    deps[entry.path] = persisted;
  }
  return deps;
}

/**
 * Return a copy of the manifest with the version fields and the dependency
 * subtree replaced. Every other field, and the key order, is carried over.
 */
export function applyResolution(data: JsonObject, update: ManifestUpdate): JsonObject {
  const current = data[update.productKey];
  const product = isJsonObject(current) ? current : {};
  const deps = renderDeps(update.graph, update.placeholder);

  const next: JsonObject = {};
  for (const [key, value] of Object.entries(product)) {
    if (update.versionFields.includes(key)) next[key] = update.version;
    else if (key === update.depsKey) next[key] = deps;
    else next[key] = value;
  }
  for (const field of update.versionFields) {
    if (!Object.hasOwn(next, field)) next[field] = update.version;
  }
  if (!Object.hasOwn(next, update.depsKey)) next[update.depsKey] = deps;

  return { ...data, [update.productKey]: next };
}

export function renderManifest(data: JsonObject, format: ManifestFormat): string {
  return JSON.stringify(data, null, format.indent) + (format.trailingNewline ? "\n" : "");
}
