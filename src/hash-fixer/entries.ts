import { isJsonObject } from "../manifest/document.js";
import type { JsonObject, JsonValue } from "../types/manifest.js";

export type LocatedEntry = {
  /** Dotted location inside the document, e.g. `chromium.DEPS.src/v8`. */
  location: string;
  entry: JsonObject;
};

function walk(value: JsonValue, location: string, visit: (found: LocatedEntry) => boolean): boolean {
  if (Array.isArray(value)) {
    return value.some((item, i) => walk(item, `${location}[${i}]`, visit));
  }
  if (!isJsonObject(value)) return false;
  if (typeof value.rev === "string" && typeof value.hash === "string") {
    if (visit({ location, entry: value })) return true;
  }
  return Object.entries(value).some(([key, child]) => walk(child, location ? `${location}.${key}` : key, visit));
}

/**
 * Every `{ rev, hash }` object in the document still carrying the
 * placeholder, wherever it sits (the DEPS subtree, tool pins, ...).
 */
export function findPlaceholderEntries(data: JsonObject, placeholder: string): LocatedEntry[] {
  const found: LocatedEntry[] = [];
  walk(data, "", (candidate) => {
    if (candidate.entry.hash === placeholder) found.push(candidate);
    return false;
  });
  return found;
}

/** First entry pinned at `rev` whose hash is still the placeholder. */
export function findPlaceholderByRev(data: JsonObject, rev: string, placeholder: string): LocatedEntry | null {
  let match: LocatedEntry | null = null;
  walk(data, "", (candidate) => {
    if (candidate.entry.rev !== rev || candidate.entry.hash !== placeholder) return false;
    match = candidate;
    return true;
  });
  return match;
}

/** Short human name for an entry: `owner/repo` or the Gitiles project path. */
export function describeEntry(entry: JsonObject, rev: string): string {
  const url = entry.url;
  if (typeof url !== "string") return `${rev.slice(0, 12)}...`;
  const github = /github\.com\/([^/]+\/[^/]+)/.exec(url);
  if (github) return github[1].replace(/\.git$/, "");
  const gitiles = /\.googlesource\.com\/(.+?)(?:\.git)?$/.exec(url);
  if (gitiles) return gitiles[1];
  return (url.split("/").pop() ?? url).replace(/\.git$/, "");
}
