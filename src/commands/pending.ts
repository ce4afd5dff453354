import fs from "node:fs/promises";
import { NotFoundError } from "../core/errors.js";
import { describeEntry, findPlaceholderEntries } from "../hash-fixer/entries.js";
import { parseManifest } from "../manifest/document.js";
import { loadContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";

export type PendingEntry = {
  location: string;
  rev: string;
  description: string;
};

export type PendingResult = { ok: true; manifestPath: string; entries: PendingEntry[] } | CommandFailure;

/** Entries anywhere in the manifest that still carry the placeholder hash. */
export async function pending(opts: CommonOpts): Promise<PendingResult> {
  try {
    const { config, manifestPath } = await loadContext(opts);
    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        throw new NotFoundError(`Manifest not found: ${manifestPath}`, manifestPath);
      }
      throw e;
    }
    const data = parseManifest(raw, manifestPath);
    const entries = findPlaceholderEntries(data, config.hash.placeholder).map(({ location, entry }) => {
      const rev = typeof entry.rev === "string" ? entry.rev : "";
      return { location, rev, description: describeEntry(entry, rev) };
    });
    return { ok: true, manifestPath, entries };
  } catch (e) {
    return toFailure(e);
  }
}
