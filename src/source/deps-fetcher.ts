import { ParseError } from "../core/errors.js";
import { parseDepsDocument } from "../deps/document.js";
import type { DepsDocument } from "../types/deps.js";
import type { SourceClient } from "./client.js";

/**
 * Fetch and parse one DEPS file. Nested DEPS files are not followed here;
 * the resolver drives those fetches.
 */
export async function fetchDepsDocument(
  client: SourceClient,
  repoUrl: string,
  rev: string,
  depsFile: string,
  signal?: AbortSignal,
): Promise<DepsDocument> {
  const source = await client.fetchDeps(repoUrl, rev, depsFile, signal);
  try {
    return parseDepsDocument(source);
  } catch (e) {
    if (e instanceof ParseError) {
      throw new ParseError(`Malformed ${depsFile} in ${repoUrl}@${rev}: ${e.message}`);
    }
    throw e;
  }
}
