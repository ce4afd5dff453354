import { ParseError } from "../core/errors.js";
import type { CommitRef } from "../types/deps.js";
import type { SourceClient } from "./client.js";

const VERSION_TAG = /^\d+(\.\d+)*$/;
export const COMMIT_REF = /^[0-9a-f]{40}$/;

export function isVersionTag(value: string): boolean {
  return VERSION_TAG.test(value);
}

export function isCommitRef(value: string): value is CommitRef {
  return COMMIT_REF.test(value);
}

/**
 * Parse a Gitiles JSON envelope. The first line is an XSSI guard (`)]}'`)
 * and is dropped before the rest is parsed.
 */
export function parseTagResponse(body: string, tag: string): CommitRef {
  const newline = body.indexOf("\n");
  const json = newline === -1 ? "" : body.slice(newline + 1);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new ParseError(`Malformed tag metadata for ${tag}`, "body");
  }

  if (parsed === null || typeof parsed !== "object" || !("commit" in parsed)) {
    throw new ParseError(`Tag metadata for ${tag} has no commit`, "commit");
  }
  const commit = parsed.commit;
  if (typeof commit !== "string" || !isCommitRef(commit)) {
    throw new ParseError(`Tag ${tag} resolved to an invalid commit id: ${String(commit)}`, "commit");
  }
  return commit;
}

/** Resolve a version tag to the commit it points at. */
export async function lookupRevision(
  client: SourceClient,
  repoUrl: string,
  tag: string,
  signal?: AbortSignal,
): Promise<CommitRef> {
  if (!isVersionTag(tag)) {
    throw new ParseError(`Not a version tag: "${tag}"`, "version");
  }
  const body = await client.lookupTag(repoUrl, tag, signal);
  return parseTagResponse(body, tag);
}
