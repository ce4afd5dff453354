import { ParseError } from "../core/errors.js";
import { isCommitRef } from "../source/revision-lookup.js";
import type { CommitRef } from "../types/deps.js";

const VAR_REFERENCE = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Expand `{name}` references against a DEPS file's vars (`{{` and `}}` are literal braces). */
export function formatVars(template: string, vars: Record<string, string | boolean>, location: string): string {
  return template.replace(VAR_REFERENCE, (match, name: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (name === undefined || !Object.hasOwn(vars, name)) {
      throw new ParseError(`Undefined variable ${match}`, location);
    }
    const value = vars[name];
    if (typeof value === "boolean") return value ? "True" : "False";
    return value;
  });
}

/** Split `url@rev`. The revision must be a full commit id. */
export function splitPinnedUrl(value: string, location: string): { url: string; rev: CommitRef } {
  const at = value.lastIndexOf("@");
  if (at === -1) {
    throw new ParseError(`Dependency is not pinned to a revision: ${value}`, location);
  }
  const url = value.slice(0, at);
  const rev = value.slice(at + 1);
  if (!isCommitRef(rev)) {
    throw new ParseError(`Dependency is not pinned to a commit id: ${value}`, location);
  }
  return { url, rev };
}

/**
 * Drop fetch decorations that do not change what gets fetched: a `git+`
 * scheme prefix, user info and trailing slashes.
 */
export function normalizeUrl(url: string): string {
  return url
    .trim()
    .replace(/^git\+/, "")
    .replace(/^([a-z][a-z0-9+.-]*:\/\/)[^@/]+@/i, "$1")
    .replace(/\/+$/, "");
}
