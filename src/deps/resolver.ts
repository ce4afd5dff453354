import { posix } from "node:path";
import { minimatch } from "minimatch";
import { CancelledError, HashComputeError, ParseError } from "../core/errors.js";
import { mapWithConcurrency } from "../core/pool.js";
import { hashArchive } from "../hashing/archive.js";
import { isSriSha256 } from "../hashing/checksum.js";
import type { SourceClient } from "../source/client.js";
import { fetchDepsDocument } from "../source/deps-fetcher.js";
import type { ConditionsConfig, HashMode, RootConfig } from "../types/config.js";
import type { CommitRef, DependencyEntry, DependencyGraph, DepsDocument } from "../types/deps.js";
import type { ManifestDeps } from "../types/manifest.js";
import { combineConditions, evaluateCondition } from "./condition.js";
import { formatVars, normalizeUrl, splitPinnedUrl } from "./url.js";

export type SkippedDep = {
  path: string;
  reason: "non_git" | "condition" | "excluded";
  detail?: string;
};

export type CollectOptions = {
  client: SourceClient;
  root: RootConfig;
  commit: CommitRef;
  conditions: ConditionsConfig;
  recurse: boolean;
  exclude: string[];
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
};

export type CollectedGraph = {
  entries: DependencyEntry[];
  skipped: SkippedDep[];
  documents: number;
};

/** A DEPS file waiting to be fetched, and the checkout it belongs to. */
type DepsSite = {
  checkoutPath: string;
  url: string;
  rev: CommitRef;
  depsFile: string;
  condition?: string;
  /** Vars of the enclosing DEPS files; they override the nested file's own. */
  inheritedVars: Record<string, string | boolean>;
};

function isExcluded(depPath: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(depPath, pattern, { dot: true }));
}

/**
 * Walk the DEPS graph from the root commit, level by level. Each level's
 * DEPS files are fetched concurrently; entries are merged in document order
 * so the outcome does not depend on fetch timing.
 */
export async function collectGraph(opts: CollectOptions): Promise<CollectedGraph> {
  const rootEntry: DependencyEntry = {
    path: opts.root.path,
    url: normalizeUrl(opts.root.url),
    rev: opts.commit,
    hash: null,
  };
  const entries = new Map<string, DependencyEntry>([[rootEntry.path, rootEntry]]);
  const skipped: SkippedDep[] = [];
  let documents = 0;

  let level: DepsSite[] = [
    {
      checkoutPath: rootEntry.path,
      url: rootEntry.url,
      rev: rootEntry.rev,
      depsFile: opts.root.deps_file,
      inheritedVars: {},
    },
  ];

  while (level.length > 0) {
    const docs = await mapWithConcurrency(
      level,
      opts.concurrency,
      (site) => {
        opts.onProgress?.(`Fetching ${site.depsFile} for ${site.checkoutPath}@${site.rev.slice(0, 12)}`);
        return fetchDepsDocument(opts.client, site.url, site.rev, site.depsFile, opts.signal);
      },
      opts.signal,
    );
    documents += docs.length;

    const nextLevel: DepsSite[] = [];
    level.forEach((site, i) => {
      const vars = { ...docs[i].vars, ...site.inheritedVars };
      const declared = addDocumentEntries(docs[i], vars, site, opts, entries, skipped);
      if (!opts.recurse) return;
      for (const recurse of docs[i].recursedeps) {
        const entry = declared.get(recurse.path);
        if (!entry) continue;
        nextLevel.push({
          checkoutPath: entry.path,
          url: entry.url,
          rev: entry.rev,
          depsFile: recurse.depsFile ?? "DEPS",
          condition: entry.condition,
          inheritedVars: vars,
        });
      }
    });
    level = nextLevel;
  }

  return { entries: [...entries.values()], skipped, documents };
}

/** Returns the git entries this document declared, keyed as the document names them. */
function addDocumentEntries(
  doc: DepsDocument,
  vars: Record<string, string | boolean>,
  site: DepsSite,
  opts: CollectOptions,
  entries: Map<string, DependencyEntry>,
  skipped: SkippedDep[],
): Map<string, DependencyEntry> {
  const declared = new Map<string, DependencyEntry>();

  for (const [key, dep] of Object.entries(doc.deps)) {
    const depPath = doc.useRelativePaths ? posix.join(site.checkoutPath, key) : key;
    const location = `${site.checkoutPath}/${site.depsFile}: ${key}`;

    if (isExcluded(depPath, opts.exclude)) {
      skipped.push({ path: depPath, reason: "excluded" });
      continue;
    }
    if (dep.type === "other") {
      skipped.push({ path: depPath, reason: "non_git", detail: dep.depType });
      continue;
    }

    if (opts.conditions.mode === "evaluate" && dep.condition) {
      let outcome: string;
      try {
        outcome = evaluateCondition(dep.condition, { ...vars, ...opts.conditions.vars });
      } catch (e) {
        if (e instanceof ParseError) throw new ParseError(`Bad condition "${dep.condition}": ${e.message}`, location);
        throw e;
      }
      if (outcome === "false") {
        skipped.push({ path: depPath, reason: "condition", detail: dep.condition });
        continue;
      }
    }

    // the root checkout is pinned by the tag lookup, not by any DEPS file
    if (depPath === opts.root.path) continue;

    if (entries.has(depPath)) {
      throw new ParseError(`Duplicate dependency path ${depPath}`, location);
    }

    const { url, rev } = splitPinnedUrl(formatVars(dep.url, vars, location), location);
    const condition = combineConditions(site.condition, dep.condition);
    const entry: DependencyEntry = { path: depPath, url: normalizeUrl(url), rev, hash: null };
    if (condition) entry.condition = condition;

    entries.set(depPath, entry);
    declared.set(key, entry);
  }

  return declared;
}

export type HashOptions = {
  client: SourceClient;
  mode: HashMode;
  placeholder: string;
  /** Dependency subtree of the manifest being replaced. */
  existing: ManifestDeps;
  concurrency: number;
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
};

/** Hash already pinned for exactly this url and revision, if any. */
function reusableHash(entry: DependencyEntry, existing: ManifestDeps, placeholder: string): string | null {
  if (!Object.hasOwn(existing, entry.path)) return null;
  const previous = existing[entry.path];
  if (previous.url !== entry.url || previous.rev !== entry.rev) return null;
  if (previous.hash === placeholder || !isSriSha256(previous.hash)) return null;
  return previous.hash;
}

/**
 * Fill in content hashes. Any single failure aborts the whole batch with a
 * HashComputeError naming the dependency.
 */
export async function computeHashes(entries: DependencyEntry[], opts: HashOptions): Promise<DependencyEntry[]> {
  let done = 0;
  return mapWithConcurrency(
    entries,
    opts.concurrency,
    async (entry) => {
      const reused = reusableHash(entry, opts.existing, opts.placeholder);
      if (reused || opts.mode === "placeholder") {
        return { ...entry, hash: reused };
      }
      try {
        const hash = await hashArchive(
          (file) => opts.client.fetchBlob(entry.url, entry.rev, file, opts.signal),
          opts.signal,
        );
        done++;
        opts.onProgress?.(`Hashed ${entry.path} (${done} fetched)`);
        return { ...entry, hash };
      } catch (e) {
        if (e instanceof CancelledError) throw e;
        throw new HashComputeError(entry.path, e);
      }
    },
    opts.signal,
  );
}

function comparePaths(a: DependencyEntry, b: DependencyEntry): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Keep only persisted fields, sort by path and re-assert the root entry's
 * revision against the commit the tag resolved to.
 */
export function finalizeGraph(entries: DependencyEntry[], root: RootConfig, commit: CommitRef): DependencyGraph {
  const graph = entries.map(({ path, url, rev, hash, condition }) => {
    const entry: DependencyEntry = { path, url, rev, hash };
    if (condition) entry.condition = condition;
    return entry;
  });

  const rootEntry = graph.find((e) => e.path === root.path);
  if (!rootEntry) {
    graph.push({ path: root.path, url: normalizeUrl(root.url), rev: commit, hash: null });
  } else if (rootEntry.rev !== commit) {
    rootEntry.rev = commit;
    rootEntry.hash = null;
  }

  return graph.sort(comparePaths);
}
