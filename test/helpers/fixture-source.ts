import { writeFile } from "node:fs/promises";
import { NotFoundError } from "../../src/core/errors.js";
import type { SourceClient } from "../../src/source/client.js";

/** Gitiles-shaped tag response for `commit`. */
export function tagBody(commit: string): string {
  return `)]}'\n${JSON.stringify({ commit, tree: "0".repeat(40), parents: [] })}\n`;
}

export type FixtureRepo = {
  tags?: Record<string, string>;
  /** `${rev}:${depsFile}` → DEPS source. */
  deps?: Record<string, string>;
  /** rev → archive bytes. */
  archives?: Record<string, Buffer>;
};

/**
 * In-memory SourceClient keyed by repository URL. Every call is recorded
 * in `calls` and may be delayed per resource to shuffle completion order.
 */
export class FixtureSource implements SourceClient {
  readonly calls: string[] = [];

  constructor(
    private readonly repos: Record<string, FixtureRepo>,
    private readonly delays: Record<string, number> = {},
  ) {}

  async lookupTag(repoUrl: string, tag: string): Promise<string> {
    this.calls.push(`tag ${repoUrl} ${tag}`);
    const commit = this.repos[repoUrl]?.tags?.[tag];
    if (!commit) throw new NotFoundError(`Not found upstream: tag ${tag}`, `tag ${tag}`);
    return tagBody(commit);
  }

  async fetchDeps(repoUrl: string, rev: string, depsFile: string): Promise<string> {
    this.calls.push(`deps ${repoUrl} ${rev} ${depsFile}`);
    await this.delay(`${rev}:${depsFile}`);
    const source = this.repos[repoUrl]?.deps?.[`${rev}:${depsFile}`];
    if (source === undefined) throw new NotFoundError(`Not found upstream: ${depsFile} at ${rev}`, depsFile);
    return source;
  }

  async fetchBlob(repoUrl: string, rev: string, dest: string): Promise<void> {
    this.calls.push(`blob ${repoUrl} ${rev}`);
    await this.delay(rev);
    const archive = this.repos[repoUrl]?.archives?.[rev];
    if (!archive) throw new NotFoundError(`Not found upstream: archive ${rev}`, `archive ${rev}`);
    await writeFile(dest, archive);
  }

  private async delay(key: string): Promise<void> {
    const ms = this.delays[key];
    if (ms) await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export const SRC_URL = "https://chromium.googlesource.com/chromium/src.git";
export const V8_URL = "https://chromium.googlesource.com/v8/v8.git";

export const REV_A = "a".repeat(40);
export const REV_B = "b".repeat(40);
export const REV_C = "c".repeat(40);
