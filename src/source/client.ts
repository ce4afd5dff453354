/**
 * Read-only access to the source-control service hosting the dependency
 * tree. The production implementation talks to Gitiles over HTTPS; tests
 * substitute an in-memory fixture.
 */
export interface SourceClient {
  /** Raw response body of the tag metadata query, guard line included. */
  lookupTag(repoUrl: string, tag: string, signal?: AbortSignal): Promise<string>;
  /** Decoded text of `depsFile` at `rev`. */
  fetchDeps(repoUrl: string, rev: string, depsFile: string, signal?: AbortSignal): Promise<string>;
  /** Download the gzipped tar archive of the tree at `rev` into the file `dest`. */
  fetchBlob(repoUrl: string, rev: string, dest: string, signal?: AbortSignal): Promise<void>;
}
