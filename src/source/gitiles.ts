import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { CancelledError, NotFoundError, TransportError, describeError } from "../core/errors.js";
import { withRetry, type RetryPolicy } from "../core/retry.js";
import type { SourceClient } from "./client.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GitilesClientOptions {
  timeoutMs: number;
  retry: RetryPolicy;
  fetchImpl?: FetchLike;
  onRetry?: (url: string, attempt: number, error: unknown) => void;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function tagUrl(repoUrl: string, tag: string): string {
  return `${stripTrailingSlash(repoUrl)}/+/refs/tags/${encodeURIComponent(tag)}?format=JSON`;
}

export function depsUrl(repoUrl: string, rev: string, depsFile: string): string {
  return `${stripTrailingSlash(repoUrl)}/+/${rev}/${depsFile}?format=TEXT`;
}

export function archiveUrl(repoUrl: string, rev: string): string {
  return `${stripTrailingSlash(repoUrl)}/+archive/${rev}.tar.gz`;
}

/**
 * Gitiles-backed SourceClient. Every request gets its own timeout and is
 * retried on TransportError only.
 */
export class GitilesClient implements SourceClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: GitilesClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async lookupTag(repoUrl: string, tag: string, signal?: AbortSignal): Promise<string> {
    return this.request(tagUrl(repoUrl, tag), `tag ${tag}`, (res) => res.text(), signal);
  }

  async fetchDeps(repoUrl: string, rev: string, depsFile: string, signal?: AbortSignal): Promise<string> {
    const body = await this.request(depsUrl(repoUrl, rev, depsFile), `${depsFile} at ${rev}`, (res) => res.text(), signal);
    // format=TEXT returns the blob base64-encoded
    return Buffer.from(body.trim(), "base64").toString("utf8");
  }

  /** Streams the archive to `dest`; a retried attempt rewrites the file from the start. */
  async fetchBlob(repoUrl: string, rev: string, dest: string, signal?: AbortSignal): Promise<void> {
    const url = archiveUrl(repoUrl, rev);
    await this.request(
      url,
      `archive ${rev}`,
      async (res) => {
        if (!res.body) throw new TransportError(`Empty response body from ${url}`);
        await pipeline(Readable.fromWeb(res.body), createWriteStream(dest));
      },
      signal,
    );
  }

  private request<T>(url: string, resource: string, read: (res: Response) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(() => this.requestOnce(url, resource, read, signal), this.options.retry, {
      signal,
      onRetry: (attempt, error) => this.options.onRetry?.(url, attempt, error),
    });
  }

  private async requestOnce<T>(
    url: string,
    resource: string,
    read: (res: Response) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    if (signal?.aborted) throw new CancelledError();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { signal: controller.signal });
      } catch (e) {
        if (signal?.aborted) throw new CancelledError();
        if (timedOut) {
          throw new TransportError(`Request timed out after ${this.options.timeoutMs}ms: ${url}`);
        }
        throw new TransportError(`Request failed: ${url}: ${describeError(e)}`, undefined, { cause: e });
      }

      if (response.status === 404) {
        throw new NotFoundError(`Not found upstream: ${resource} (${url})`, resource);
      }
      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} from ${url}`, response.status);
      }

      try {
        return await read(response);
      } catch (e) {
        if (signal?.aborted) throw new CancelledError();
        if (e instanceof TransportError) throw e;
        if (timedOut) {
          throw new TransportError(`Request timed out after ${this.options.timeoutMs}ms: ${url}`);
        }
        throw new TransportError(`Failed reading response body from ${url}: ${describeError(e)}`, undefined, { cause: e });
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
