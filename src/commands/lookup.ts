import type { Reporter } from "../output/reporter.js";
import type { SourceClient } from "../source/client.js";
import { lookupRevision } from "../source/revision-lookup.js";
import type { CommitRef } from "../types/deps.js";
import { checkVersionArg, createClient, loadContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";

export type LookupOpts = CommonOpts & {
  version: string;
  reporter: Reporter;
  signal?: AbortSignal;
  client?: SourceClient;
};

export type LookupResult = { ok: true; version: string; repo: string; commit: CommitRef } | CommandFailure;

export async function lookup(opts: LookupOpts): Promise<LookupResult> {
  const invalid = checkVersionArg(opts.version);
  if (invalid) return invalid;
  try {
    const { config } = await loadContext(opts);
    const client = opts.client ?? createClient(config, opts.reporter);
    const commit = await lookupRevision(client, config.root.url, opts.version, opts.signal);
    return { ok: true, version: opts.version, repo: config.root.url, commit };
  } catch (e) {
    return toFailure(e);
  }
}
