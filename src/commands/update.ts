import { Orchestrator, type OrchestratorResult } from "../core/orchestrator.js";
import type { Reporter } from "../output/reporter.js";
import { SchemaRegistry } from "../schema/registry.js";
import type { SourceClient } from "../source/client.js";
import { checkVersionArg, createClient, loadContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";
import { exitCodeFor } from "./exit-codes.js";

export type UpdateOpts = CommonOpts & {
  version: string;
  reporter: Reporter;
  signal?: AbortSignal;
  /** Replaces the Gitiles client, mainly for tests. */
  client?: SourceClient;
  schemaDir?: string;
};

export type UpdateResult = ({ ok: true } | CommandFailure) & { result?: OrchestratorResult };

/** Resolve `version` and rewrite the manifest's dependency subtree. */
export async function update(opts: UpdateOpts): Promise<UpdateResult> {
  const { reporter } = opts;
  const invalid = checkVersionArg(opts.version);
  if (invalid) return invalid;
  let result: OrchestratorResult;
  try {
    const { config, manifestPath } = await loadContext(opts);
    const registry = await SchemaRegistry.load(opts.schemaDir);
    const orchestrator = new Orchestrator({
      client: opts.client ?? createClient(config, reporter),
      config,
      registry,
      manifestPath,
      onProgress: (event) => reporter.progress(event),
    });
    result = await orchestrator.run({ version: opts.version, signal: opts.signal });
  } catch (e) {
    return toFailure(e);
  }

  for (const skip of result.skipped) {
    reporter.info("SKIPPED", `Skipped ${skip.path} (${skip.reason}${skip.detail ? `: ${skip.detail}` : ""})`, { ...skip });
  }

  if (!result.success) {
    const kind = result.error?.kind ?? "Error";
    return {
      ok: false,
      error: result.error?.message ?? `Run ended in ${result.status}`,
      kind,
      exitCode: exitCodeFor(kind),
      result,
    };
  }
  return { ok: true, result };
}
