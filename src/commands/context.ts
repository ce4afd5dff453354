import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { describeError, isPinError } from "../core/errors.js";
import type { Reporter } from "../output/reporter.js";
import { GitilesClient } from "../source/gitiles.js";
import { isVersionTag } from "../source/revision-lookup.js";
import type { PinConfig } from "../types/config.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

/** Flags every command shares. */
export type CommonOpts = {
  configDir?: string;
  env?: string;
  manifest?: string;
  /** Config layer built from command-specific flags. */
  overrides?: Record<string, unknown>;
  /** Defaults to process.env. */
  environ?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type CommandFailure = { ok: false; error: string; kind: string; exitCode: ExitCode };

export type CommandContext = {
  config: PinConfig;
  manifestPath: string;
};

export async function loadContext(opts: CommonOpts): Promise<CommandContext> {
  const config = await loadConfig({
    configDir: opts.configDir,
    envName: opts.env,
    overrides: opts.overrides,
    env: opts.environ,
  });
  const manifestPath = path.resolve(opts.cwd ?? process.cwd(), opts.manifest ?? config.manifest_path);
  return { config, manifestPath };
}

export function createClient(config: PinConfig, reporter: Reporter): GitilesClient {
  return new GitilesClient({
    timeoutMs: config.network.timeout_ms,
    retry: { retries: config.network.retries, backoffMs: config.network.backoff_ms },
    onRetry: (url, attempt, error) =>
      reporter.warn("RETRY", `Retry ${attempt}/${config.network.retries} for ${url}: ${describeError(error)}`, {
        url,
        attempt,
      }),
  });
}

export function toFailure(e: unknown): CommandFailure {
  const kind = isPinError(e) ? e.kind : "Error";
  return { ok: false, error: describeError(e), kind, exitCode: exitCodeFor(kind) };
}

/** Rejects a `<version>` argument that is not a dotted numeric tag before anything is fetched. */
export function checkVersionArg(version: string): CommandFailure | null {
  if (isVersionTag(version)) return null;
  return { ok: false, error: `Not a version tag: "${version}"`, kind: "ParseError", exitCode: EXIT.INVALID_ARGS };
}
