import { fixHashes as runFixer, type BuildRunner, type FixHashesResult } from "../hash-fixer/fixer.js";
import type { Reporter } from "../output/reporter.js";
import { loadContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type FixHashesOpts = CommonOpts & {
  reporter: Reporter;
  /** Overrides fix_hashes.build_command. */
  buildCommand?: string;
  maxIterations?: number;
  dryRun?: boolean;
  backup?: boolean;
  verbose?: boolean;
  signal?: AbortSignal;
  runBuild?: BuildRunner;
  now?: () => Date;
};

export type FixHashesCommandResult = ({ ok: true } | CommandFailure) & { result?: FixHashesResult };

export async function fixHashes(opts: FixHashesOpts): Promise<FixHashesCommandResult> {
  let result: FixHashesResult;
  try {
    const { config, manifestPath } = await loadContext(opts);
    result = await runFixer({
      manifestPath,
      buildCommand: opts.buildCommand ?? config.fix_hashes.build_command,
      maxIterations: opts.maxIterations ?? config.fix_hashes.max_iterations,
      placeholder: config.hash.placeholder,
      dryRun: opts.dryRun,
      backup: opts.backup,
      verbose: opts.verbose,
      reporter: opts.reporter,
      runBuild: opts.runBuild,
      signal: opts.signal,
      now: opts.now,
    });
  } catch (e) {
    return toFailure(e);
  }

  if (!result.success) {
    return { ok: false, error: `Hash fixing stopped: ${result.outcome}`, kind: "Error", exitCode: EXIT.FAILED, result };
  }
  return { ok: true, result };
}
