#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { EXIT } from "./commands/exit-codes.js";
import type { CommandFailure } from "./commands/context.js";
import { fixHashes } from "./commands/fix-hashes.js";
import { lookup } from "./commands/lookup.js";
import { pending } from "./commands/pending.js";
import { update } from "./commands/update.js";
import { Reporter, type OutputFormat } from "./output/reporter.js";

type CommonFlags = {
  config?: string;
  env?: string;
  manifest?: string;
  format: OutputFormat;
};

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Expected human or jsonl.");
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Config directory (default: bundled config/)")
    .option("--env <name>", "Load config/<name>.yaml over base.yaml")
    .option("--manifest <path>", "Manifest file (default: manifest_path from config)")
    .addOption(new Option("--format <format>", "Output format: human|jsonl").argParser(parseFormat).default("human"));
}

function common(opts: CommonFlags) {
  return { configDir: opts.config, env: opts.env, manifest: opts.manifest };
}

function fail(reporter: Reporter, res: CommandFailure): never {
  reporter.error(res.kind.toUpperCase(), res.error, { exitCode: res.exitCode });
  process.exit(res.exitCode);
}

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

const program = new Command();

program
  .name("pinctl")
  .description("Pin a DEPS dependency graph into a content-addressed manifest")
  .version("0.1.0")
  .exitOverride((err) => {
    // commander's own usage errors
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

withCommonOptions(
  program
    .command("update")
    .description("Resolve a version tag and rewrite the manifest's dependency subtree")
    .argument("<version>", "Release tag, e.g. 120.0.6099.109"),
)
  .option("--concurrency <n>", "Parallel fetches", parsePositiveInt)
  .option("--placeholder-hashes", "Write the placeholder hash instead of fetching archives")
  .option("--evaluate-conditions", "Drop dependencies whose condition is false for the target")
  .option("--no-recurse", "Do not follow recursedeps")
  .option("--exclude <glob>", "Skip dependency paths matching glob (repeatable)", collect, [])
  .action(
    async (
      version: string,
      opts: CommonFlags & {
        concurrency?: number;
        placeholderHashes?: boolean;
        evaluateConditions?: boolean;
        recurse: boolean;
        exclude: string[];
      },
    ) => {
      const reporter = new Reporter(opts.format);
      const overrides: Record<string, unknown> = {};
      if (opts.concurrency !== undefined) overrides.network = { concurrency: opts.concurrency };
      if (opts.placeholderHashes) overrides.hash = { mode: "placeholder" };
      if (opts.evaluateConditions) overrides.conditions = { mode: "evaluate" };
      if (!opts.recurse) overrides.recurse = false;
      if (opts.exclude.length > 0) overrides.exclude = opts.exclude;

      const res = await update({ ...common(opts), overrides, version, reporter, signal: controller.signal });
      if (!res.ok) fail(reporter, res);

      const result = res.result;
      if (!result) return;
      const fields = {
        version: result.version,
        commit: result.commit,
        dependencies: result.dependencyCount,
        skipped: result.skipped.length,
        manifest: result.manifestPath,
        changed: result.manifestChanged,
      };
      if (result.manifestChanged === false) {
        reporter.info("UP_TO_DATE", `${result.manifestPath} already pins ${result.version}`, fields);
      } else {
        reporter.info(
          "UPDATED",
          `Pinned ${result.version} (${result.commit ?? "?"}): ${result.dependencyCount ?? 0} dependencies written to ${result.manifestPath}`,
          fields,
        );
      }
    },
  );

withCommonOptions(
  program
    .command("lookup")
    .description("Resolve a version tag to its commit")
    .argument("<version>", "Release tag"),
).action(async (version: string, opts: CommonFlags) => {
  const reporter = new Reporter(opts.format);
  const res = await lookup({ ...common(opts), version, reporter, signal: controller.signal });
  if (!res.ok) fail(reporter, res);
  reporter.info("RESOLVED", res.commit, { version: res.version, repo: res.repo, commit: res.commit });
});

withCommonOptions(
  program.command("pending").description("List manifest entries that still carry the placeholder hash"),
)
  .option("--placeholder-hash <sri>", "Placeholder hash to look for")
  .action(async (opts: CommonFlags & { placeholderHash?: string }) => {
    const reporter = new Reporter(opts.format);
    const overrides = opts.placeholderHash ? { hash: { placeholder: opts.placeholderHash } } : undefined;
    const res = await pending({ ...common(opts), overrides });
    if (!res.ok) fail(reporter, res);
    for (const entry of res.entries) {
      reporter.info("PENDING", `${entry.location}  ${entry.description}  ${entry.rev}`, { ...entry });
    }
    reporter.info("PENDING_TOTAL", `${res.entries.length} placeholder hash(es) in ${res.manifestPath}`, {
      count: res.entries.length,
    });
  });

withCommonOptions(
  program.command("fix-hashes").description("Build repeatedly and fill placeholder hashes from mismatch output"),
)
  .option("--build-command <cmd>", "Build command, run through /bin/sh -c")
  .option("--max-iterations <n>", "Maximum build attempts", parsePositiveInt)
  .option("--dry-run", "Report the first mismatch without modifying the manifest")
  .option("--no-backup", "Do not copy the manifest before patching it")
  .option("--placeholder-hash <sri>", "Placeholder hash to replace")
  .option("--verbose", "Print the full stdout and stderr of every build")
  .action(
    async (
      opts: CommonFlags & {
        buildCommand?: string;
        maxIterations?: number;
        dryRun?: boolean;
        backup: boolean;
        placeholderHash?: string;
        verbose?: boolean;
      },
    ) => {
      const reporter = new Reporter(opts.format);
      const overrides = opts.placeholderHash ? { hash: { placeholder: opts.placeholderHash } } : undefined;
      const res = await fixHashes({
        ...common(opts),
        overrides,
        reporter,
        buildCommand: opts.buildCommand,
        maxIterations: opts.maxIterations,
        dryRun: opts.dryRun,
        backup: opts.backup,
        verbose: opts.verbose,
        signal: controller.signal,
      });

      const result = res.result;
      if (result) {
        for (const entry of result.fixed) {
          reporter.info("FIXED", `${entry.description}: ${entry.hash}`, { ...entry });
        }
        reporter.info(
          "SUMMARY",
          `${opts.dryRun ? "Detected" : "Updated"} ${result.fixed.length} hash(es) in ${result.iterations} build(s), ${result.remaining} placeholder(s) remaining`,
          { outcome: result.outcome, fixed: result.fixed.length, remaining: result.remaining, backup: result.backupPath },
        );
      }
      if (!res.ok) fail(reporter, res);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
