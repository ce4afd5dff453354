import { execFile } from "node:child_process";
import { copyFile, readFile } from "node:fs/promises";
import path from "node:path";
import { CancelledError, NotFoundError, throwIfAborted } from "../core/errors.js";
import { writeFileAtomic } from "../manifest/atomic.js";
import { detectFormat, parseManifest } from "../manifest/document.js";
import { renderManifest } from "../manifest/writer.js";
import type { Reporter } from "../output/reporter.js";
import { describeEntry, findPlaceholderByRev, findPlaceholderEntries } from "./entries.js";
import { extractHashMismatch } from "./mismatch.js";

export type BuildOutcome = { exitCode: number; stdout: string; stderr: string };

export type BuildRunner = (command: string, signal?: AbortSignal) => Promise<BuildOutcome>;

/** Run `command` through /bin/sh and capture its output; a non-zero exit is not an error. */
export const runShellCommand: BuildRunner = (command, signal) =>
  new Promise((resolve, reject) => {
    execFile("/bin/sh", ["-c", command], { maxBuffer: 512 * 1024 * 1024, signal }, (error, stdout, stderr) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      if (error && typeof error.code !== "number") {
        reject(error);
        return;
      }
      resolve({ exitCode: error && typeof error.code === "number" ? error.code : 0, stdout, stderr });
    });
  });

export type FixHashesOutcome =
  | "nothing_to_do"
  | "build_succeeded"
  | "dry_run"
  | "build_failed"
  | "unattributed_mismatch"
  | "unknown_entry"
  | "repeated_revision"
  | "max_iterations";

export type FixedEntry = {
  rev: string;
  hash: string;
  description: string;
  location: string;
};

export type FixHashesResult = {
  success: boolean;
  outcome: FixHashesOutcome;
  fixed: FixedEntry[];
  remaining: number;
  iterations: number;
  backupPath: string | null;
};

export type FixHashesOptions = {
  manifestPath: string;
  buildCommand: string;
  maxIterations: number;
  placeholder: string;
  dryRun?: boolean;
  backup?: boolean;
  /** Report the full output of every build. */
  verbose?: boolean;
  reporter: Reporter;
  runBuild?: BuildRunner;
  signal?: AbortSignal;
  now?: () => Date;
};

const SUCCESSFUL: ReadonlySet<FixHashesOutcome> = new Set(["nothing_to_do", "build_succeeded", "dry_run"]);

const STDERR_TAIL_LINES = 15;

/** `.info.json.backup_20260101_120000` next to the manifest. */
export function backupPathFor(manifestPath: string, at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}_` +
    `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return path.join(path.dirname(manifestPath), `.${path.basename(manifestPath)}.backup_${stamp}`);
}

async function readManifestText(manifestPath: string): Promise<string> {
  try {
    return await readFile(manifestPath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new NotFoundError(`Manifest not found: ${manifestPath}`, manifestPath);
    }
    throw e;
  }
}

/**
 * Build, read the first fixed-output hash mismatch, patch the entry pinned
 * at that revision, and build again until the build passes or a stop
 * condition is hit.
 */
export async function fixHashes(opts: FixHashesOptions): Promise<FixHashesResult> {
  const { reporter, placeholder } = opts;
  const runBuild = opts.runBuild ?? runShellCommand;
  const now = opts.now ?? (() => new Date());

  const raw = await readManifestText(opts.manifestPath);
  const data = parseManifest(raw, opts.manifestPath);
  const format = detectFormat(raw);

  const fixed: FixedEntry[] = [];
  let remaining = findPlaceholderEntries(data, placeholder).length;
  let backupPath: string | null = null;
  let iterations = 0;

  const finish = (outcome: FixHashesOutcome): FixHashesResult => ({
    success: SUCCESSFUL.has(outcome),
    outcome,
    fixed,
    remaining,
    iterations,
    backupPath,
  });

  if (remaining === 0) {
    reporter.info("NO_PLACEHOLDERS", `No placeholder hashes found in ${opts.manifestPath}`);
    return finish("nothing_to_do");
  }
  reporter.info("PLACEHOLDERS_FOUND", `Found ${remaining} placeholder hash(es) to replace`, { remaining });

  if (opts.backup !== false && !opts.dryRun) {
    backupPath = backupPathFor(opts.manifestPath, now());
    await copyFile(opts.manifestPath, backupPath);
    reporter.info("BACKUP_CREATED", `Created backup: ${backupPath}`, { backupPath });
  }

  const processed = new Set<string>();

  while (iterations < opts.maxIterations) {
    throwIfAborted(opts.signal);
    iterations++;
    reporter.info("BUILD_ATTEMPT", `Attempt ${iterations}: running build command`, { attempt: iterations });

    const build = await runBuild(opts.buildCommand, opts.signal);
    if (opts.verbose) {
      reporter.info("BUILD_OUTPUT", `--- stdout ---\n${build.stdout.trimEnd()}\n--- stderr ---\n${build.stderr.trimEnd()}`, {
        attempt: iterations,
        exitCode: build.exitCode,
      });
    }
    if (build.exitCode === 0) {
      reporter.info("BUILD_SUCCEEDED", "Build successful, all hashes are correct");
      return finish("build_succeeded");
    }

    const mismatch = extractHashMismatch(`${build.stderr}\n${build.stdout}`);
    if (!mismatch) {
      const tail = build.stderr.trimEnd().split("\n").slice(-STDERR_TAIL_LINES).join("\n");
      reporter.error("BUILD_FAILED", `Build failed for a reason other than a hash mismatch:\n${tail}`, {
        exitCode: build.exitCode,
      });
      return finish("build_failed");
    }
    if (mismatch.rev === null) {
      reporter.error(
        "UNATTRIBUTED_MISMATCH",
        `Hash mismatch without a revision (got ${mismatch.hash}); this is not a pinned source, update it manually`,
        { hash: mismatch.hash },
      );
      return finish("unattributed_mismatch");
    }
    if (processed.has(mismatch.rev)) {
      reporter.error("REPEATED_REVISION", `Revision ${mismatch.rev.slice(0, 12)} still mismatches after being patched`, {
        rev: mismatch.rev,
      });
      return finish("repeated_revision");
    }
    processed.add(mismatch.rev);

    const located = findPlaceholderByRev(data, mismatch.rev, placeholder);
    if (!located) {
      reporter.error("UNKNOWN_ENTRY", `No entry pinned at ${mismatch.rev} still carries the placeholder hash`, {
        rev: mismatch.rev,
      });
      return finish("unknown_entry");
    }

    const description = describeEntry(located.entry, mismatch.rev);
    const entry: FixedEntry = { rev: mismatch.rev, hash: mismatch.hash, description, location: located.location };
    reporter.info("MISMATCH_DETECTED", `Hash mismatch for ${description} at ${mismatch.rev.slice(0, 12)}: ${mismatch.hash}`, {
      ...entry,
      url: mismatch.url,
    });

    if (opts.dryRun) {
      fixed.push(entry);
      reporter.info("DRY_RUN", `Would update hash at ${located.location}`);
      return finish("dry_run");
    }

    located.entry.hash = mismatch.hash;
    await writeFileAtomic(opts.manifestPath, renderManifest(data, format), opts.signal);
    fixed.push(entry);
    remaining = findPlaceholderEntries(data, placeholder).length;
    reporter.info("ENTRY_UPDATED", `Updated hash at ${located.location} (${remaining} placeholder(s) remaining)`, {
      location: located.location,
      remaining,
    });
  }

  reporter.warn("MAX_ITERATIONS", `Reached maximum iterations (${opts.maxIterations})`);
  return finish("max_iterations");
}
