import { collectGraph, computeHashes, finalizeGraph, type CollectedGraph, type SkippedDep } from "../deps/resolver.js";
import { writeFileAtomic } from "../manifest/atomic.js";
import { readManifest, readManifestDeps } from "../manifest/document.js";
import { applyResolution, renderDeps, renderManifest } from "../manifest/writer.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { SourceClient } from "../source/client.js";
import { lookupRevision } from "../source/revision-lookup.js";
import type { PinConfig } from "../types/config.js";
import type { CommitRef, DependencyGraph } from "../types/deps.js";
import type { ManifestDeps, ManifestDocument } from "../types/manifest.js";
import { ParseError, describeError, isPinError, throwIfAborted, type ErrorKind } from "./errors.js";
import { failedStep, isResolutionStep, isTerminal, nextState, type ResolutionStep, type RunStatus } from "./state-machine.js";

export type ProgressPhase = "started" | "succeeded" | "failed" | "info";

export type ProgressEvent = {
  step: ResolutionStep;
  phase: ProgressPhase;
  message: string;
  at: string;
};

export type ProgressSink = (event: ProgressEvent) => void;

export type OrchestratorResult = {
  success: boolean;
  status: RunStatus;
  version: string;
  manifestPath: string;
  commit?: CommitRef;
  dependencyCount?: number;
  skipped: SkippedDep[];
  /** False when the rendered manifest matched the file on disk. */
  manifestChanged?: boolean;
  failedStep?: ResolutionStep;
  error?: { kind: ErrorKind | "Error"; message: string };
};

export type OrchestratorOptions = {
  client: SourceClient;
  config: PinConfig;
  registry: SchemaRegistry;
  /** Absolute manifest path; defaults to config.manifest_path. */
  manifestPath?: string;
  onProgress?: ProgressSink;
};

/** Mutable state of one run, filled in step by step. */
type RunContext = {
  version: string;
  signal?: AbortSignal;
  manifest?: ManifestDocument;
  existingDeps: ManifestDeps;
  commit?: CommitRef;
  collected?: CollectedGraph;
  graph?: DependencyGraph;
  manifestChanged?: boolean;
};

function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) throw new Error(`Internal error: ${what} missing`);
  return value;
}

/**
 * Orchestrator: drives one resolution run through the state machine.
 *
 * Main loop: emit started → execute step → emit outcome → advance. The
 * manifest is read in the first step and written only in the last, so a
 * run that fails anywhere leaves the file as it was.
 */
export class Orchestrator {
  private status: RunStatus = "idle";
  private readonly manifestPath: string;

  constructor(private readonly options: OrchestratorOptions) {
    this.manifestPath = options.manifestPath ?? options.config.manifest_path;
  }

  get currentStatus(): RunStatus {
    return this.status;
  }

  async run(opts: { version: string; signal?: AbortSignal }): Promise<OrchestratorResult> {
    if (this.status !== "idle") {
      throw new Error(`Orchestrator already used (status: ${this.status})`);
    }

    const ctx: RunContext = { version: opts.version, signal: opts.signal, existingDeps: {} };
    let error: OrchestratorResult["error"];

    this.status = nextState(this.status, "start");

    while (!isTerminal(this.status)) {
      const current = this.status;
      if (!isResolutionStep(current)) break;

      this.emit(current, "started", this.describeStart(current, ctx));
      try {
        throwIfAborted(opts.signal);
        const message = await this.execute(current, ctx);
        this.status = nextState(current, "success");
        this.emit(current, "succeeded", message);
      } catch (e) {
        this.status = nextState(current, "failure");
        error = { kind: isPinError(e) ? e.kind : "Error", message: describeError(e) };
        this.emit(current, "failed", `${current} failed: ${error.message}`);
      }
    }

    const failed = failedStep(this.status);
    return {
      success: this.status === "done",
      status: this.status,
      version: opts.version,
      manifestPath: this.manifestPath,
      commit: ctx.commit,
      dependencyCount: ctx.graph?.length,
      skipped: ctx.collected?.skipped ?? [],
      manifestChanged: ctx.manifestChanged,
      failedStep: failed ?? undefined,
      error,
    };
  }

  private emit(step: ResolutionStep, phase: ProgressPhase, message: string): void {
    this.options.onProgress?.({ step, phase, message, at: new Date().toISOString() });
  }

  private describeStart(step: ResolutionStep, ctx: RunContext): string {
    switch (step) {
      case "resolving_version":
        return `Resolving ${ctx.version}`;
      case "fetching_graph":
        return `Fetching DEPS graph at ${ctx.commit ?? "?"}`;
      case "computing_hashes":
        return `Computing hashes for ${ctx.collected?.entries.length ?? 0} dependencies`;
      case "writing_manifest":
        return `Writing ${this.manifestPath}`;
    }
  }

  private execute(step: ResolutionStep, ctx: RunContext): Promise<string> {
    switch (step) {
      case "resolving_version":
        return this.resolveVersion(ctx);
      case "fetching_graph":
        return this.fetchGraph(ctx);
      case "computing_hashes":
        return this.hashGraph(ctx);
      case "writing_manifest":
        return this.writeManifest(ctx);
    }
  }

  private async resolveVersion(ctx: RunContext): Promise<string> {
    const { config, registry, client } = this.options;
    ctx.manifest = await readManifest(this.manifestPath);
    ctx.existingDeps = readManifestDeps(ctx.manifest.data, config.product_key, config.deps_key, registry);
    ctx.commit = await lookupRevision(client, config.root.url, ctx.version, ctx.signal);
    return `${ctx.version} is ${ctx.commit}`;
  }

  private async fetchGraph(ctx: RunContext): Promise<string> {
    const { config, client } = this.options;
    ctx.collected = await collectGraph({
      client,
      root: config.root,
      commit: required(ctx.commit, "commit"),
      conditions: config.conditions,
      recurse: config.recurse,
      exclude: config.exclude,
      concurrency: config.network.concurrency,
      signal: ctx.signal,
      onProgress: (message) => this.emit("fetching_graph", "info", message),
    });
    const { entries, skipped, documents } = ctx.collected;
    return `Found ${entries.length} git dependencies in ${documents} DEPS files (${skipped.length} skipped)`;
  }

  private async hashGraph(ctx: RunContext): Promise<string> {
    const { config, client } = this.options;
    const collected = required(ctx.collected, "dependency graph");
    const hashed = await computeHashes(collected.entries, {
      client,
      mode: config.hash.mode,
      placeholder: config.hash.placeholder,
      existing: ctx.existingDeps,
      concurrency: config.network.concurrency,
      signal: ctx.signal,
      onProgress: (message) => this.emit("computing_hashes", "info", message),
    });
    ctx.graph = finalizeGraph(hashed, config.root, required(ctx.commit, "commit"));
    const pending = ctx.graph.filter((e) => e.hash === null).length;
    return pending > 0
      ? `Hashed ${ctx.graph.length - pending} dependencies, ${pending} left as placeholders`
      : `Hashed ${ctx.graph.length} dependencies`;
  }

  private async writeManifest(ctx: RunContext): Promise<string> {
    const { config, registry } = this.options;
    const manifest = required(ctx.manifest, "manifest");
    const graph = required(ctx.graph, "graph");

    const { valid, errors } = registry.validate("manifest-deps", renderDeps(graph, config.hash.placeholder));
    if (!valid) {
      throw new ParseError(`Resolved graph does not match the manifest schema: ${errors ?? ""}`, config.deps_key);
    }

    const data = applyResolution(manifest.data, {
      productKey: config.product_key,
      depsKey: config.deps_key,
      versionFields: config.version_fields,
      version: ctx.version,
      graph,
      placeholder: config.hash.placeholder,
    });
    const rendered = renderManifest(data, manifest.format);

    if (rendered === manifest.raw) {
      ctx.manifestChanged = false;
      return `${this.manifestPath} already up to date`;
    }
    await writeFileAtomic(this.manifestPath, rendered, ctx.signal);
    ctx.manifestChanged = true;
    return `Wrote ${graph.length} dependencies to ${this.manifestPath}`;
  }
}
