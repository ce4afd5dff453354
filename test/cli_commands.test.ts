import { beforeAll, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { fixHashes } from "../src/commands/fix-hashes.js";
import { lookup } from "../src/commands/lookup.js";
import { pending } from "../src/commands/pending.js";
import { update } from "../src/commands/update.js";
import type { BuildRunner } from "../src/hash-fixer/fixer.js";
import { Reporter } from "../src/output/reporter.js";
import { tarballOf } from "./helpers/archives.js";
import { FixtureSource, REV_A, REV_B, SRC_URL, V8_URL } from "./helpers/fixture-source.js";

const VERSION = "120.0.6099.109";
const PLACEHOLDER = "sha256-AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA=";

function reporter(lines: string[] = []): Reporter {
  const sink = { write: (chunk: string) => lines.push(chunk) };
  return new Reporter("jsonl", sink, sink);
}

function tmpManifest(contents?: string): { cwd: string; manifest: string } {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "pinctl-cli-"));
  if (contents !== undefined) fs.writeFileSync(path.join(cwd, "info.json"), contents);
  return { cwd, manifest: "info.json" };
}

describe("exit codes", () => {
  it("maps error kinds to exit codes", () => {
    expect(exitCodeFor("ConfigError")).toBe(EXIT.INVALID_ARGS);
    expect(exitCodeFor("NotFoundError")).toBe(EXIT.NOT_FOUND);
    expect(exitCodeFor("TransportError")).toBe(EXIT.TRANSPORT);
    expect(exitCodeFor("CancelledError")).toBe(130);
    expect(exitCodeFor("HashComputeError")).toBe(EXIT.FAILED);
  });
});

describe("update command", () => {
  let client: () => FixtureSource;

  beforeAll(async () => {
    const archives = {
      [REV_A]: await tarballOf({ "README.md": "src\n" }),
      [REV_B]: await tarballOf({ "include/v8.h": "// v8\n" }),
    };
    client = () =>
      new FixtureSource({
        [SRC_URL]: {
          tags: { [VERSION]: REV_A },
          deps: { [`${REV_A}:DEPS`]: `deps = {'src/v8': '${V8_URL}@${REV_B}'}` },
          archives: { [REV_A]: archives[REV_A] },
        },
        [V8_URL]: { archives: { [REV_B]: archives[REV_B] } },
      });
  });

  it("writes the manifest relative to the working directory", async () => {
    const { cwd, manifest } = tmpManifest('{\n  "chromium": {}\n}\n');
    const lines: string[] = [];
    const res = await update({ cwd, manifest, environ: {}, version: VERSION, reporter: reporter(lines), client: client() });

    expect(res.ok).toBe(true);
    expect(res.result).toMatchObject({ status: "done", dependencyCount: 2, manifestPath: path.join(cwd, "info.json") });
    expect(lines.map((l) => JSON.parse(l).code)).toContain("WRITING_MANIFEST_SUCCEEDED");
  });

  it("writes placeholders when asked", async () => {
    const { cwd, manifest } = tmpManifest();
    const source = client();
    const res = await update({
      cwd,
      manifest,
      environ: {},
      overrides: { hash: { mode: "placeholder" } },
      version: VERSION,
      reporter: reporter(),
      client: source,
    });

    expect(res.ok).toBe(true);
    const written = fs.readFileSync(path.join(cwd, "info.json"), "utf8");
    expect(written.split(PLACEHOLDER)).toHaveLength(3);
    expect(source.calls.filter((c) => c.startsWith("blob"))).toEqual([]);
  });

  it("exits with NOT_FOUND for an unknown tag", async () => {
    const original = '{\n  "chromium": {}\n}\n';
    const { cwd, manifest } = tmpManifest(original);
    const res = await update({ cwd, manifest, environ: {}, version: "1.0.0.0", reporter: reporter(), client: client() });

    expect(res).toMatchObject({ ok: false, kind: "NotFoundError", exitCode: EXIT.NOT_FOUND });
    expect(res.result?.status).toBe("failed_resolving_version");
    expect(fs.readFileSync(path.join(cwd, "info.json"), "utf8")).toBe(original);
  });

  it("exits with INVALID_ARGS for a version that is not a dotted tag", async () => {
    const { cwd, manifest } = tmpManifest();
    const source = client();
    const res = await update({ cwd, manifest, environ: {}, version: "main", reporter: reporter(), client: source });

    expect(res).toEqual({ ok: false, error: 'Not a version tag: "main"', kind: "ParseError", exitCode: EXIT.INVALID_ARGS });
    expect(source.calls).toEqual([]);
    expect(fs.existsSync(path.join(cwd, "info.json"))).toBe(false);
  });

  it("exits with INVALID_ARGS for a bad config", async () => {
    const { cwd, manifest } = tmpManifest();
    const res = await update({
      cwd,
      manifest,
      environ: { PINCTL_NETWORK__CONCURRENCY: "0" },
      version: VERSION,
      reporter: reporter(),
      client: client(),
    });
    expect(res).toMatchObject({ ok: false, kind: "ConfigError", exitCode: EXIT.INVALID_ARGS });
  });
});

describe("lookup command", () => {
  it("prints the commit a tag points at", async () => {
    const source = new FixtureSource({ [SRC_URL]: { tags: { [VERSION]: REV_A } } });
    const res = await lookup({ environ: {}, version: VERSION, reporter: reporter(), client: source });
    expect(res).toEqual({ ok: true, version: VERSION, repo: SRC_URL, commit: REV_A });
  });

  it("exits with INVALID_ARGS for a version that is not a dotted tag", async () => {
    const res = await lookup({ environ: {}, version: "v120.0", reporter: reporter(), client: new FixtureSource({}) });
    expect(res).toMatchObject({ ok: false, kind: "ParseError", exitCode: EXIT.INVALID_ARGS });
  });
});

describe("pending command", () => {
  it("lists placeholder entries", async () => {
    const { cwd, manifest } = tmpManifest(
      JSON.stringify({ chromium: { DEPS: { "src/v8": { url: V8_URL, rev: REV_B, hash: PLACEHOLDER } } } }),
    );
    const res = await pending({ cwd, manifest, environ: {} });
    expect(res).toEqual({
      ok: true,
      manifestPath: path.join(cwd, "info.json"),
      entries: [{ location: "chromium.DEPS.src/v8", rev: REV_B, description: "v8/v8" }],
    });
  });

  it("exits with NOT_FOUND for a missing manifest", async () => {
    const { cwd, manifest } = tmpManifest();
    expect(await pending({ cwd, manifest, environ: {} })).toMatchObject({ ok: false, exitCode: EXIT.NOT_FOUND });
  });
});

describe("fix-hashes command", () => {
  it("uses the configured command and reports failures with exit code 1", async () => {
    const { cwd, manifest } = tmpManifest(
      JSON.stringify({ chromium: { DEPS: { "src/v8": { url: V8_URL, rev: REV_B, hash: PLACEHOLDER } } } }),
    );
    const runBuild = vi.fn<BuildRunner>().mockResolvedValue({ exitCode: 2, stdout: "", stderr: "error: out of disk" });

    const res = await fixHashes({
      cwd,
      manifest,
      environ: { PINCTL_FIX_HASHES__BUILD_COMMAND: "make pinned" },
      reporter: reporter(),
      runBuild,
      backup: false,
    });

    expect(runBuild).toHaveBeenCalledWith("make pinned", undefined);
    expect(res).toMatchObject({ ok: false, exitCode: EXIT.FAILED, error: "Hash fixing stopped: build_failed" });
    expect(res.result?.outcome).toBe("build_failed");
  });

  it("lets flags override the build command", async () => {
    const { cwd, manifest } = tmpManifest(
      JSON.stringify({ chromium: { DEPS: { "src/v8": { url: V8_URL, rev: REV_B, hash: PLACEHOLDER } } } }),
    );
    const runBuild = vi.fn<BuildRunner>().mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });
    const res = await fixHashes({ cwd, manifest, environ: {}, reporter: reporter(), runBuild, buildCommand: "true", backup: false });

    expect(runBuild).toHaveBeenCalledWith("true", undefined);
    expect(res.ok).toBe(true);
  });
});
