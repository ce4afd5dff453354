import { beforeAll, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ManifestWriteError, ParseError } from "../src/core/errors.js";
import { writeFileAtomic } from "../src/manifest/atomic.js";
import { detectFormat, parseManifest, readManifest, readManifestDeps } from "../src/manifest/document.js";
import { applyResolution, renderDeps, renderManifest } from "../src/manifest/writer.js";
import { SchemaRegistry } from "../src/schema/registry.js";
import type { DependencyGraph } from "../src/types/deps.js";

const PLACEHOLDER = "sha256-AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA=";
const HASH = `sha256-${"Q".repeat(43)}=`;
const REV = "0123456789abcdef0123456789abcdef01234567";

const graph: DependencyGraph = [
  { path: "src", url: "https://example.com/src.git", rev: REV, hash: HASH },
  { path: "src/v8", url: "https://example.com/v8.git", rev: REV, hash: null, condition: "checkout_v8" },
];

function tmpdir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "pinctl-manifest-"));
}

describe("manifest format", () => {
  it("detects indentation and trailing newline", () => {
    expect(detectFormat('{\n    "a": 1\n}\n')).toEqual({ indent: 4, trailingNewline: true });
    expect(detectFormat('{\n\t"a": 1\n}')).toEqual({ indent: "\t", trailingNewline: false });
    expect(detectFormat('{"a": 1}')).toEqual({ indent: 2, trailingNewline: false });
  });

  it("rejects documents that are not JSON objects", () => {
    expect(() => parseManifest("[1]", "info.json")).toThrow("Manifest info.json must contain a JSON object (at info.json)");
    expect(() => parseManifest("{", "info.json")).toThrow(ParseError);
  });

  it("reads a missing file as an empty document", async () => {
    const doc = await readManifest(path.join(tmpdir(), "info.json"));
    expect(doc).toEqual({ data: {}, format: { indent: 2, trailingNewline: true }, raw: null });
  });
});

describe("manifest writer", () => {
  it("renders placeholders for unknown hashes", () => {
    expect(renderDeps(graph, PLACEHOLDER)).toEqual({
      src: { url: "https://example.com/src.git", rev: REV, hash: HASH },
      "src/v8": { url: "https://example.com/v8.git", rev: REV, hash: PLACEHOLDER, condition: "checkout_v8" },
    });
  });

  it("replaces version fields and deps in place, keeping key order", () => {
    const data = { first: 1, chromium: { DEPS: {}, version: "1.0", extra: true }, last: "x" };
    const next = applyResolution(data, {
      productKey: "chromium",
      depsKey: "DEPS",
      versionFields: ["version"],
      version: "2.0",
      graph,
      placeholder: PLACEHOLDER,
    });
    expect(Object.keys(next)).toEqual(["first", "chromium", "last"]);
    expect(next.chromium).toEqual({ DEPS: renderDeps(graph, PLACEHOLDER), version: "2.0", extra: true });
    expect(data.chromium.version).toBe("1.0");
  });

  it("appends missing fields", () => {
    const next = applyResolution(
      { other: [] },
      { productKey: "chromium", depsKey: "DEPS", versionFields: ["version"], version: "2.0", graph: [], placeholder: PLACEHOLDER },
    );
    expect(next).toEqual({ other: [], chromium: { version: "2.0", DEPS: {} } });
  });

  it("appends fields whose names shadow inherited object properties", () => {
    const next = applyResolution(
      {},
      {
        productKey: "chromium",
        depsKey: "constructor",
        versionFields: ["toString"],
        version: "2.0",
        graph: [],
        placeholder: PLACEHOLDER,
      },
    );
    expect(JSON.stringify(next)).toBe('{"chromium":{"toString":"2.0","constructor":{}}}');
  });

  it("renders with the detected format", () => {
    expect(renderManifest({ a: { b: 1 } }, { indent: 4, trailingNewline: false })).toBe('{\n    "a": {\n        "b": 1\n    }\n}');
  });
});

describe("manifest deps subtree", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await SchemaRegistry.load();
  });

  it("reads entries that match the schema", () => {
    const deps = readManifestDeps(
      { chromium: { DEPS: { src: { url: "https://example.com/src.git", rev: REV, hash: HASH } } } },
      "chromium",
      "DEPS",
      registry,
    );
    expect(deps).toEqual({ src: { url: "https://example.com/src.git", rev: REV, hash: HASH } });
  });

  it("rejects entries with a malformed revision", () => {
    expect(() =>
      readManifestDeps({ chromium: { DEPS: { src: { url: "u", rev: "main", hash: HASH } } } }, "chromium", "DEPS", registry),
    ).toThrow(/Invalid dependency subtree/);
  });

  it("treats an absent subtree as empty", () => {
    expect(readManifestDeps({}, "chromium", "DEPS", registry)).toEqual({});
  });
});

describe("writeFileAtomic", () => {
  it("replaces the file and keeps its mode", async () => {
    const dir = tmpdir();
    const file = path.join(dir, "info.json");
    fs.writeFileSync(file, "old", { mode: 0o640 });
    fs.chmodSync(file, 0o640);

    await writeFileAtomic(file, "new");

    expect(fs.readFileSync(file, "utf8")).toBe("new");
    expect(fs.statSync(file).mode & 0o777).toBe(0o640);
    expect(fs.readdirSync(dir)).toEqual(["info.json"]);
  });

  it("wraps failures and leaves no temporary file", async () => {
    const dir = tmpdir();
    const target = path.join(dir, "missing", "info.json");
    await expect(writeFileAtomic(target, "x")).rejects.toBeInstanceOf(ManifestWriteError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("does not touch the file once cancelled", async () => {
    const dir = tmpdir();
    const file = path.join(dir, "info.json");
    fs.writeFileSync(file, "old");
    const controller = new AbortController();
    controller.abort();

    await expect(writeFileAtomic(file, "new", controller.signal)).rejects.toThrow("Operation cancelled");
    expect(fs.readFileSync(file, "utf8")).toBe("old");
    expect(fs.readdirSync(dir)).toEqual(["info.json"]);
  });
});
