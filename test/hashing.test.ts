import { describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { hashArchive } from "../src/hashing/archive.js";
import { isSriSha256, sriFromContent } from "../src/hashing/checksum.js";
import { narHashPath, writeNarPath } from "../src/hashing/nar.js";
import { tarball } from "./helpers/archives.js";

function tempTree(files: Record<string, string>, executables: string[] = []): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pinctl-nar-"));
  for (const [name, contents] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(dir, name)), { recursive: true });
    fs.writeFileSync(path.join(dir, name), contents, { mode: executables.includes(name) ? 0o755 : 0o644 });
  }
  return dir;
}

async function serialize(target: string): Promise<Buffer> {
  const chunks: Buffer[] = [];
  await writeNarPath(target, (chunk) => chunks.push(chunk));
  return Buffer.concat(chunks);
}

describe("NAR serialisation", () => {
  it("frames every string with a length and pads to 8 bytes", async () => {
    const nar = await serialize(tempTree({ a: "hi" }));
    expect(nar.length).toBe(288);
    expect(nar.readBigUInt64LE(0)).toBe(13n);
    expect(nar.subarray(8, 21).toString()).toBe("nix-archive-1");
    expect(nar.subarray(21, 24)).toEqual(Buffer.alloc(3));
  });

  it("orders directory entries by byte value", async () => {
    const nar = (await serialize(tempTree({ a: "1", B: "2" }))).toString("latin1");
    expect(nar.indexOf("\u0001\u0000\u0000\u0000\u0000\u0000\u0000\u0000B")).toBeLessThan(
      nar.indexOf("\u0001\u0000\u0000\u0000\u0000\u0000\u0000\u0000a"),
    );
  });

  it("marks executables and symlinks", async () => {
    const dir = tempTree({ run: "#!/bin/sh\n" }, ["run"]);
    fs.symlinkSync("run", path.join(dir, "link"));
    const nar = await serialize(dir);
    expect(nar.includes(Buffer.from("executable"))).toBe(true);
    expect(nar.includes(Buffer.from("symlink"))).toBe(true);
  });

  it("hashes to an SRI sha256 of the serialisation", async () => {
    const dir = tempTree({ a: "hi" });
    const hash = await narHashPath(dir);
    expect(hash).toHaveLength(51);
    expect(isSriSha256(hash)).toBe(true);
    expect(hash).toBe(`sha256-${createHash("sha256").update(await serialize(dir)).digest("base64")}`);
    expect(hash).toBe(sriFromContent(await serialize(dir)));
  });

  it("matches the known NAR hash of a single file", async () => {
    const dir = tempTree({ "hello.txt": "hello\n" });
    expect(await narHashPath(path.join(dir, "hello.txt"))).toBe("sha256-HDfQGvQL4ugGkd48w99EN3ppmvuxfGjwgJZLL9Bx/BM=");
  });

  it("matches the known NAR hash of a tree with a subdirectory, an executable and a symlink", async () => {
    const dir = tempTree({ "hello.txt": "hello\n", "bin/run": "#!/bin/sh\n" }, ["bin/run"]);
    fs.symlinkSync("hello.txt", path.join(dir, "link"));

    const nar = await serialize(dir);
    expect(nar.length).toBe(896);
    expect(await narHashPath(dir)).toBe("sha256-/bCK6uy0hORAL+rTb3GN28CUpCawYLe8/GHe98sU6ug=");
  });
});

describe("archive hashing", () => {
  it("hashes the unpacked tree of a gzipped tarball", async () => {
    const tmp = tempTree({ DEPS: "deps = {}\n", "build/run.sh": "#!/bin/sh\n" }, ["build/run.sh"]);
    const archive = await tarball(tmp);
    expect(await hashArchive((file) => fs.promises.writeFile(file, archive))).toBe(await narHashPath(tmp));
  });

  it("removes its work directory when the download fails", async () => {
    let downloadedTo = "";
    const err = await hashArchive(async (file) => {
      downloadedTo = file;
      throw new Error("connection reset");
    }).catch((e: unknown) => e);
    expect(err).toHaveProperty("message", "connection reset");
    expect(fs.existsSync(path.dirname(downloadedTo))).toBe(false);
  });
});
