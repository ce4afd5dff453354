import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { lstat, readdir, readlink } from "node:fs/promises";
import path from "node:path";
import { CancelledError, throwIfAborted } from "../core/errors.js";
import { toSri } from "./checksum.js";

export type NarSink = (chunk: Buffer) => void;

const PADDING = Buffer.alloc(8);

function writeLength(sink: NarSink, length: number): void {
  const len = Buffer.alloc(8);
  len.writeBigUInt64LE(BigInt(length));
  sink(len);
}

function writePadding(sink: NarSink, length: number): void {
  const pad = (8 - (length % 8)) % 8;
  if (pad > 0) sink(PADDING.subarray(0, pad));
}

function writeString(sink: NarSink, value: string): void {
  const bytes = Buffer.from(value, "utf8");
  writeLength(sink, bytes.length);
  sink(bytes);
  writePadding(sink, bytes.length);
}

function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a), Buffer.from(b));
}

async function writeContents(sink: NarSink, file: string, size: number, signal?: AbortSignal): Promise<void> {
  writeLength(sink, size);
  let read = 0;
  for await (const chunk of createReadStream(file, { signal })) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    read += bytes.length;
    sink(bytes);
  }
  if (read !== size) throw new Error(`File changed while being hashed: ${file}`);
  writePadding(sink, size);
}

async function writeEntry(sink: NarSink, target: string, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  const stat = await lstat(target);
  writeString(sink, "(");
  writeString(sink, "type");
  if (stat.isSymbolicLink()) {
    writeString(sink, "symlink");
    writeString(sink, "target");
    writeString(sink, await readlink(target));
  } else if (stat.isDirectory()) {
    writeString(sink, "directory");
    // entries are ordered by raw byte value of their names
    for (const name of (await readdir(target)).sort(compareNames)) {
      writeString(sink, "entry");
      writeString(sink, "(");
      writeString(sink, "name");
      writeString(sink, name);
      writeString(sink, "node");
      await writeEntry(sink, path.join(target, name), signal);
      writeString(sink, ")");
    }
  } else if (stat.isFile()) {
    writeString(sink, "regular");
    if ((stat.mode & 0o100) !== 0) {
      writeString(sink, "executable");
      writeString(sink, "");
    }
    writeString(sink, "contents");
    await writeContents(sink, target, stat.size, signal);
  } else {
    throw new Error(`Unsupported file type in archive tree: ${target}`);
  }
  writeString(sink, ")");
}

/**
 * Stream the Nix archive serialisation of the tree at `target` into `sink`.
 * Symlinks are not followed; file contents are read in chunks.
 */
export async function writeNarPath(target: string, sink: NarSink, signal?: AbortSignal): Promise<void> {
  writeString(sink, "nix-archive-1");
  await writeEntry(sink, target, signal);
}

export async function narHashPath(target: string, signal?: AbortSignal): Promise<string> {
  const hash = createHash("sha256");
  try {
    await writeNarPath(target, (chunk) => hash.update(chunk), signal);
  } catch (e) {
    if (signal?.aborted) throw new CancelledError();
    throw e;
  }
  return toSri(hash);
}
