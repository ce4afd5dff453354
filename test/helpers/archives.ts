import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { create } from "tar";

/** Gzipped tarball of `source`, laid out like a Gitiles `+archive` download. */
export async function tarball(source: string): Promise<Buffer> {
  const out = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "pinctl-tgz-")), "archive.tar.gz");
  await create({ gzip: true, file: out, cwd: source }, ["."]);
  return fs.readFileSync(out);
}

/** Write `files` into a fresh temp directory and return its tarball. */
export async function tarballOf(files: Record<string, string>): Promise<Buffer> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pinctl-tree-"));
  for (const [name, contents] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(dir, name)), { recursive: true });
    fs.writeFileSync(path.join(dir, name), contents);
  }
  return tarball(dir);
}
