import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { extract } from "tar";
import { throwIfAborted } from "../core/errors.js";
import { narHashPath } from "./nar.js";

/** Writes a gzipped tar archive to `file`. */
export type ArchiveDownload = (file: string) => Promise<void>;

/**
 * Hash a gzipped tar archive the way a Nix fixed-output fetch of the
 * unpacked tree does: extract it without stripping a root directory,
 * then take the SRI sha256 of the tree's NAR. The archive goes to a temp
 * file and the tree is hashed from disk.
 */
export async function hashArchive(download: ArchiveDownload, signal?: AbortSignal): Promise<string> {
  const workDir = await mkdtemp(path.join(tmpdir(), "pinctl-archive-"));
  try {
    const file = path.join(workDir, "source.tar.gz");
    const tree = path.join(workDir, "tree");
    await download(file);
    await mkdir(tree);
    throwIfAborted(signal);
    await extract({ file, cwd: tree });
    throwIfAborted(signal);
    return await narHashPath(tree, signal);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
