import { randomBytes } from "node:crypto";
import { chmod, open, rename, rm, stat } from "node:fs/promises";
import path from "node:path";
import { CancelledError, ManifestWriteError, throwIfAborted } from "../core/errors.js";

async function existingMode(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mode & 0o777;
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

/**
 * Replace `filePath` in one step: write a sibling temporary file, fsync it,
 * then rename it over the target. The temporary file is removed on every
 * path that does not end in the rename, cancellation included.
 */
export async function writeFileAtomic(filePath: string, contents: string, signal?: AbortSignal): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`);
  let renamed = false;

  try {
    throwIfAborted(signal);
    const mode = await existingMode(filePath);
    const handle = await open(tmpPath, "wx");
    try {
      await handle.writeFile(contents, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    if (mode !== null) await chmod(tmpPath, mode);

    throwIfAborted(signal);
    await rename(tmpPath, filePath);
    renamed = true;
  } catch (e) {
    if (e instanceof CancelledError) throw e;
    throw new ManifestWriteError(filePath, e);
  } finally {
    if (!renamed) await rm(tmpPath, { force: true });
  }
}
