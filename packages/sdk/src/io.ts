/**
 * Filesystem helpers for repository state
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { constants } from "node:fs";
import { dirname, basename, join } from "node:path";

/**
 * Extract the errno code from a thrown value, if it has one
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export interface PathStatus {
  exists: boolean;
  isDirectory: boolean;
}

/**
 * Report whether a path exists and whether it is a directory
 */
export async function statPath(target: string): Promise<PathStatus> {
  try {
    const stats = await fs.stat(target);
    return { exists: true, isDirectory: stats.isDirectory() };
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      return { exists: false, isDirectory: false };
    }
    throw err;
  }
}

/**
 * True when `target` exists (as any kind of entry)
 */
export async function fileExists(target: string): Promise<boolean> {
  return (await statPath(target)).exists;
}

/**
 * True when `dirPath` is an existing directory the process may write into
 */
export async function isDirectoryWritable(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    if (!stats.isDirectory()) return false;
    await fs.access(dirPath, constants.W_OK | constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path (its directory must exist)
 * @param content - Text (written as UTF-8) or raw bytes
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content);

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Remove a file (idempotent - no error if it doesn't exist)
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}
