/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openRepository } from "@modelrepo/sdk";
import type { ModelRepository, OpenRepositoryInit } from "@modelrepo/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "modelrepo-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "modelrepo-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a freshly created repository, closing and removing it after
 * @param init - Collaborators passed to openRepository (logger, backend, ...)
 */
export async function withTempRepository<T>(
  fn: (repo: ModelRepository, dir: string) => Promise<T>,
  init?: OpenRepositoryInit
): Promise<T> {
  const dir = await createTempDir();
  let repo: ModelRepository;
  try {
    repo = await openRepository({ repository: join(dir, "repo"), create_repository: true }, init);
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  try {
    return await fn(repo, dir);
  } finally {
    await repo.close();
    await removeDir(dir);
  }
}
