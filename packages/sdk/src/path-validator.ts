/**
 * Repository directory validation
 *
 * Invariants:
 * - A path that exists but is not a directory is always rejected
 * - A missing directory is only created when the caller allows it
 * - On success the directory exists and is writable by this process
 */

import * as fs from "node:fs/promises";
import { BadParameterError } from "./errors.js";
import { isDirectoryWritable, statPath, type PathStatus } from "./io.js";
import type { RepositoryLogger } from "./observability/logs.js";
import type { StepResult } from "./types.js";

/** rwxrwxr-x */
export const REPOSITORY_DIR_MODE = 0o775;

function fail(
  logger: RepositoryLogger,
  repository: string,
  error: BadParameterError
): StepResult<string> {
  logger.error("repository.validate.error", {
    reason: error.reason,
    path: repository,
    message: error.message,
  });
  return { ok: false, error };
}

/**
 * Ensure `repository` is a writable directory, creating it when allowed
 * @returns The repository path, unchanged
 */
export async function ensureRepositoryDir(
  repository: string,
  allowCreate: boolean,
  logger: RepositoryLogger
): Promise<StepResult<string>> {
  let status: PathStatus;
  try {
    status = await statPath(repository);
  } catch (err) {
    return fail(
      logger,
      repository,
      new BadParameterError(`Cannot inspect repository path ${repository}`, "not-writable", {
        cause: err,
      })
    );
  }

  if (status.exists && !status.isDirectory) {
    return fail(
      logger,
      repository,
      new BadParameterError(
        `File exists with same name as repository ${repository}`,
        "repository-collision"
      )
    );
  }

  if (!status.exists && allowCreate) {
    try {
      await fs.mkdir(repository, { recursive: true, mode: REPOSITORY_DIR_MODE });
    } catch (err) {
      return fail(
        logger,
        repository,
        new BadParameterError(`Failed creating repository directory ${repository}`, "create-failed", {
          cause: err,
        })
      );
    }
  }

  if (!(await isDirectoryWritable(repository))) {
    return fail(
      logger,
      repository,
      new BadParameterError(
        `Destination model directory ${repository} is not writable`,
        "not-writable"
      )
    );
  }

  return { ok: true, value: repository };
}
