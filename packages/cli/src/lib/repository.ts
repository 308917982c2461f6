/**
 * Repository access for CLI commands
 */

import { stat } from "node:fs/promises";
import {
  logger,
  openRepository,
  resolveBackendFactory,
  type ModelRepository,
  type OpenRepositoryInit,
} from "@modelrepo/sdk";
import { CliError } from "./errors.js";
import { isVerbose, resolveBackendName } from "./env.js";

export interface CliRepositoryOptions {
  create?: boolean;
  init?: string;
  preload?: boolean;
  backend?: string;
  outgoing?: OpenRepositoryInit["outgoing"];
}

/**
 * Lifecycle events are diagnostics: shown with --verbose or MODELREPO_CLI_DEBUG=1,
 * silent otherwise since the command reports failures itself
 */
export function configureSdkLogging(verbose: boolean): void {
  logger.setThreshold(verbose || isVerbose() ? "debug" : "silent");
}

/**
 * Fail with exit code 2 when the repository directory does not exist
 */
export async function requireRepository(repository: string): Promise<void> {
  try {
    await stat(repository);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new CliError(`Repository not found: ${repository} (use --create to create it)`, {
        exitCode: 2,
        cause: err,
      });
    }
    throw err;
  }
}

/**
 * Open a repository through the full lifecycle sequence
 */
export async function openCliRepository(
  repository: string,
  options: CliRepositoryOptions = {}
): Promise<ModelRepository> {
  if (!options.create) {
    await requireRepository(repository);
  }

  return openRepository(
    {
      repository,
      create_repository: options.create ?? false,
      init: options.init,
      index_preload: options.preload ?? false,
    },
    {
      outgoing: options.outgoing,
      backend: resolveBackendFactory(resolveBackendName(options.backend)),
    }
  );
}
