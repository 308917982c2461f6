/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  return path.join(homedir(), match[2] ?? "");
}

/**
 * Resolve the model repository directory
 * Priority: CLI option > MODELREPO_REPOSITORY env var > default "./model"
 */
export function resolveRepository(cliRepository?: string): string {
  const repository = cliRepository ?? process.env.MODELREPO_REPOSITORY ?? "./model";
  return path.resolve(expandTilde(repository));
}

/**
 * Resolve the similarity backend name
 * Priority: CLI option > MODELREPO_INDEX_BACKEND env var > "none"
 */
export function resolveBackendName(cliBackend?: string): string {
  return cliBackend ?? process.env.MODELREPO_INDEX_BACKEND ?? "none";
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.MODELREPO_CLI_DEBUG === "1";
}
