#!/usr/bin/env node

/**
 * modelrepo CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

const program = createProgram();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already written help, version or usage output
      process.exit(err.exitCode);
    }
    const opts = program.opts<GlobalOptions>();
    const exitCode = mapSdkErrorToExitCode(err);
    const message = formatCliError(err, opts.verbose);
    console.error(`Error: ${message}`);
    process.exit(exitCode);
  }
}

void main();
