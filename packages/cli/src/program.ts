/**
 * Command definitions for the modelrepo CLI
 */

import { Command, type OutputConfiguration } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join, resolve } from "node:path";
import { attachRepository, CorrespondenceTable, type ParameterSet } from "@modelrepo/sdk";
import { createIndexCommand } from "./commands/index-command.js";
import { parseNonNegativeInt, parseParameterSet } from "./lib/arg.js";
import { resolveRepository } from "./lib/env.js";
import { CliError } from "./lib/errors.js";
import { formatLabelLines, paint, printJson } from "./lib/render.js";
import { configureSdkLogging, openCliRepository } from "./lib/repository.js";
import { withCommandMetrics } from "./lib/telemetry.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

export interface GlobalOptions {
  repository?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface InitCommandOptions {
  create?: boolean;
  init?: string;
  preload?: boolean;
  params?: ParameterSet;
}

function collectIndex(value: string, previous: number[] = []): number[] {
  return [...previous, parseNonNegativeInt(value, "index")];
}

/**
 * Build the command tree. Commander errors are thrown instead of exiting the
 * process; the entry point decides the exit code.
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .configureOutput(
      output ?? {
        writeErr: (str) => process.stderr.write(paint(str, "red")),
      }
    )
    .exitOverride();

  // Global options
  program
    .name("modelrepo")
    .description("Model repository lifecycle: validate, bootstrap, configure and index")
    .version(version)
    .option("--repository <path>", "Model repository directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      configureSdkLogging(Boolean(program.opts<GlobalOptions>().verbose));
    });

  // Init command
  program
    .command("init")
    .description("Validate the repository, install an archive and merge its config")
    .option("--create", "Create the repository directory if missing")
    .option("--init <source>", "Archive to install: local path, file://, http:// or https:// URL")
    .option("--preload", "Keep the similarity index resident in memory")
    .option("--params <json>", "Outgoing parameter set (JSON object)", (val) =>
      parseParameterSet(val, "--params")
    )
    .action(async (options: InitCommandOptions) => {
      await withCommandMetrics("init", async () => {
        const opts = program.opts<GlobalOptions>();
        const repository = resolveRepository(opts.repository);
        const outgoing: ParameterSet = options.params ?? {};

        const repo = await openCliRepository(repository, {
          create: options.create,
          init: options.init,
          preload: options.preload,
          outgoing,
        });
        await repo.close();

        printJson({
          repository: repo.path,
          bootstrapped: repo.bootstrap !== null,
          parameters: outgoing.parameters ?? {},
        });
      });
    });

  // Labels command
  program
    .command("labels")
    .description("Map class indices to labels through a correspondence file")
    .argument("<file>", "Correspondence file (one '<index> <label>' per line)")
    .argument("<index...>", "Class indices to look up", collectIndex)
    .action(async (file: string, indices: number[]) => {
      await withCommandMetrics("labels", async () => {
        const table = await CorrespondenceTable.load(resolve(file));
        formatLabelLines(table, indices).forEach((line) => console.log(line));
      });
    });

  // Best-model command
  program
    .command("best-model")
    .description("Print the repository's best-model marker")
    .action(async () => {
      await withCommandMetrics("best-model", async () => {
        const opts = program.opts<GlobalOptions>();
        const repo = attachRepository(resolveRepository(opts.repository));

        const best = await repo.readBestModel();
        if (best === undefined) {
          throw new CliError(`No best model recorded: ${repo.bestModelPath}`, { exitCode: 2 });
        }

        console.log(best);
      });
    });

  program.addCommand(createIndexCommand(program));

  return program;
}
