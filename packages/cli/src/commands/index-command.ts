/**
 * Similarity index commands for CLI
 */

import { Argument, Command } from "commander";
import type { IndexConfiguration } from "@modelrepo/sdk";
import { parseIdList, parseNonNegativeInt, parsePositiveInt } from "../lib/arg.js";
import { resolveRepository } from "../lib/env.js";
import { printNotice } from "../lib/render.js";
import { openCliRepository } from "../lib/repository.js";
import { withCommandMetrics } from "../lib/telemetry.js";
import type { GlobalOptions } from "../program.js";

const INDEX_ACTIONS = ["create", "build", "remove"] as const;

type IndexAction = (typeof INDEX_ACTIONS)[number];

interface IndexCommandOptions {
  dimension: number;
  backend?: string;
  indexType?: string;
  trainSamples?: number;
  ondisk?: boolean;
  nprobe?: number;
  gpu?: boolean;
  gpuid?: number[];
}

const PAST_TENSE: Record<IndexAction, string> = {
  create: "Created",
  build: "Built",
  remove: "Removed",
};

/**
 * Translate command-line flags into an index configuration
 */
export function toIndexConfiguration(options: IndexCommandOptions): IndexConfiguration {
  const config: IndexConfiguration = {};
  if (options.indexType !== undefined) config.index_type = options.indexType;
  if (options.trainSamples !== undefined) config.train_samples = options.trainSamples;
  if (options.ondisk) config.ondisk = true;
  if (options.nprobe !== undefined) config.nprobe = options.nprobe;
  if (options.gpu) config.index_gpu = true;
  if (options.gpuid !== undefined) config.index_gpuid = options.gpuid;
  return config;
}

/**
 * Create index command group
 */
export function createIndexCommand(program: Command): Command {
  return new Command("index")
    .copyInheritedSettings(program)
    .description("Create, build or remove the repository's similarity index")
    .addArgument(new Argument("<action>", "index operation").choices(INDEX_ACTIONS))
    .requiredOption("--dimension <n>", "Feature vector dimension", (val) =>
      parsePositiveInt(val, "--dimension")
    )
    .option("--backend <name>", "Similarity backend (none, tree, ivf)")
    .option("--index-type <key>", "Inverted-file index factory key")
    .option("--train-samples <n>", "Training sample count", (val) =>
      parseNonNegativeInt(val, "--train-samples")
    )
    .option("--ondisk", "Keep inverted lists on disk")
    .option("--nprobe <n>", "Lists probed per query", (val) => parseNonNegativeInt(val, "--nprobe"))
    .option("--gpu", "Place the index on GPU")
    .option("--gpuid <list>", "Comma-separated GPU device ids", (val) =>
      parseIdList(val, "--gpuid")
    )
    .addHelpText(
      "after",
      `
Examples:
  $ modelrepo index create --dimension 512 --backend tree
  $ MODELREPO_INDEX_BACKEND=ivf modelrepo index build --dimension 512 --nprobe 8
  $ modelrepo index remove --dimension 512 --backend ivf`
    )
    .action(async (action: IndexAction, options: IndexCommandOptions) => {
      await withCommandMetrics(`index.${action}`, async () => {
        const opts = program.opts<GlobalOptions>();
        const repository = resolveRepository(opts.repository);
        const repo = await openCliRepository(repository, { backend: options.backend });

        try {
          // Constructing the backend also creates (or opens) its index
          await repo.createSimSearch(options.dimension, toIndexConfiguration(options));

          if (!repo.similarity.hasBackend) {
            if (!opts.quiet) {
              printNotice("No similarity backend configured; nothing to do");
            }
            return;
          }

          if (action === "build") {
            await repo.buildIndex();
          } else if (action === "remove") {
            await repo.removeIndex();
          }

          if (!opts.quiet) {
            console.log(`${PAST_TENSE[action]} ${repo.similarity.backendKind} index in ${repository}`);
          }
        } finally {
          await repo.close();
        }
      });
    });
}
