/**
 * Repository lifecycle manager
 *
 * Opening a repository runs a fixed, fail-fast sequence:
 *   validate directory → bootstrap from `init` (if given) → merge config.json
 *   (if `init` was given and an outgoing parameter set was supplied)
 *
 * The first failing step aborts the sequence; no handle is returned for a
 * partially initialized repository. Correspondence tables and the similarity
 * facade are attached to the handle and used lazily.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { bootstrapRepository } from "./bootstrap.js";
import { mergePersistedConfig } from "./config.js";
import { CorrespondenceTable } from "./correspondence.js";
import { BadParameterError } from "./errors.js";
import { errnoCode } from "./io.js";
import { logger as defaultLogger, type RepositoryLogger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { ensureRepositoryDir } from "./path-validator.js";
import { noBackend } from "./similarity/backends.js";
import { SimilaritySearch } from "./similarity/facade.js";
import type {
  BackendFactory,
  BootstrapOutcome,
  IndexConfiguration,
  InitializationOptions,
  OpenRepositoryInit,
  StepResult,
} from "./types.js";
import { parseInitializationOptions } from "./validation.js";

export const BEST_MODEL_FILENAME = "best_model.txt";

export interface ModelRepositoryOptions {
  indexPreload?: boolean;
  logger?: RepositoryLogger;
  backend?: BackendFactory;
  bootstrap?: BootstrapOutcome | null;
}

/**
 * Handle on a model repository directory
 *
 * @example
 * ```typescript
 * const outgoing = {};
 * const repo = await openRepository(
 *   { repository: "./models/resnet", create_repository: true, init: "https://host/resnet.tar.gz" },
 *   { outgoing, backend: treeBackend }
 * );
 *
 * await repo.loadCorrespondences(join(repo.path, "corresp.txt"));
 * repo.lookupLabel(3); // "cat"
 *
 * await repo.createSimSearch(512, { nprobe: 8 });
 * await repo.buildIndex();
 * await repo.close();
 * ```
 */
export class ModelRepository {
  readonly path: string;
  readonly indexPreload: boolean;
  /** What bootstrap did while opening, or `null` when no `init` was given */
  readonly bootstrap: BootstrapOutcome | null;
  readonly #logger: RepositoryLogger;
  readonly #similarity: SimilaritySearch;
  #correspondences = new CorrespondenceTable();
  #closed = false;

  constructor(path: string, options: ModelRepositoryOptions = {}) {
    this.path = path;
    this.indexPreload = options.indexPreload ?? false;
    this.bootstrap = options.bootstrap ?? null;
    this.#logger = options.logger ?? defaultLogger;
    this.#similarity = new SimilaritySearch({
      repository: path,
      factory: options.backend ?? noBackend,
      preload: this.indexPreload,
      logger: this.#logger,
    });
  }

  get bestModelPath(): string {
    return join(this.path, BEST_MODEL_FILENAME);
  }

  /**
   * Contents of the best-model marker, trimmed
   * @returns `undefined` when the marker does not exist
   */
  async readBestModel(): Promise<string | undefined> {
    try {
      return (await readFile(this.bestModelPath, "utf-8")).trim();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return undefined;
      throw err;
    }
  }

  /**
   * Load and hold the correspondence table for this repository
   */
  async loadCorrespondences(filePath: string): Promise<CorrespondenceTable> {
    this.#correspondences = await CorrespondenceTable.load(filePath, this.#logger);
    return this.#correspondences;
  }

  get correspondences(): CorrespondenceTable {
    return this.#correspondences;
  }

  lookupLabel(index: number): string {
    return this.#correspondences.lookup(index);
  }

  get similarity(): SimilaritySearch {
    return this.#similarity;
  }

  /**
   * @throws {BadParameterError} Once the repository is closed
   */
  async createSimSearch(dimension: number, config?: IndexConfiguration): Promise<void> {
    if (this.#closed) {
      const error = new BadParameterError(`Repository ${this.path} is closed`, "invalid-option");
      this.#logger.error("simsearch.create.error", {
        reason: error.reason,
        path: this.path,
        message: error.message,
      });
      throw error;
    }
    await this.#similarity.createSimSearch(dimension, config);
  }

  createIndex(): Promise<void> {
    return this.#similarity.createIndex();
  }

  buildIndex(): Promise<void> {
    return this.#similarity.buildIndex();
  }

  removeIndex(): Promise<void> {
    return this.#similarity.removeIndex();
  }

  /**
   * Release the owned similarity backend (idempotent)
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    await this.#similarity.dispose();
  }
}

/**
 * Run the lifecycle sequence, stopping at the first failed step
 */
export async function initializeRepository(
  input: unknown,
  init: OpenRepositoryInit = {}
): Promise<StepResult<ModelRepository>> {
  const logger = init.logger ?? defaultLogger;

  const options = parseInitializationOptions(input);
  if (!options.ok) {
    logger.error("repository.options.error", {
      reason: options.error.reason,
      message: options.error.message,
    });
    return options;
  }
  const { repository, create_repository = false, index_preload = false } = options.value;

  const validated = await metrics.time("validate", () =>
    ensureRepositoryDir(repository, create_repository, logger)
  );
  if (!validated.ok) return validated;

  let bootstrap: BootstrapOutcome | null = null;
  if (options.value.init !== undefined) {
    const result = await bootstrapRepository(repository, options.value.init, {
      logger,
      fetcher: init.fetcher,
    });
    if (!result.ok) return result;
    bootstrap = result.value;

    if (init.outgoing) {
      const outgoing = init.outgoing;
      const merged = await metrics.time("config", () =>
        mergePersistedConfig(repository, outgoing, logger)
      );
      if (!merged.ok) return merged;
    }
  }

  return {
    ok: true,
    value: new ModelRepository(repository, {
      indexPreload: index_preload,
      logger,
      backend: init.backend,
      bootstrap,
    }),
  };
}

/**
 * Validate, bootstrap and configure a repository
 * @throws {BadParameterError} From the first failing lifecycle step
 */
export async function openRepository(
  input: InitializationOptions,
  init: OpenRepositoryInit = {}
): Promise<ModelRepository> {
  const result = await initializeRepository(input, init);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Wrap an existing repository path without running the lifecycle sequence
 */
export function attachRepository(
  path: string,
  options: Omit<ModelRepositoryOptions, "bootstrap"> = {}
): ModelRepository {
  return new ModelRepository(path, options);
}
