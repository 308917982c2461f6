/**
 * Backend-agnostic similarity index facade
 *
 * Invariants:
 * - At most one backend instance per facade; it is owned exclusively
 * - Every operation is a no-op while no backend is held
 * - Operations run one at a time, in call order
 */

import { BadParameterError } from "../errors.js";
import type { RepositoryLogger } from "../observability/logs.js";
import { parseIndexConfiguration } from "../validation.js";
import type { BackendFactory, IndexConfiguration, SimilarityIndexBackend } from "../types.js";

export interface SimilaritySearchOptions {
  repository: string;
  factory: BackendFactory;
  preload: boolean;
  logger: RepositoryLogger;
}

export class SimilaritySearch {
  readonly #options: SimilaritySearchOptions;
  #backend: SimilarityIndexBackend | null = null;
  #configuration: IndexConfiguration | null = null;
  #tail: Promise<void> = Promise.resolve();

  constructor(options: SimilaritySearchOptions) {
    this.#options = options;
  }

  get hasBackend(): boolean {
    return this.#backend !== null;
  }

  /** Kind of the held backend, or `null` when none is held */
  get backendKind(): string | null {
    return this.#backend?.kind ?? null;
  }

  /** Configuration the held backend was created with */
  get configuration(): IndexConfiguration | null {
    return this.#configuration;
  }

  #serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.#tail.then(fn);
    this.#tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Create the backend and its index; a no-op when a backend is already held
   * @throws {BadParameterError} On an invalid dimension or configuration
   */
  createSimSearch(dimension: number, config: IndexConfiguration = {}): Promise<void> {
    return this.#serialize(async () => {
      if (this.#backend) return;

      if (!Number.isInteger(dimension) || dimension <= 0) {
        throw new BadParameterError(
          `Similarity index dimension must be a positive integer, got ${dimension}`,
          "invalid-option"
        );
      }
      const parsed = parseIndexConfiguration(config);
      if (!parsed.ok) throw parsed.error;

      const { repository, factory, preload, logger } = this.#options;
      const backend = factory({ dimension, repository, preload, config: parsed.value });
      if (!backend) {
        logger.debug("simsearch.absent", { path: repository });
        return;
      }

      this.#backend = backend;
      this.#configuration = parsed.value;
      logger.info("simsearch.create", {
        path: repository,
        details: { backend: backend.kind, dimension },
      });
      await backend.createIndex();
    });
  }

  createIndex(): Promise<void> {
    return this.#serialize(async () => {
      await this.#backend?.createIndex();
    });
  }

  buildIndex(): Promise<void> {
    return this.#serialize(async () => {
      await this.#backend?.updateIndex();
    });
  }

  removeIndex(): Promise<void> {
    return this.#serialize(async () => {
      await this.#backend?.removeIndex();
    });
  }

  /**
   * Release the owned backend; later operations are no-ops until a new one is created
   */
  dispose(): Promise<void> {
    return this.#serialize(async () => {
      const backend = this.#backend;
      this.#backend = null;
      this.#configuration = null;
      await backend?.dispose();
    });
  }
}
