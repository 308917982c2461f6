/**
 * Inverted-file similarity backend
 */

import { join } from "node:path";
import { z } from "zod";
import type { BackendContext, IndexConfiguration, SimilarityIndexBackend } from "../types.js";
import {
  markBuilt,
  newDescriptor,
  readDescriptor,
  removeDescriptor,
  writeDescriptor,
  type IndexDescriptor,
} from "./descriptor.js";

export const INVERTED_FILE_INDEX_FILENAME = "index.faiss.json";

export interface InvertedFileOptions {
  indexKey: string;
  trainSamples: number;
  ondisk: boolean;
  nprobe: number;
  gpu: boolean;
  gpuIds: number[];
}

export const INVERTED_FILE_DEFAULTS: Readonly<InvertedFileOptions> = {
  indexKey: "IVF256,Flat",
  trainSamples: 100_000,
  ondisk: false,
  nprobe: 16,
  gpu: false,
  gpuIds: [],
};

const InvertedFileOptionsSchema: z.ZodType<InvertedFileOptions> = z.object({
  indexKey: z.string(),
  trainSamples: z.number().int().nonnegative(),
  ondisk: z.boolean(),
  nprobe: z.number().int().nonnegative(),
  gpu: z.boolean(),
  gpuIds: z.array(z.number().int().nonnegative()),
});

/**
 * Resolve backend options from a configuration; absent fields take defaults
 */
export function resolveInvertedFileOptions(config: IndexConfiguration): InvertedFileOptions {
  const gpuIds = config.index_gpuid ?? [];
  return {
    indexKey: config.index_type ?? INVERTED_FILE_DEFAULTS.indexKey,
    trainSamples: config.train_samples ?? INVERTED_FILE_DEFAULTS.trainSamples,
    ondisk: config.ondisk ?? INVERTED_FILE_DEFAULTS.ondisk,
    nprobe: config.nprobe ?? INVERTED_FILE_DEFAULTS.nprobe,
    // Naming devices implies GPU placement
    gpu: (config.index_gpu ?? INVERTED_FILE_DEFAULTS.gpu) || gpuIds.length > 0,
    gpuIds: [...gpuIds],
  };
}

export class InvertedFileBackend implements SimilarityIndexBackend {
  readonly kind = "ivf";
  readonly dimension: number;
  readonly options: InvertedFileOptions;
  readonly filePath: string;
  #index: IndexDescriptor<InvertedFileOptions> | null = null;

  constructor(context: BackendContext) {
    this.dimension = context.dimension;
    this.options = resolveInvertedFileOptions(context.config);
    this.filePath = join(context.repository, INVERTED_FILE_INDEX_FILENAME);
  }

  async #open(): Promise<IndexDescriptor<InvertedFileOptions>> {
    if (this.#index) return this.#index;

    const existing = await readDescriptor(
      this.filePath,
      this.kind,
      this.dimension,
      InvertedFileOptionsSchema
    );
    if (existing) {
      // Query-time settings follow the current configuration
      this.#index = { ...existing, options: { ...existing.options, nprobe: this.options.nprobe } };
    } else {
      this.#index = newDescriptor(this.kind, this.dimension, this.options);
      await writeDescriptor(this.filePath, this.#index);
    }
    return this.#index;
  }

  async createIndex(): Promise<void> {
    await this.#open();
  }

  async updateIndex(): Promise<void> {
    // Structural settings (key, training size, placement) apply on rebuild
    const current = await this.#open();
    this.#index = markBuilt({ ...current, options: this.options });
    await writeDescriptor(this.filePath, this.#index);
  }

  async removeIndex(): Promise<void> {
    this.#index = null;
    await removeDescriptor(this.filePath);
  }

  async dispose(): Promise<void> {
    this.#index = null;
  }

  /** Settings of the opened index, or `null` before it is opened */
  get indexOptions(): InvertedFileOptions | null {
    return this.#index ? this.#index.options : null;
  }
}
