/**
 * Approximate-tree similarity backend
 *
 * Honours only the dimension and the preload flag; every other
 * IndexConfiguration field is meaningless for tree indexes and ignored.
 */

import { join } from "node:path";
import { z } from "zod";
import type { BackendContext, SimilarityIndexBackend } from "../types.js";
import {
  markBuilt,
  newDescriptor,
  readDescriptor,
  removeDescriptor,
  writeDescriptor,
  type IndexDescriptor,
} from "./descriptor.js";

export const TREE_INDEX_FILENAME = "index.ann.json";

export interface TreeIndexOptions {
  /** Keep the opened index resident instead of re-reading it per operation */
  preload: boolean;
}

const TreeIndexOptionsSchema: z.ZodType<TreeIndexOptions> = z.object({ preload: z.boolean() });

export class ApproximateTreeBackend implements SimilarityIndexBackend {
  readonly kind = "tree";
  readonly dimension: number;
  readonly options: TreeIndexOptions;
  readonly filePath: string;
  #resident: IndexDescriptor<TreeIndexOptions> | null = null;

  constructor(context: BackendContext) {
    this.dimension = context.dimension;
    this.options = { preload: context.preload };
    this.filePath = join(context.repository, TREE_INDEX_FILENAME);
  }

  async #open(): Promise<IndexDescriptor<TreeIndexOptions>> {
    if (this.#resident) return this.#resident;

    let descriptor = await readDescriptor(
      this.filePath,
      this.kind,
      this.dimension,
      TreeIndexOptionsSchema
    );
    if (!descriptor) {
      descriptor = newDescriptor(this.kind, this.dimension, this.options);
      await writeDescriptor(this.filePath, descriptor);
    }

    if (this.options.preload) {
      this.#resident = descriptor;
    }
    return descriptor;
  }

  async createIndex(): Promise<void> {
    await this.#open();
  }

  async updateIndex(): Promise<void> {
    const built = markBuilt(await this.#open());
    await writeDescriptor(this.filePath, built);
    if (this.options.preload) {
      this.#resident = built;
    }
  }

  async removeIndex(): Promise<void> {
    this.#resident = null;
    await removeDescriptor(this.filePath);
  }

  async dispose(): Promise<void> {
    this.#resident = null;
  }

  /** True while a preloaded index is held in memory */
  get isResident(): boolean {
    return this.#resident !== null;
  }
}
