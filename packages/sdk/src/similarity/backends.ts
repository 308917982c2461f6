/**
 * Deployment-time selection of the similarity index backend
 */

import { BadParameterError } from "../errors.js";
import type { BackendFactory } from "../types.js";
import { InvertedFileBackend } from "./inverted-file-backend.js";
import { ApproximateTreeBackend } from "./tree-backend.js";

export const BACKEND_NAMES = ["none", "tree", "ivf"] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

/** Similarity search absent: the facade never holds a backend */
export const noBackend: BackendFactory = () => null;

export const treeBackend: BackendFactory = (context) => new ApproximateTreeBackend(context);

export const invertedFileBackend: BackendFactory = (context) => new InvertedFileBackend(context);

const FACTORIES: Record<BackendName, BackendFactory> = {
  none: noBackend,
  tree: treeBackend,
  ivf: invertedFileBackend,
};

export function isBackendName(value: string): value is BackendName {
  return (BACKEND_NAMES as readonly string[]).includes(value);
}

/**
 * Map a configured backend name to its factory
 * @throws {BadParameterError} For an unknown name
 */
export function resolveBackendFactory(name: string): BackendFactory {
  const normalized = name.trim().toLowerCase();
  if (!isBackendName(normalized)) {
    throw new BadParameterError(
      `Unknown similarity backend "${name}" (expected one of: ${BACKEND_NAMES.join(", ")})`,
      "invalid-option"
    );
  }
  return FACTORIES[normalized];
}
