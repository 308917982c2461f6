/**
 * On-disk index descriptors shared by the built-in backends
 *
 * Stored as canonical JSON next to the model files:
 * { backend, dimension, options, state, builds, updatedAt }
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { BadParameterError } from "../errors.js";
import { canonicalize, safeParseConfig } from "../format/canonical.js";
import { atomicWrite, errnoCode, removeFile } from "../io.js";

export type IndexState = "empty" | "built";

export interface IndexDescriptor<O> {
  backend: string;
  dimension: number;
  options: O;
  state: IndexState;
  builds: number;
  updatedAt: string;
}

const DescriptorEnvelopeSchema = z.object({
  backend: z.string(),
  dimension: z.number().int().positive(),
  options: z.unknown(),
  state: z.enum(["empty", "built"]),
  builds: z.number().int().nonnegative(),
  updatedAt: z.string(),
});

function corrupt(filePath: string): BadParameterError {
  return new BadParameterError(`Corrupt similarity index descriptor ${filePath}`, "invalid-option");
}

export function newDescriptor<O>(backend: string, dimension: number, options: O): IndexDescriptor<O> {
  return {
    backend,
    dimension,
    options,
    state: "empty",
    builds: 0,
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Read a descriptor written by `backend`
 * @returns The descriptor, or `null` when the file does not exist
 * @throws {BadParameterError} When the file is corrupt, belongs to another
 *   backend, or was built for another dimension
 */
export async function readDescriptor<O>(
  filePath: string,
  backend: string,
  dimension: number,
  optionsSchema: z.ZodType<O>
): Promise<IndexDescriptor<O> | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }

  const parsed = safeParseConfig(raw);
  const envelope = parsed.success ? DescriptorEnvelopeSchema.safeParse(parsed.data) : null;
  if (!envelope?.success) {
    throw corrupt(filePath);
  }

  if (envelope.data.backend !== backend) {
    throw new BadParameterError(
      `Similarity index ${filePath} was created by backend "${envelope.data.backend}", not "${backend}"`,
      "invalid-option"
    );
  }

  if (envelope.data.dimension !== dimension) {
    throw new BadParameterError(
      `Similarity index ${filePath} has dimension ${envelope.data.dimension}, expected ${dimension}`,
      "invalid-option"
    );
  }

  // Options are only meaningful to the backend that wrote them
  const options = optionsSchema.safeParse(envelope.data.options);
  if (!options.success) {
    throw corrupt(filePath);
  }

  return { ...envelope.data, options: options.data };
}

export async function writeDescriptor<O>(filePath: string, descriptor: IndexDescriptor<O>): Promise<void> {
  await atomicWrite(filePath, canonicalize(descriptor));
}

export async function removeDescriptor(filePath: string): Promise<void> {
  await removeFile(filePath);
}

/**
 * Mark a descriptor as rebuilt
 */
export function markBuilt<O>(descriptor: IndexDescriptor<O>): IndexDescriptor<O> {
  return {
    ...descriptor,
    state: "built",
    builds: descriptor.builds + 1,
    updatedAt: new Date().toISOString(),
  };
}
