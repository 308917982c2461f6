/**
 * Validation of caller-supplied option bags
 */

import { z } from "zod";
import { BadParameterError } from "./errors.js";
import type { IndexConfiguration, InitializationOptions, StepResult } from "./types.js";

const NonNegativeIntSchema = z.number().int().nonnegative();

export const InitializationOptionsSchema = z
  .object({
    repository: z.string().min(1, "repository must be a non-empty path"),
    create_repository: z.boolean().optional(),
    init: z.string().min(1, "init must be a non-empty source reference").optional(),
    index_preload: z.boolean().optional(),
  })
  .passthrough();

export const IndexConfigurationSchema = z
  .object({
    index_type: z.string().min(1).optional(),
    train_samples: NonNegativeIntSchema.optional(),
    ondisk: z.boolean().optional(),
    nprobe: NonNegativeIntSchema.optional(),
    index_gpu: z.boolean().optional(),
    index_gpuid: z.array(NonNegativeIntSchema).optional(),
  })
  .passthrough();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate initialization options, dropping keys the lifecycle does not use
 */
export function parseInitializationOptions(input: unknown): StepResult<InitializationOptions> {
  const parsed = InitializationOptionsSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: new BadParameterError(
        `Invalid initialization options: ${describeIssues(parsed.error)}`,
        "invalid-option"
      ),
    };
  }

  const { repository, create_repository, init, index_preload } = parsed.data;
  return { ok: true, value: { repository, create_repository, init, index_preload } };
}

/**
 * Validate a similarity index configuration
 */
export function parseIndexConfiguration(input: unknown): StepResult<IndexConfiguration> {
  const parsed = IndexConfigurationSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      error: new BadParameterError(
        `Invalid index configuration: ${describeIssues(parsed.error)}`,
        "invalid-option"
      ),
    };
  }

  const { index_type, train_samples, ondisk, nprobe, index_gpu, index_gpuid } = parsed.data;
  return { ok: true, value: { index_type, train_samples, ondisk, nprobe, index_gpu, index_gpuid } };
}
