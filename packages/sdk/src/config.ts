/**
 * Persisted configuration merge
 *
 * Only the top-level `parameters` section of <repo>/config.json is consumed.
 * It replaces (never deep-merges) the outgoing `parameters` value.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { BadParameterError } from "./errors.js";
import { safeParseConfig } from "./format/canonical.js";
import { errnoCode } from "./io.js";
import type { RepositoryLogger } from "./observability/logs.js";
import type { ParameterSet, ParameterValue, StepResult } from "./types.js";

export const CONFIG_FILENAME = "config.json";

const ParameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    // NaN and ±Infinity are valid persisted numbers
    z.number().or(z.nan()),
    z.boolean(),
    z.null(),
    z.array(ParameterValueSchema),
    z.record(z.string(), ParameterValueSchema),
  ])
);

const ConfigDocumentSchema = z
  .object({
    parameters: z.record(z.string(), ParameterValueSchema).optional(),
  })
  .catchall(ParameterValueSchema);

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;

/**
 * Convert a parsed JSON value into the parameter representation
 * @throws {z.ZodError} When the document is not an object, or `parameters` is not an object
 */
export function toConfigDocument(value: unknown): ConfigDocument {
  return ConfigDocumentSchema.parse(value);
}

/**
 * Merge the persisted `parameters` section into `outgoing`
 *
 * A missing config.json is a no-op. An absent `parameters` section merges as `{}`.
 * `outgoing` is only touched once parsing and conversion both succeed.
 */
export async function mergePersistedConfig(
  repository: string,
  outgoing: ParameterSet,
  logger: RepositoryLogger
): Promise<StepResult<ParameterSet>> {
  const configPath = join(repository, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return { ok: true, value: outgoing };
    }
    logger.error("config.parse.error", {
      reason: "config-parse",
      path: configPath,
      message: String(err),
    });
    return {
      ok: false,
      error: new BadParameterError(`Failed parsing config file ${configPath}`, "config-parse", {
        cause: err,
      }),
    };
  }

  const parsed = safeParseConfig(raw);
  if (!parsed.success) {
    logger.error("config.parse.error", {
      reason: "config-parse",
      path: configPath,
      message: parsed.error,
      details: { content: raw },
    });
    return {
      ok: false,
      error: new BadParameterError(`Failed parsing config file ${configPath}`, "config-parse"),
    };
  }

  let document: ConfigDocument;
  try {
    document = toConfigDocument(parsed.data);
  } catch (err) {
    logger.error("config.convert.error", {
      reason: "config-convert",
      path: configPath,
      message: String(err),
    });
    return {
      ok: false,
      error: new BadParameterError(
        "Failed converting JSON file to internal data format",
        "config-convert",
        { cause: err }
      ),
    };
  }

  outgoing.parameters = document.parameters ?? {};
  return { ok: true, value: outgoing };
}
