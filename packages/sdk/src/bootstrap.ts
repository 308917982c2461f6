/**
 * Archive bootstrap: materialize a model archive inside the repository
 *
 * Invariants:
 * - At most one fetch per call, never retried
 * - An archive already present at <repo>/<basename> is reused, never re-fetched
 * - Fetched bytes land atomically, so a failed fetch leaves no candidate file behind
 */

import { join } from "node:path";
import { extractArchive } from "./archive.js";
import { BadParameterError, FetchError } from "./errors.js";
import { fetchArchive } from "./fetch.js";
import { atomicWrite, fileExists } from "./io.js";
import type { RepositoryLogger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { isRemote, parseSourceReference } from "./source.js";
import type { ArchiveFetcher, BootstrapOutcome, StepResult } from "./types.js";

export interface BootstrapOptions {
  logger: RepositoryLogger;
  fetcher?: ArchiveFetcher;
}

function fail<T>(logger: RepositoryLogger, event: string, error: BadParameterError): StepResult<T> {
  logger.error(event, { reason: error.reason, message: error.message });
  return { ok: false, error };
}

async function fetchInto(
  source: string,
  target: string,
  fetcher: ArchiveFetcher,
  logger: RepositoryLogger
): Promise<StepResult<string>> {
  logger.info("bootstrap.fetch.start", { path: target, message: `Downloading init model ${source}` });

  let content: Uint8Array;
  try {
    content = await fetcher(source);
  } catch (err) {
    const status = err instanceof FetchError ? err.status : -1;
    return fail(
      logger,
      "bootstrap.fetch.error",
      new BadParameterError(
        `Failed fetching model archive: ${source} with code: ${status}`,
        "fetch-failed",
        { cause: err }
      )
    );
  }

  try {
    await atomicWrite(target, content);
  } catch (err) {
    return fail(
      logger,
      "bootstrap.fetch.error",
      new BadParameterError(`Failed writing model archive ${target}`, "fetch-failed", { cause: err })
    );
  }

  return { ok: true, value: target };
}

/**
 * Make sure the archive named by `sourceRef` is local, then extract it into `repository`
 */
export async function bootstrapRepository(
  repository: string,
  sourceRef: string,
  options: BootstrapOptions
): Promise<StepResult<BootstrapOutcome>> {
  const { logger, fetcher = fetchArchive } = options;
  const source = parseSourceReference(sourceRef);
  const candidate = join(repository, source.basename);

  let archive = source.raw;
  let fetched = false;
  let reused = false;

  let present: boolean;
  try {
    present = await fileExists(candidate);
  } catch (err) {
    // e.g. ENAMETOOLONG for an overlong URL basename
    const remote = isRemote(source);
    return fail(
      logger,
      remote ? "bootstrap.fetch.error" : "bootstrap.extract.error",
      new BadParameterError(
        `Cannot inspect model archive location ${candidate}`,
        remote ? "fetch-failed" : "extract-failed",
        { cause: err }
      )
    );
  }

  if (present) {
    logger.warn("bootstrap.reuse", {
      path: candidate,
      message: "Init model is already in directory, not fetching it",
    });
    archive = candidate;
    reused = true;
  } else if (isRemote(source)) {
    const result = await metrics.time("fetch", () => fetchInto(source.raw, candidate, fetcher, logger));
    if (!result.ok) return result;
    archive = result.value;
    fetched = true;
  }

  const extracted = await metrics.time("extract", async (): Promise<StepResult<string>> => {
    try {
      await extractArchive(archive, repository);
      return { ok: true, value: archive };
    } catch (err) {
      return fail(
        logger,
        "bootstrap.extract.error",
        new BadParameterError(
          `Failed installing model from archive ${archive}, check 'init' argument to model`,
          "extract-failed",
          { cause: err }
        )
      );
    }
  });
  if (!extracted.ok) return extracted;

  return { ok: true, value: { archive, fetched, reused } };
}
