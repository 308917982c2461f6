/**
 * Single-attempt archive fetching
 *
 * No retries and no timeout: callers wanting bounded latency wrap the whole
 * bootstrap in their own deadline.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { FetchError } from "./errors.js";
import type { ArchiveFetcher } from "./types.js";

async function readFileUrl(source: string): Promise<Uint8Array> {
  try {
    return await readFile(fileURLToPath(source));
  } catch (err) {
    throw new FetchError(source, -1, { cause: err });
  }
}

/**
 * Fetch an http(s):// or file:// archive in one round trip
 * @throws {FetchError} On a transport failure (status -1) or a non-2xx response
 */
export const fetchArchive: ArchiveFetcher = async (source) => {
  if (source.toLowerCase().startsWith("file://")) {
    return readFileUrl(source);
  }

  let response: Response;
  try {
    response = await fetch(source, { redirect: "follow" });
  } catch (err) {
    throw new FetchError(source, -1, { cause: err });
  }

  if (!response.ok) {
    // Drain the body so the connection can be released
    await response.body?.cancel();
    throw new FetchError(source, response.status);
  }

  try {
    return new Uint8Array(await response.arrayBuffer());
  } catch (err) {
    throw new FetchError(source, response.status, { cause: err });
  }
};
