/**
 * Bootstrap source references
 */

import { posix } from "node:path";

export type SourceScheme = "http" | "https" | "file" | "local";

export interface SourceReference {
  /** Reference exactly as the caller gave it */
  raw: string;
  scheme: SourceScheme;
  /** Final path segment, used to name the archive inside the repository */
  basename: string;
}

/** Name used when a URL has no final path segment */
export const FALLBACK_ARCHIVE_NAME = "model-archive";

const REMOTE_SCHEMES: ReadonlyArray<Exclude<SourceScheme, "local">> = ["http", "https", "file"];

function detectScheme(raw: string): SourceScheme {
  const lower = raw.toLowerCase();
  for (const scheme of REMOTE_SCHEMES) {
    if (lower.startsWith(`${scheme}://`)) {
      return scheme;
    }
  }
  // Anything else, including unknown URL schemes, is a local path
  return "local";
}

function urlBasename(raw: string): string {
  try {
    return posix.basename(decodeURIComponent(new URL(raw).pathname));
  } catch {
    return raw.slice(raw.lastIndexOf("/") + 1);
  }
}

/**
 * Classify a source reference and derive its archive file name
 *
 * @example
 * parseSourceReference("https://host/models/resnet.tar.gz?v=2")
 * // { raw: "...", scheme: "https", basename: "resnet.tar.gz" }
 */
export function parseSourceReference(raw: string): SourceReference {
  const scheme = detectScheme(raw);
  const name = scheme === "local" ? raw.slice(raw.lastIndexOf("/") + 1) : urlBasename(raw);
  return { raw, scheme, basename: name || FALLBACK_ARCHIVE_NAME };
}

export function isRemote(source: SourceReference): boolean {
  return source.scheme !== "local";
}
