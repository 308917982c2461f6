/**
 * JSON formatting and parsing utilities
 *
 * Canonical output is deterministic, byte-stable JSON with:
 * - Alphabetical key ordering
 * - LF line endings
 * - Single trailing newline
 *
 * Invariants:
 * - Pure function: same input always produces same output bytes
 * - No mutation of input objects
 * - Cycle detection prevents infinite loops
 */

import { randomUUID } from "node:crypto";

export interface CanonicalOptions {
  /** Spaces per indentation level (default: 2) */
  indent?: number;
}

/**
 * Canonicalize a value to stable, deterministic JSON
 * @throws Error if circular references detected
 */
export function canonicalize(input: unknown, options: CanonicalOptions = {}): string {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      const normalized: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        normalized[key] = normalize(child);
      }
      return normalized;
    } finally {
      seen.delete(value);
    }
  };

  const json = JSON.stringify(normalize(input), null, options.indent ?? 2);
  return json.replace(/\r\n|\r/g, "\n").replace(/\s*$/, "") + "\n";
}

// Longest spellings first so "-Infinity" is not read as "-Inf" + "inity"
const NON_FINITE_TOKENS: ReadonlyArray<readonly [string, number]> = [
  ["-Infinity", -Infinity],
  ["-Inf", -Infinity],
  ["-NaN", NaN],
  ["Infinity", Infinity],
  ["Inf", Infinity],
  ["NaN", NaN],
];

/**
 * Replace bare non-finite tokens outside string literals with tagged strings
 */
function tagNonFiniteTokens(text: string, tag: string): string {
  let out = "";
  let inString = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      out += ch;
      if (ch === "\\") {
        out += text.charAt(i + 1);
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }

    const token = NON_FINITE_TOKENS.find(([spelling]) => text.startsWith(spelling, i));
    if (token) {
      out += JSON.stringify(tag + token[0]);
      i += token[0].length - 1;
      continue;
    }

    out += ch;
  }

  return out;
}

/**
 * Parse a config document: strict JSON plus NaN, Inf and Infinity literals
 * @returns Parsed value or error details
 */
export function safeParseConfig(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    // Strip BOM if present
    const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    const tag = `\u0000nonfinite:${randomUUID()}:`;
    const values = new Map(NON_FINITE_TOKENS.map(([spelling, value]) => [tag + spelling, value]));

    const data: unknown = JSON.parse(tagNonFiniteTokens(cleaned, tag), (key, value: unknown) => {
      if (key.startsWith(tag)) {
        throw new SyntaxError(`Unexpected token ${key.slice(tag.length)} used as an object key`);
      }
      return typeof value === "string" ? (values.get(value) ?? value) : value;
    });
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
