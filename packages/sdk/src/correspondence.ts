/**
 * Class index → label correspondence table
 *
 * File format: one `<index> <label>` entry per line, split on the first space.
 * Lines with an empty key are skipped; later duplicates win.
 */

import { readFile } from "node:fs/promises";
import { BadParameterError } from "./errors.js";
import { logger as defaultLogger, type RepositoryLogger } from "./observability/logs.js";

const INDEX_PATTERN = /^\d+$/;

export class CorrespondenceTable {
  readonly #labels: ReadonlyMap<number, string>;

  constructor(labels: ReadonlyMap<number, string> = new Map()) {
    this.#labels = labels;
  }

  /**
   * Load a table from a correspondence file
   *
   * An empty path or an unreadable file yields an empty table.
   * @throws {BadParameterError} When a line's key is not a non-negative integer
   */
  static async load(
    filePath: string,
    logger: RepositoryLogger = defaultLogger
  ): Promise<CorrespondenceTable> {
    if (filePath === "") {
      return new CorrespondenceTable();
    }

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      logger.info("corresp.open.failed", {
        path: filePath,
        message: `Cannot open model corresp file: ${String(err)}`,
      });
      return new CorrespondenceTable();
    }

    return CorrespondenceTable.parse(content, filePath, logger);
  }

  /**
   * Parse correspondence file content
   * @param source - Name used in error messages
   */
  static parse(
    content: string,
    source = "<inline>",
    logger: RepositoryLogger = defaultLogger
  ): CorrespondenceTable {
    const labels = new Map<number, string>();
    const lines = content.split("\n");

    for (const [i, rawLine] of lines.entries()) {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
      const space = line.indexOf(" ");
      const key = space === -1 ? line : line.slice(0, space);
      if (key === "") continue;

      const index = Number.parseInt(key, 10);
      // Keys past 2^53 would round onto a neighbouring index
      if (!INDEX_PATTERN.test(key) || !Number.isSafeInteger(index)) {
        const error = new BadParameterError(
          `Invalid class index "${key}" in corresp file ${source} at line ${i + 1}`,
          "corresp-parse"
        );
        logger.error("corresp.parse.error", {
          reason: error.reason,
          path: source,
          message: error.message,
        });
        throw error;
      }

      // A line without a space maps the index to the whole line
      labels.set(index, line.slice(space + 1));
    }

    return new CorrespondenceTable(labels);
  }

  get size(): number {
    return this.#labels.size;
  }

  /**
   * Label for class `index`, or its decimal form when unmapped
   */
  lookup(index: number): string {
    return this.#labels.get(index) ?? String(index);
  }
}
