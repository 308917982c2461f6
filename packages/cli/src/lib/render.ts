/**
 * Command output
 *
 * Results go to stdout. Notices and usage errors go to stderr, colored only
 * when stderr is a terminal.
 */

import type { CorrespondenceTable } from "@modelrepo/sdk";

const ANSI = { red: 31, yellow: 33 } as const;

export type Tone = keyof typeof ANSI;

export function paint(
  text: string,
  tone: Tone,
  stream: { isTTY?: boolean } = process.stderr
): string {
  return stream.isTTY ? `\x1b[${ANSI[tone]}m${text}\x1b[0m` : text;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * `<index> <label>` for each requested index, in request order
 */
export function formatLabelLines(table: CorrespondenceTable, indices: readonly number[]): string[] {
  return indices.map((index) => `${index} ${table.lookup(index)}`);
}

export function printNotice(message: string): void {
  console.error(paint(message, "yellow"));
}
