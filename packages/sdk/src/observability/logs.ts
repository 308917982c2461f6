/**
 * Lifecycle event log
 *
 * Every record is one line on stderr, so command output on stdout stays
 * parseable:
 *
 *   2024-05-01T12:00:00.000Z ERROR bootstrap.fetch.error reason=fetch-failed path="/m/a.tar.gz" msg="..."
 *
 * Event names are dotted, led by the component (`repository`, `bootstrap`,
 * `config`, `corresp`, `simsearch`). Failures carry the BadParameterError
 * reason they are about to raise.
 */

import type { BadParameterReason } from "../errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Lowest level that is written; `silent` writes nothing */
export type LogThreshold = LogLevel | "silent";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  reason?: BadParameterReason;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Fields a caller may attach to a log event
 */
export type LogData = Pick<LogEntry, "reason" | "path" | "message" | "details">;

/**
 * Minimal logger surface accepted by every lifecycle component
 */
export interface RepositoryLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

const RANK: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function formatLogEntry(entry: LogEntry): string {
  const fields = [entry.timestamp, entry.level.toUpperCase().padEnd(5), entry.event];
  if (entry.reason) fields.push(`reason=${entry.reason}`);
  if (entry.path) fields.push(`path=${JSON.stringify(entry.path)}`);
  if (entry.message) fields.push(`msg=${JSON.stringify(entry.message)}`);
  if (entry.details) fields.push(`details=${JSON.stringify(entry.details)}`);
  return fields.join(" ");
}

export class LifecycleLogger implements RepositoryLogger {
  #threshold: LogThreshold;
  readonly #write: (line: string) => void;

  constructor(
    write: (line: string) => void = (line) => process.stderr.write(line + "\n"),
    threshold: LogThreshold = process.env.MODELREPO_DEBUG ? "debug" : "info"
  ) {
    this.#write = write;
    this.#threshold = threshold;
  }

  get threshold(): LogThreshold {
    return this.#threshold;
  }

  setThreshold(threshold: LogThreshold): void {
    this.#threshold = threshold;
  }

  #log(level: LogLevel, event: string, data?: LogData): void {
    if (RANK[level] < RANK[this.#threshold]) return;
    this.#write(formatLogEntry({ timestamp: new Date().toISOString(), level, event, ...data }));
  }

  debug(event: string, data?: LogData): void {
    this.#log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.#log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.#log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.#log("error", event, data);
  }
}

/**
 * Process-wide logger used when a component is given none
 */
export const logger = new LifecycleLogger();
