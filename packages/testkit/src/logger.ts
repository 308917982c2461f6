/**
 * Recording logger for asserting lifecycle events
 */

import type { LogData, LogLevel, RepositoryLogger } from "@modelrepo/sdk";

export interface RecordedLog {
  level: LogLevel;
  event: string;
  data?: LogData;
}

export interface RecordingLogger extends RepositoryLogger {
  readonly entries: RecordedLog[];
  /** Event names logged at `level`, in order */
  events(level?: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: RecordedLog[] = [];
  const record = (level: LogLevel) => (event: string, data?: LogData) => {
    entries.push({ level, event, data });
  };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    events(level) {
      return entries.filter((entry) => !level || entry.level === level).map((entry) => entry.event);
    },
  };
}
