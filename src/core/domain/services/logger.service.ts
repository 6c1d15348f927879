import type { LogLevel } from "../entities/config.entity.js";

export type { LogLevel } from "../entities/config.entity.js";

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Input file the entry is about, when there is one. */
  file?: string;
  row?: number;
  value?: string | number | boolean | null;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  close(): void;
}

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
};
