import {
  LOG_LEVEL_RANK,
  type ILogger,
  type LogEntry,
  type LogLevel,
} from "../../core/domain/services/logger.service.js";

const LEVEL_LABEL: Record<LogLevel, string> = {
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

const processSink: ConsoleSink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/** `LEVEL: [file] message` lines; warnings and errors go to stderr. */
export class ConsoleLogger implements ILogger {
  constructor(
    private minLevel: LogLevel = "info",
    private sink: ConsoleSink = processSink,
  ) {}

  init(_runId: string): void {}

  log(entry: LogEntry): void {
    if (LOG_LEVEL_RANK[entry.level] < LOG_LEVEL_RANK[this.minLevel]) return;
    const line = `${LEVEL_LABEL[entry.level]}: ${ConsoleLogger.format(entry)}`;
    if (entry.level === "info") this.sink.out(line);
    else this.sink.err(line);
  }

  close(): void {}

  static format(entry: LogEntry): string {
    return entry.file ? `[${entry.file}] ${entry.message}` : entry.message;
  }
}
