import type { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";

export class CompositeLogger implements ILogger {
  private loggers: ILogger[];

  constructor(...loggers: ILogger[]) {
    this.loggers = loggers;
  }

  init(runId: string): void {
    for (const logger of this.loggers) logger.init(runId);
  }

  log(entry: LogEntry): void {
    for (const logger of this.loggers) logger.log(entry);
  }

  close(): void {
    for (const logger of this.loggers) logger.close();
  }
}
