import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import type { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";

/** Appends one JSON object per entry to `<dir>/<name>_<runId>.jsonl`. */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId = "";
  private logPath: string | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    this.runId = runId;
    this.logPath = join(this.logDir, filename);
    this.logStream = createWriteStream(this.logPath, { flags: "a" });
  }

  get path(): string | null {
    return this.logPath;
  }

  log(entry: LogEntry): void {
    if (this.logStream?.writable) {
      const full = {
        timestamp: new Date().toISOString(),
        runId: this.runId,
        ...entry,
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }
}
