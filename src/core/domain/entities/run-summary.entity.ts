import type { SkipReason } from "./shipment.entity.js";

export interface SkippedFile {
  fileName: string;
  reason: SkipReason;
  message: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  inputDir: string;
  outputPath: string;
  filesFound: number;
  /** Files whose data block was scanned, whether or not they yielded rows. */
  filesProcessed: number;
  skippedFiles: SkippedFile[];
  rowsWritten: number;
  /** Data rows dropped because price or quantity was not numeric. */
  rowsRejected: number;
  firstRow: number;
  nextRow: number;
}

export type NotSavedReason = "no-input-files" | "no-valid-rows";

export type FatalReason =
  | "output-dir-unavailable"
  | "template-unreadable"
  | "input-dir-missing"
  | "save-failed";

export type RunOutcome =
  | { status: "saved"; summary: RunSummary }
  | { status: "not-saved"; reason: NotSavedReason; summary: RunSummary }
  | {
      status: "fatal";
      reason: FatalReason;
      message: string;
      summary: RunSummary;
    };
