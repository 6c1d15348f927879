import type {
  FatalReason,
  NotSavedReason,
  RunOutcome,
} from "../../core/domain/entities/run-summary.entity.js";

const NOT_SAVED_LABEL: Record<NotSavedReason, string> = {
  "no-input-files": "no input file could be processed",
  "no-valid-rows": "no valid rows were found",
};

const FATAL_LABEL: Record<FatalReason, string> = {
  "output-dir-unavailable": "output directory unavailable",
  "template-unreadable": "template could not be loaded",
  "input-dir-missing": "input directory missing",
  "save-failed": "output could not be saved",
};

export function renderRunSummary(outcome: RunOutcome): string[] {
  const { summary } = outcome;
  const lines = [
    "",
    "Consolidation Summary",
    "---------------------",
    `Run ID: ${summary.runId}`,
    `Input directory: ${summary.inputDir}`,
    `Files found: ${summary.filesFound}`,
    `Files processed: ${summary.filesProcessed}`,
    `Files skipped: ${summary.skippedFiles.length}`,
    `Rows written: ${summary.rowsWritten}`,
    `Rows rejected (non-numeric price/quantity): ${summary.rowsRejected}`,
  ];
  if (summary.rowsWritten > 0) {
    lines.push(`Output rows: ${summary.firstRow}-${summary.nextRow - 1}`);
  }

  switch (outcome.status) {
    case "saved":
      lines.push(`Result: saved to ${summary.outputPath}`);
      break;
    case "not-saved":
      lines.push(`Result: not saved (${NOT_SAVED_LABEL[outcome.reason]})`);
      break;
    case "fatal":
      lines.push(`Result: failed (${FATAL_LABEL[outcome.reason]}): ${outcome.message}`);
      break;
  }

  if (summary.skippedFiles.length > 0) {
    lines.push("", "Skipped files:");
    for (const skipped of summary.skippedFiles) {
      lines.push(`  ${skipped.fileName} (${skipped.reason}): ${skipped.message}`);
    }
  }
  return lines;
}

export function printRunSummary(outcome: RunOutcome): void {
  for (const line of renderRunSummary(outcome)) console.log(line);
}
