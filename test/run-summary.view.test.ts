import { describe, expect, it } from "vitest";
import type { RunSummary } from "../src/core/domain/entities/run-summary.entity.js";
import { renderRunSummary } from "../src/infrastructure/views/run-summary.view.js";

const summary: RunSummary = {
  runId: "run_x",
  startedAt: "2026-01-05T09:00:00.000Z",
  finishedAt: "2026-01-05T09:00:02.000Z",
  inputDir: "/data/input",
  outputPath: "/data/output/output_filled.xlsx",
  filesFound: 3,
  filesProcessed: 2,
  skippedFiles: [{ fileName: "c.xlsx", reason: "corrupt-workbook", message: "Not a valid or readable workbook: c.xlsx" }],
  rowsWritten: 4,
  rowsRejected: 1,
  firstRow: 7,
  nextRow: 11,
};

describe("renderRunSummary", () => {
  it("describes a saved run with its skipped files", () => {
    expect(renderRunSummary({ status: "saved", summary })).toEqual([
      "",
      "Consolidation Summary",
      "---------------------",
      "Run ID: run_x",
      "Input directory: /data/input",
      "Files found: 3",
      "Files processed: 2",
      "Files skipped: 1",
      "Rows written: 4",
      "Rows rejected (non-numeric price/quantity): 1",
      "Output rows: 7-10",
      "Result: saved to /data/output/output_filled.xlsx",
      "",
      "Skipped files:",
      "  c.xlsx (corrupt-workbook): Not a valid or readable workbook: c.xlsx",
    ]);
  });

  it("explains why nothing was saved", () => {
    const empty = { ...summary, skippedFiles: [], rowsWritten: 0, nextRow: 7 };
    const lines = renderRunSummary({ status: "not-saved", reason: "no-valid-rows", summary: empty });

    expect(lines).not.toContain("Output rows: 7-6");
    expect(lines.at(-1)).toBe("Result: not saved (no valid rows were found)");
  });

  it("reports fatal failures", () => {
    const lines = renderRunSummary({
      status: "fatal",
      reason: "input-dir-missing",
      message: "Input directory '/data/input' not found.",
      summary: { ...summary, skippedFiles: [], rowsWritten: 0, nextRow: 7 },
    });

    expect(lines.at(-1)).toBe(
      "Result: failed (input directory missing): Input directory '/data/input' not found.",
    );
  });
});
