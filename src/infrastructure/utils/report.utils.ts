import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { RunOutcome } from "../../core/domain/entities/run-summary.entity.js";

/** Writes `summary_<runId>.json` and returns its path. */
export function writeRunSummary(outputDir: string, outcome: RunOutcome): string {
  if (!existsSync(outputDir)) mkdirSync(outputDir, { recursive: true });
  const path = join(outputDir, `summary_${outcome.summary.runId}.json`);
  const { summary, ...result } = outcome;
  writeFileSync(path, JSON.stringify({ ...summary, result }, null, 2) + "\n", "utf-8");
  return path;
}
