import { existsSync, mkdirSync, statSync } from "node:fs";
import { dirname } from "node:path";
import type {
  FatalReason,
  RunOutcome,
  RunSummary,
} from "../domain/entities/run-summary.entity.js";
import type { DiscoveredFile } from "../domain/entities/shipment.entity.js";
import { OUTPUT_LAYOUT } from "../domain/constants.js";
import { errorMessage } from "../domain/errors.js";
import type { ILogger } from "../domain/services/logger.service.js";
import { OutputAccumulator } from "../domain/services/output-accumulator.service.js";
import type {
  ITemplateLoader,
  OutputWorkbook,
} from "../domain/services/workbook.service.js";
import { DiscoverFilesUseCase } from "./discover-files.use-case.js";
import { ExtractFileUseCase } from "./extract-file.use-case.js";

export interface ConsolidateBatchRequest {
  runId: string;
  inputDir: string;
  templatePath: string;
  outputPath: string;
  extension: string;
  tempFilePrefix: string;
}

/**
 * Runs one consolidation: every input workbook is extracted in name order and
 * its accepted rows are appended to the template, which is saved once at the
 * end. A failing file is logged and skipped; only template, directory and
 * save problems end the run early.
 */
export class ConsolidateBatchUseCase {
  constructor(
    private extractFile: ExtractFileUseCase,
    private templateLoader: ITemplateLoader,
    private discoverFiles: DiscoverFilesUseCase,
    private logger: ILogger,
  ) {}

  async execute(request: ConsolidateBatchRequest): Promise<RunOutcome> {
    const summary: RunSummary = {
      runId: request.runId,
      startedAt: new Date().toISOString(),
      finishedAt: "",
      inputDir: request.inputDir,
      outputPath: request.outputPath,
      filesFound: 0,
      filesProcessed: 0,
      skippedFiles: [],
      rowsWritten: 0,
      rowsRejected: 0,
      firstRow: OUTPUT_LAYOUT.startRow,
      nextRow: OUTPUT_LAYOUT.startRow,
    };
    const fatal = (reason: FatalReason, message: string): RunOutcome => {
      this.logger.log({ level: "error", message: `Fatal: ${message}` });
      summary.finishedAt = new Date().toISOString();
      return { status: "fatal", reason, message, summary };
    };

    // 1. Output directory, template, input directory
    const outputDir = dirname(request.outputPath);
    try {
      if (!existsSync(outputDir)) {
        mkdirSync(outputDir, { recursive: true });
        this.logger.log({ level: "info", message: `Created output directory '${outputDir}'.` });
      }
    } catch (e) {
      return fatal(
        "output-dir-unavailable",
        `Cannot create output directory '${outputDir}'. ${errorMessage(e)}`,
      );
    }

    let output: OutputWorkbook;
    try {
      output = await this.templateLoader.load(request.templatePath);
    } catch (e) {
      return fatal("template-unreadable", errorMessage(e));
    }
    this.logger.log({ level: "info", message: `Loaded template '${request.templatePath}'.` });

    if (!this.isDirectory(request.inputDir)) {
      return fatal("input-dir-missing", `Input directory '${request.inputDir}' not found.`);
    }

    // 2. Discover input files
    let files: DiscoveredFile[];
    try {
      files = this.discoverFiles.execute({
        inputDir: request.inputDir,
        extension: request.extension,
        tempFilePrefix: request.tempFilePrefix,
      });
    } catch (e) {
      return fatal(
        "input-dir-missing",
        `Cannot list input directory '${request.inputDir}'. ${errorMessage(e)}`,
      );
    }
    summary.filesFound = files.length;
    if (files.length === 0) {
      this.logger.log({
        level: "warn",
        message: `No ${request.extension} files to process in '${request.inputDir}'.`,
      });
    } else {
      this.logger.log({
        level: "info",
        message: `Found ${files.length} ${request.extension} file(s) in '${request.inputDir}'.`,
      });
    }

    // 3. Extract and append, one file at a time
    const accumulator = new OutputAccumulator(output.sheet);
    for (const file of files) {
      this.logger.log({ level: "info", message: "Processing file.", file: file.fileName });
      const result = await this.extractFile.execute(file);

      switch (result.status) {
        case "skipped":
          summary.skippedFiles.push({
            fileName: file.fileName,
            reason: result.reason,
            message: result.message,
          });
          break;
        case "extracted":
          summary.filesProcessed += 1;
          summary.rowsRejected += result.stats.invalidRows;
          for (const record of result.records) {
            const row = accumulator.append(result.context, record);
            this.logger.log({
              level: "info",
              message: `Input row ${record.sourceRow} written to output row ${row}.`,
              file: file.fileName,
              row: record.sourceRow,
            });
          }
          break;
      }
    }
    summary.rowsWritten = accumulator.rowsWritten;
    summary.nextRow = accumulator.nextRow;

    // 4. Save once, only when something was written
    if (accumulator.rowsWritten === 0) {
      summary.finishedAt = new Date().toISOString();
      if (summary.filesProcessed === 0) {
        this.logger.log({
          level: "info",
          message: "No input file could be processed; output was not saved.",
        });
        return { status: "not-saved", reason: "no-input-files", summary };
      }
      this.logger.log({
        level: "warn",
        message: `Processed ${summary.filesProcessed} file(s) but found no valid rows; output was not saved.`,
      });
      return { status: "not-saved", reason: "no-valid-rows", summary };
    }

    this.logger.log({
      level: "info",
      message: `Processed ${summary.filesProcessed} file(s). Writing ${accumulator.rowsWritten} row(s) to '${request.outputPath}'.`,
    });
    try {
      await output.save(request.outputPath);
    } catch (e) {
      return fatal("save-failed", `Cannot save '${request.outputPath}'. ${errorMessage(e)}`);
    }
    summary.finishedAt = new Date().toISOString();
    this.logger.log({ level: "info", message: `Saved '${request.outputPath}'.` });
    return { status: "saved", summary };
  }

  private isDirectory(path: string): boolean {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  }
}
