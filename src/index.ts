#!/usr/bin/env node
/**
 * Shipment Consolidator – CLI
 * Commands: consolidate (default) | inspect
 */

import { basename, resolve } from "node:path";
import { program } from "commander";
import { loadConfig, getConfigPath } from "./infrastructure/utils/config.utils.js";
import type { Config, LogLevel } from "./core/domain/entities/config.entity.js";
import { cellText } from "./core/domain/entities/cell-value.entity.js";
import type { ILogger } from "./core/domain/services/logger.service.js";
import { errorMessage } from "./core/domain/errors.js";
import { LogLevelSchema } from "./adapters/validation.js";
import { ConsolidateBatchUseCase } from "./core/use-cases/consolidate-batch.use-case.js";
import { DiscoverFilesUseCase } from "./core/use-cases/discover-files.use-case.js";
import { ExtractFileUseCase } from "./core/use-cases/extract-file.use-case.js";
import {
  ExcelJsTemplateLoader,
  ExcelJsWorkbookReader,
} from "./infrastructure/services/exceljs-workbook.service.js";
import { ConsoleLogger } from "./infrastructure/services/console-logger.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { CompositeLogger } from "./infrastructure/services/composite-logger.service.js";
import { printRunSummary } from "./infrastructure/views/run-summary.view.js";
import { writeRunSummary } from "./infrastructure/utils/report.utils.js";
import { runId as newRunId } from "./infrastructure/utils/id.utils.js";

// ─── Shared helpers ───────────────────────────────────────────────────────────

function resolveLogLevel(config: Config): LogLevel {
  const raw: unknown = program.opts().logLevel;
  if (raw === undefined) return config.logging.level;
  const parsed = LogLevelSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid --log-level "${String(raw)}". Use info, warn or error.`);
  }
  return parsed.data;
}

function createLogger(config: Config, runLog?: JsonLogger): ILogger {
  const loggers: ILogger[] = [new ConsoleLogger(resolveLogLevel(config))];
  if (runLog) loggers.push(runLog);
  return new CompositeLogger(...loggers);
}

// ─── program ──────────────────────────────────────────────────────────────────

program
  .name("shipment-consolidator")
  .description("Consolidate shipment line items from .xlsx files into one template")
  .option("-c, --config <path>", `Config file path (default: ${getConfigPath()})`)
  .option("--log-level <level>", "Minimum console log level (info | warn | error)");

// ─── consolidate ──────────────────────────────────────────────────────────────

program
  .command("consolidate", { isDefault: true })
  .description("Extract every input file and write the consolidated output")
  .option("-i, --input <dir>", "Input directory (overrides paths.inputDir)")
  .option("-t, --template <path>", "Template workbook (overrides paths.templatePath)")
  .option("-o, --output <path>", "Output workbook (overrides paths.outputPath)")
  .option("--summary", "Write a JSON run summary to report.outputDir")
  .action(async (opts: { input?: string; template?: string; output?: string; summary?: boolean }) => {
    let logger: ILogger | undefined;
    try {
      const config = loadConfig(program.opts().config);
      const id = newRunId();
      const runLog = config.logging.enabled
        ? new JsonLogger(resolve(config.logging.dir), config.logging.runLog)
        : undefined;
      logger = createLogger(config, runLog);
      logger.init(id);

      const reader = new ExcelJsWorkbookReader();
      const consolidate = new ConsolidateBatchUseCase(
        new ExtractFileUseCase(reader, logger),
        new ExcelJsTemplateLoader(),
        new DiscoverFilesUseCase(),
        logger,
      );

      const outcome = await consolidate.execute({
        runId: id,
        inputDir: resolve(opts.input ?? config.paths.inputDir),
        templatePath: resolve(opts.template ?? config.paths.templatePath),
        outputPath: resolve(opts.output ?? config.paths.outputPath),
        extension: config.discovery.extension,
        tempFilePrefix: config.discovery.tempFilePrefix,
      });

      printRunSummary(outcome);
      if (runLog?.path) console.log(`Run log: ${runLog.path}`);
      if (opts.summary || config.report.enabled) {
        const path = writeRunSummary(resolve(config.report.outputDir), outcome);
        console.log(`Summary written: ${path}`);
      }
      if (outcome.status === "fatal") process.exitCode = 1;
    } catch (e) {
      console.error("Consolidation failed:", errorMessage(e));
      process.exitCode = 1;
    } finally {
      logger?.close();
    }
  });

// ─── inspect ──────────────────────────────────────────────────────────────────

program
  .command("inspect <file>")
  .description("Show what would be extracted from one input file, without writing output")
  .action(async (file: string) => {
    try {
      const config = loadConfig(program.opts().config);
      const logger = createLogger(config);
      const extract = new ExtractFileUseCase(new ExcelJsWorkbookReader(), logger);
      const filePath = resolve(file);
      const result = await extract.execute({ fileName: basename(filePath), filePath });

      if (result.status === "skipped") {
        console.log(`\nSkipped (${result.reason}): ${result.message}`);
        process.exitCode = 1;
        return;
      }

      const { context, records, stats } = result;
      console.log("");
      console.log(`Order number: ${context.orderNumber}`);
      console.log(`ETD: ${context.etd ?? "-"}`);
      console.log(`Tag: ${context.tag ?? "-"}`);
      console.log(`Remark: ${cellText(context.remark) ?? "-"}`);
      console.log(
        `Rows with data: ${stats.dataRows}, valid: ${stats.validRows}, rejected: ${stats.invalidRows}`,
      );
      for (const record of records) {
        console.log(
          `  row ${record.sourceRow}: ${cellText(record.detail) ?? ""} | ${cellText(record.color) ?? ""} | price ${record.price} | qty ${record.quantity}`,
        );
      }
    } catch (e) {
      console.error("Inspect failed:", errorMessage(e));
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exitCode = 1;
});
