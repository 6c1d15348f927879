import { z } from "zod";

/**
 * Schema of config/config.yaml. Every key is optional; omitted keys take the
 * defaults below.
 */
export const LogLevelSchema = z.enum(["info", "warn", "error"]);

export const ConfigSchema = z.object({
  paths: z
    .object({
      inputDir: z.string().min(1, "paths.inputDir must not be empty").default("input"),
      templatePath: z
        .string()
        .min(1, "paths.templatePath must not be empty")
        .default("output/template.xlsx"),
      outputPath: z
        .string()
        .min(1, "paths.outputPath must not be empty")
        .default("output/output_filled.xlsx"),
    })
    .default({}),
  discovery: z
    .object({
      extension: z.string().min(1).default(".xlsx"),
      tempFilePrefix: z.string().default("~"),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default("info"),
      enabled: z.boolean().default(true),
      dir: z.string().min(1).default("output/logs"),
      runLog: z.string().min(1).default("consolidate.jsonl"),
    })
    .default({}),
  report: z
    .object({
      enabled: z.boolean().default(false),
      outputDir: z.string().min(1).default("output/reports"),
    })
    .default({}),
});
