export interface PathsConfig {
  inputDir: string;
  templatePath: string;
  outputPath: string;
}

export interface DiscoveryConfig {
  /** File name suffix of input workbooks, e.g. ".xlsx". */
  extension: string;
  /** Names starting with this prefix are editor lock files and are ignored. */
  tempFilePrefix: string;
}

export type LogLevel = "info" | "warn" | "error";

export interface LoggingConfig {
  level: LogLevel;
  /** When false, no JSON-lines run log is written. */
  enabled: boolean;
  dir: string;
  runLog: string;
}

export interface ReportConfig {
  enabled: boolean;
  outputDir: string;
}

export interface Config {
  paths: PathsConfig;
  discovery: DiscoveryConfig;
  logging: LoggingConfig;
  report: ReportConfig;
}
