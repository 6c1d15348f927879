export class WorkbookNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "WorkbookNotFoundError";
  }
}

/** The file exists but is not a readable spreadsheet archive. */
export class CorruptWorkbookError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(`Not a valid or readable workbook: ${filePath}`, options);
    this.name = "CorruptWorkbookError";
  }
}

export class TemplateLoadError extends Error {
  constructor(
    public readonly templatePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load template ${templatePath}. ${detail}`, options);
    this.name = "TemplateLoadError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
