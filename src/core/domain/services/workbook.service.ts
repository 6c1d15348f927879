import type { CellValue } from "../entities/cell-value.entity.js";

export interface InputSheet {
  readonly name: string;
  /** Reads a cell by A1-style address, e.g. "I11". */
  readCell(address: string): CellValue;
  readCellAt(row: number, column: number): CellValue;
}

/**
 * An opened input workbook. Values are the ones stored in the file; formulas
 * are never re-evaluated.
 */
export interface InputWorkbook {
  readonly sheetNames: string[];
  sheet(index: number): InputSheet;
  close(): void;
}

export interface IWorkbookReader {
  /**
   * @throws WorkbookNotFoundError when the file does not exist
   * @throws CorruptWorkbookError when the file cannot be loaded as a workbook
   */
  open(filePath: string): Promise<InputWorkbook>;
}

export interface OutputSheet {
  writeCell(address: string, value: CellValue): void;
}

/** The output workbook, created from the template and saved once per run. */
export interface OutputWorkbook {
  readonly sheet: OutputSheet;
  save(filePath: string): Promise<void>;
}

export interface ITemplateLoader {
  /** @throws TemplateLoadError */
  load(templatePath: string): Promise<OutputWorkbook>;
}
