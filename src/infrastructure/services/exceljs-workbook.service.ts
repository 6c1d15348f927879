import { existsSync } from "node:fs";
import ExcelJS from "exceljs";
import type { Workbook, Worksheet } from "exceljs";
import type { CellValue } from "../../core/domain/entities/cell-value.entity.js";
import {
  CorruptWorkbookError,
  TemplateLoadError,
  WorkbookNotFoundError,
  errorMessage,
} from "../../core/domain/errors.js";
import type {
  InputSheet,
  InputWorkbook,
  ITemplateLoader,
  IWorkbookReader,
  OutputSheet,
  OutputWorkbook,
} from "../../core/domain/services/workbook.service.js";
import { readExcelCell, toExcelValue } from "../utils/cell.utils.js";

class ExcelJsInputSheet implements InputSheet {
  constructor(
    private worksheet: Worksheet,
    private isClosed: () => boolean,
  ) {}

  get name(): string {
    return this.worksheet.name;
  }

  readCell(address: string): CellValue {
    this.assertOpen();
    return readExcelCell(this.worksheet.getCell(address));
  }

  readCellAt(row: number, column: number): CellValue {
    this.assertOpen();
    return readExcelCell(this.worksheet.getCell(row, column));
  }

  private assertOpen(): void {
    if (this.isClosed()) {
      throw new Error(`Workbook holding sheet '${this.worksheet.name}' is closed.`);
    }
  }
}

class ExcelJsInputWorkbook implements InputWorkbook {
  private workbook: Workbook | null;

  constructor(workbook: Workbook) {
    this.workbook = workbook;
  }

  get sheetNames(): string[] {
    return this.open().worksheets.map((ws) => ws.name);
  }

  sheet(index: number): InputSheet {
    const worksheet = this.open().worksheets[index];
    if (!worksheet) throw new RangeError(`No sheet at index ${index}.`);
    return new ExcelJsInputSheet(worksheet, () => this.workbook === null);
  }

  close(): void {
    this.workbook = null;
  }

  private open(): Workbook {
    if (!this.workbook) throw new Error("Workbook is closed.");
    return this.workbook;
  }
}

export class ExcelJsWorkbookReader implements IWorkbookReader {
  async open(filePath: string): Promise<InputWorkbook> {
    if (!existsSync(filePath)) throw new WorkbookNotFoundError(filePath);
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (e) {
      throw new CorruptWorkbookError(filePath, { cause: e });
    }
    return new ExcelJsInputWorkbook(workbook);
  }
}

class ExcelJsOutputSheet implements OutputSheet {
  constructor(private worksheet: Worksheet) {}

  writeCell(address: string, value: CellValue): void {
    this.worksheet.getCell(address).value = toExcelValue(value);
  }
}

class ExcelJsOutputWorkbook implements OutputWorkbook {
  readonly sheet: OutputSheet;

  constructor(
    private workbook: Workbook,
    worksheet: Worksheet,
  ) {
    this.sheet = new ExcelJsOutputSheet(worksheet);
  }

  async save(filePath: string): Promise<void> {
    await this.workbook.xlsx.writeFile(filePath);
  }
}

/** Opens the template and targets its active sheet, keeping its styling. */
export class ExcelJsTemplateLoader implements ITemplateLoader {
  async load(templatePath: string): Promise<OutputWorkbook> {
    if (!existsSync(templatePath)) {
      throw new TemplateLoadError(templatePath, "File not found.");
    }
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(templatePath);
    } catch (e) {
      throw new TemplateLoadError(templatePath, errorMessage(e), { cause: e });
    }

    const activeTab = workbook.views?.[0]?.activeTab ?? 0;
    const worksheet = workbook.worksheets[activeTab] ?? workbook.worksheets[0];
    if (!worksheet) {
      throw new TemplateLoadError(templatePath, "Template has no sheets.");
    }
    return new ExcelJsOutputWorkbook(workbook, worksheet);
  }
}
