import {
  cellText,
  type CellValue,
} from "../domain/entities/cell-value.entity.js";
import type {
  DiscoveredFile,
  ExtractionStats,
  FileContext,
  FileExtractionResult,
  LineItem,
  SkipReason,
} from "../domain/entities/shipment.entity.js";
import { INPUT_LAYOUT } from "../domain/constants.js";
import {
  CorruptWorkbookError,
  WorkbookNotFoundError,
  errorMessage,
} from "../domain/errors.js";
import { EtdTagService, type EtdTag } from "../domain/services/etd-tag.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import { RowValidationService } from "../domain/services/row-validation.service.js";
import type {
  InputSheet,
  InputWorkbook,
  IWorkbookReader,
} from "../domain/services/workbook.service.js";

const BLOCK_LABEL = `${INPUT_LAYOUT.firstDataRow}-${INPUT_LAYOUT.lastDataRow}`;

export class ExtractFileUseCase {
  constructor(
    private reader: IWorkbookReader,
    private logger: ILogger,
  ) {}

  async execute(file: DiscoveredFile): Promise<FileExtractionResult> {
    let workbook: InputWorkbook | undefined;
    try {
      workbook = await this.reader.open(file.filePath);
      return this.extract(file.fileName, workbook);
    } catch (e) {
      if (e instanceof WorkbookNotFoundError) {
        return this.skip(file, "file-not-found", e.message);
      }
      if (e instanceof CorruptWorkbookError) {
        return this.skip(file, "corrupt-workbook", e.message);
      }
      return this.skip(
        file,
        "unexpected-error",
        `Unexpected error: ${errorMessage(e)}`,
      );
    } finally {
      workbook?.close();
    }
  }

  private extract(fileName: string, workbook: InputWorkbook): FileExtractionResult {
    const { sheetNames } = workbook;
    if (sheetNames.length === 0) {
      return this.skip({ fileName }, "no-sheets", "Workbook has no sheets.");
    }

    const orderNumber = sheetNames[sheetNames.length - 1];
    if (!orderNumber || orderNumber.trim() === "") {
      return this.skip(
        { fileName },
        "missing-order-number",
        "Cannot derive the order number from the last sheet name.",
      );
    }

    const sheet = workbook.sheet(0);
    this.logger.log({
      level: "info",
      message: `Using first sheet '${sheet.name}'.`,
      file: fileName,
    });

    const { etd, tag } = this.readEtdTag(fileName, sheet);
    const remark = sheet.readCell(INPUT_LAYOUT.remarkCell);
    const context: FileContext = { fileName, orderNumber, remark, etd, tag };
    this.logger.log({
      level: "info",
      message: `Common data: order number '${orderNumber}', remark '${cellText(remark) ?? ""}'.`,
      file: fileName,
    });

    const { records, stats } = this.scanDataBlock(fileName, sheet);

    if (stats.dataRows === 0) {
      this.logger.log({
        level: "warn",
        message: `No data found in rows ${BLOCK_LABEL}.`,
        file: fileName,
      });
    } else if (stats.validRows === 0) {
      this.logger.log({
        level: "warn",
        message: `Data found in rows ${BLOCK_LABEL}, but no row has numeric price and quantity.`,
        file: fileName,
      });
    }

    return { status: "extracted", context, records, stats };
  }

  private readEtdTag(fileName: string, sheet: InputSheet): EtdTag {
    const source = sheet.readCell(INPUT_LAYOUT.etdCell);
    const text = cellText(source);
    if (text === null) {
      this.logger.log({
        level: "warn",
        message: `${INPUT_LAYOUT.etdCell} is empty; no ETD or tag for this file.`,
        file: fileName,
      });
      return { etd: null, tag: null };
    }

    const parsed = EtdTagService.parse(text, this.logger);
    if (parsed.etd === null && parsed.tag === null) {
      this.logger.log({
        level: "warn",
        message: `Could not extract ETD or tag from '${text}'.`,
        file: fileName,
        value: text,
      });
    } else if (parsed.etd === null) {
      this.logger.log({
        level: "warn",
        message: `ETD could not be extracted from '${text}'; tag is '${parsed.tag}'.`,
        file: fileName,
        value: text,
      });
    }
    return parsed;
  }

  private scanDataBlock(
    fileName: string,
    sheet: InputSheet,
  ): { records: LineItem[]; stats: ExtractionStats } {
    const { columns } = INPUT_LAYOUT;
    const records: LineItem[] = [];
    const stats: ExtractionStats = { dataRows: 0, validRows: 0, invalidRows: 0 };

    for (let row = INPUT_LAYOUT.firstDataRow; row <= INPUT_LAYOUT.lastDataRow; row++) {
      const detail = sheet.readCellAt(row, columns.detail);
      const color = sheet.readCellAt(row, columns.color);
      const price = sheet.readCellAt(row, columns.price);
      const quantity = sheet.readCellAt(row, columns.quantity);

      if (!RowValidationService.hasData(detail, color, price, quantity)) continue;
      stats.dataRows += 1;

      const numbers = RowValidationService.numericValues(price, quantity);
      if (numbers === null) {
        stats.invalidRows += 1;
        this.logger.log({
          level: "warn",
          message: `Row ${row} skipped: price ${describeCell(price)} or quantity ${describeCell(quantity)} is not numeric.`,
          file: fileName,
          row,
        });
        continue;
      }

      stats.validRows += 1;
      records.push({
        sourceRow: row,
        detail,
        color,
        price: numbers.price,
        quantity: numbers.quantity,
      });
    }

    return { records, stats };
  }

  private skip(
    file: Pick<DiscoveredFile, "fileName">,
    reason: SkipReason,
    message: string,
  ): FileExtractionResult {
    this.logger.log({
      level: reason === "no-sheets" || reason === "missing-order-number" ? "warn" : "error",
      message: `${message} Skipping file.`,
      file: file.fileName,
    });
    return { status: "skipped", reason, message };
  }
}

function describeCell(cell: CellValue): string {
  const text = cellText(cell);
  return text === null ? `(${cell.kind})` : `'${text}' (${cell.kind})`;
}
