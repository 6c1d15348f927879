import type { CellValue } from "./cell-value.entity.js";

/** One accepted line item from the data block of an input file. */
export interface LineItem {
  sourceRow: number;
  detail: CellValue;
  color: CellValue;
  price: number;
  quantity: number;
}

/** Fields read once per input file and repeated on each of its output rows. */
export interface FileContext {
  fileName: string;
  /** Name of the workbook's last sheet. */
  orderNumber: string;
  remark: CellValue;
  /** Departure date as `DD-Mon`, or null when it could not be derived. */
  etd: string | null;
  tag: string | null;
}

export interface ExtractionStats {
  /** Rows of the data block carrying at least one non-blank cell. */
  dataRows: number;
  validRows: number;
  invalidRows: number;
}

export type SkipReason =
  | "no-sheets"
  | "missing-order-number"
  | "file-not-found"
  | "corrupt-workbook"
  | "unexpected-error";

export type FileExtractionResult =
  | {
      status: "extracted";
      context: FileContext;
      records: LineItem[];
      stats: ExtractionStats;
    }
  | { status: "skipped"; reason: SkipReason; message: string };

export interface DiscoveredFile {
  fileName: string;
  filePath: string;
}
