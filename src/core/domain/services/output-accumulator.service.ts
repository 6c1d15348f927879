import {
  EMPTY_CELL,
  numberCell,
  textCell,
} from "../entities/cell-value.entity.js";
import type { FileContext, LineItem } from "../entities/shipment.entity.js";
import { OUTPUT_LAYOUT } from "../constants.js";
import type { OutputSheet } from "./workbook.service.js";

/**
 * Appends consolidated rows to the output sheet. Owns the output cursor:
 * every append writes at the cursor row and moves it down by exactly one.
 */
export class OutputAccumulator {
  private cursor: number;

  constructor(
    private readonly sheet: OutputSheet,
    readonly startRow: number = OUTPUT_LAYOUT.startRow,
  ) {
    this.cursor = startRow;
  }

  get nextRow(): number {
    return this.cursor;
  }

  get rowsWritten(): number {
    return this.cursor - this.startRow;
  }

  /** Returns the row the record was written to. */
  append(context: FileContext, item: LineItem): number {
    const row = this.cursor;
    const { columns } = OUTPUT_LAYOUT;

    this.sheet.writeCell(
      `${columns.etd}${row}`,
      context.etd === null ? EMPTY_CELL : textCell(context.etd),
    );
    this.sheet.writeCell(
      `${columns.tag}${row}`,
      context.tag === null ? EMPTY_CELL : textCell(context.tag),
    );
    this.sheet.writeCell(`${columns.orderNumber}${row}`, textCell(context.orderNumber));
    this.sheet.writeCell(`${columns.color}${row}`, item.color);
    this.sheet.writeCell(`${columns.quantity}${row}`, numberCell(item.quantity));
    this.sheet.writeCell(`${columns.price}${row}`, numberCell(item.price));
    this.sheet.writeCell(`${columns.detail}${row}`, item.detail);
    this.sheet.writeCell(`${columns.remark}${row}`, context.remark);

    this.cursor += 1;
    return row;
  }
}
