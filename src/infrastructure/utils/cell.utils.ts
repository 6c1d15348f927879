import type { Cell, CellRichTextValue, CellValue as ExcelCellValue } from "exceljs";
import {
  EMPTY_CELL,
  type CellValue,
} from "../../core/domain/entities/cell-value.entity.js";

/**
 * Normalizes an exceljs cell value. Formulas yield their cached result,
 * errors their code ("#N/A"), rich text and hyperlinks their plain text.
 */
export function fromExcelValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return EMPTY_CELL;
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "string") {
    return value === "" ? EMPTY_CELL : { kind: "text", value };
  }
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (value instanceof Date) return { kind: "date", value };
  if ("error" in value) return { kind: "text", value: value.error };
  if ("richText" in value) return { kind: "text", value: flattenRichText(value) };
  if ("hyperlink" in value) return fromHyperlinkText(value.text);
  if ("formula" in value || "sharedFormula" in value) {
    return fromExcelValue(value.result ?? null);
  }
  return EMPTY_CELL;
}

// Typed as a string, but a link over formatted text reads back as { richText }.
function fromHyperlinkText(text: unknown): CellValue {
  if (typeof text === "string") return fromExcelValue(text);
  if (isRichText(text)) return { kind: "text", value: flattenRichText(text) };
  return EMPTY_CELL;
}

function isRichText(value: unknown): value is CellRichTextValue {
  return (
    typeof value === "object" &&
    value !== null &&
    "richText" in value &&
    Array.isArray(value.richText)
  );
}

function flattenRichText(value: CellRichTextValue): string {
  return value.richText.map((run) => run.text).join("");
}

/** Reads a cell, treating the covered (non-anchor) part of a merge as empty. */
export function readExcelCell(cell: Cell): CellValue {
  if (cell.isMerged && cell.master.address !== cell.address) return EMPTY_CELL;
  return fromExcelValue(cell.value);
}

export function toExcelValue(cell: CellValue): ExcelCellValue {
  return cell.kind === "empty" ? null : cell.value;
}
