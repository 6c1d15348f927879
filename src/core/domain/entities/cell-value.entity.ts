/**
 * A spreadsheet cell as seen by the extraction pipeline.
 * Workbook adapters normalize whatever the file format stores into one of
 * these kinds, so the rest of the code only switches on `kind`.
 */
export type CellValue =
  | { kind: "number"; value: number }
  | { kind: "text"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "date"; value: Date }
  | { kind: "empty" };

export const EMPTY_CELL: CellValue = { kind: "empty" };

export function numberCell(value: number): CellValue {
  return { kind: "number", value };
}

export function textCell(value: string): CellValue {
  return { kind: "text", value };
}

/** True for empty cells and text cells holding only whitespace. */
export function isBlank(cell: CellValue): boolean {
  if (cell.kind === "empty") return true;
  if (cell.kind === "text") return cell.value.trim() === "";
  return false;
}

/** Plain-text rendering used for parsing and log messages. */
export function cellText(cell: CellValue): string | null {
  switch (cell.kind) {
    case "empty":
      return null;
    case "text":
      return cell.value;
    case "number":
      return String(cell.value);
    case "boolean":
      return cell.value ? "TRUE" : "FALSE";
    case "date":
      return cell.value.toISOString();
  }
}
