/**
 * Fixed cell layout shared by every input workbook and by the output template.
 * Columns are 1-indexed, matching spreadsheet numbering (A = 1).
 */
export const INPUT_LAYOUT = {
  etdCell: "I11",
  remarkCell: "A22",
  firstDataRow: 19,
  lastDataRow: 1000,
  columns: {
    detail: 7, // G
    color: 8, // H
    price: 9, // I
    quantity: 10, // J
  },
} as const;

export const OUTPUT_LAYOUT = {
  startRow: 7,
  columns: {
    etd: "B",
    tag: "C",
    orderNumber: "E",
    color: "F",
    quantity: "G",
    price: "I",
    detail: "K",
    remark: "P",
  },
} as const;
