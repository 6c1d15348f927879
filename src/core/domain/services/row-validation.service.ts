import { isBlank, type CellValue } from "../entities/cell-value.entity.js";

export class RowValidationService {
  /** True when at least one of the cells holds something other than blanks. */
  static hasData(
    detail: CellValue,
    color: CellValue,
    price: CellValue,
    quantity: CellValue,
  ): boolean {
    return [detail, color, price, quantity].some((cell) => !isBlank(cell));
  }

  /**
   * Price and quantity must be stored as numbers. Text that looks numeric
   * ("50") and booleans do not count.
   */
  static isValidNumeric(price: CellValue, quantity: CellValue): boolean {
    return RowValidationService.numericValues(price, quantity) !== null;
  }

  static numericValues(
    price: CellValue,
    quantity: CellValue,
  ): { price: number; quantity: number } | null {
    if (price.kind !== "number" || quantity.kind !== "number") return null;
    return { price: price.value, quantity: quantity.value };
  }
}
