/**
 * Cosmetic pass over the appended columns: width to fit, bold highlight colour.
 */

import type ExcelJS from "exceljs";
import { cellText, toCellValue } from "./cell-value";

export const DEFAULT_HIGHLIGHT_ARGB = "FFE20000";
const WIDTH_PADDING = 2;

export function autofitColumns(worksheet: ExcelJS.Worksheet, cols: readonly number[]): void {
  const lastRow = worksheet.rowCount;
  for (const col of cols) {
    let maxLen = 0;
    for (let row = 1; row <= lastRow; row++) {
      maxLen = Math.max(maxLen, cellText(toCellValue(worksheet.getCell(row, col).value)).length);
    }
    worksheet.getColumn(col).width = maxLen + WIDTH_PADDING;
  }
}

export function highlightColumns(
  worksheet: ExcelJS.Worksheet,
  cols: readonly number[],
  argb: string = DEFAULT_HIGHLIGHT_ARGB
): void {
  const lastRow = worksheet.rowCount;
  for (const col of cols) {
    for (let row = 1; row <= lastRow; row++) {
      const cell = worksheet.getCell(row, col);
      if (cell.value == null) continue;
      // Loaded cells can share one style object; replace it rather than mutate it.
      cell.style = { ...cell.style, font: { ...(cell.style.font ?? {}), bold: true, color: { argb } } };
    }
  }
}
