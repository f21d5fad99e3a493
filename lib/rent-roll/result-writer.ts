/**
 * Writes extracted units back into the sheet as new columns to the right of the existing data:
 * Resident Name | one column per charge code | Total Amount.
 * Values land on the row where each unit label first appears.
 */

import { cellText } from "./cell-value";
import type { SheetGrid } from "./sheet";
import type { ColumnMap, UnitRecord } from "./types";

export const RESIDENT_NAME_HEADER = "Resident Name";
export const TOTAL_AMOUNT_HEADER = "Total Amount";

/** Rightmost 1-based column holding a non-empty value anywhere in the sheet (at least 1). */
export function findLastUsedColumn(sheet: SheetGrid): number {
  let last = 1;
  const lastRow = sheet.rowCount;
  const lastCol = sheet.columnCount;
  for (let row = 1; row <= lastRow; row++) {
    for (let col = lastCol; col > last; col--) {
      const value = sheet.read(row, col);
      if (value.kind === "number" || (value.kind === "text" && value.text !== "")) {
        last = col;
        break;
      }
    }
  }
  return last;
}

/** Unit label → row of its first appearance in the unit column. */
export function mapUnitRows(sheet: SheetGrid, unitCol: number): Map<string, number> {
  const rows = new Map<string, number>();
  const col = unitCol + 1;
  const lastRow = sheet.rowCount;
  for (let row = 1; row <= lastRow; row++) {
    const label = cellText(sheet.read(row, col));
    if (label && !rows.has(label)) rows.set(label, row);
  }
  return rows;
}

/**
 * Append the result columns and return their 1-based indices, left to right.
 * Units whose label no longer appears in the unit column are skipped.
 */
export function appendResults(
  sheet: SheetGrid,
  units: readonly UnitRecord[],
  codes: readonly string[],
  columns: Pick<ColumnMap, "unitCol">
): number[] {
  const nameCol = findLastUsedColumn(sheet) + 1;
  const codeCols = new Map<string, number>();
  codes.forEach((code, i) => codeCols.set(code, nameCol + 1 + i));
  const totalCol = nameCol + codes.length + 1;

  sheet.write(1, nameCol, RESIDENT_NAME_HEADER);
  codeCols.forEach((col, code) => sheet.write(1, col, code));
  sheet.write(1, totalCol, TOTAL_AMOUNT_HEADER);

  const unitRows = mapUnitRows(sheet, columns.unitCol);
  for (const unit of units) {
    const row = unitRows.get(unit.unit);
    if (row === undefined) continue;
    sheet.write(row, nameCol, unit.name);
    codeCols.forEach((col, code) => {
      sheet.write(row, col, Object.hasOwn(unit.charges, code) ? unit.charges[code] : 0);
    });
    sheet.write(row, totalCol, unit.total);
  }

  return [nameCol, ...codeCols.values(), totalCol];
}
