/**
 * In-memory sheets for tests. Row arrays are 1-based by position: rows[0] is row 1, rows[0][0] is column A.
 */

import ExcelJS from "exceljs";
import { EMPTY, num, text, type CellValue } from "./cell-value";
import type { SheetGrid } from "./sheet";
import type { RentRollLogger } from "./types";

export type RawCell = string | number | null;

/** [row, col], both 1-based */
export type CellRef = readonly [number, number];

export const silentLogger: RentRollLogger = {
  info: () => undefined,
  warn: () => undefined,
};

export function gridFromRows(rows: RawCell[][], boldCells: readonly CellRef[] = []): SheetGrid & { rows: RawCell[][] } {
  const bold = new Set(boldCells.map(([r, c]) => `${r}:${c}`));
  const data = rows.map((row) => [...row]);

  const readRaw = (row: number, col: number): RawCell => data[row - 1]?.[col - 1] ?? null;

  return {
    rows: data,
    get rowCount() {
      return data.length;
    },
    get columnCount() {
      return data.reduce((max, row) => Math.max(max, row.length), 0);
    },
    read(row, col): CellValue {
      const raw = readRaw(row, col);
      if (raw === null) return EMPTY;
      return typeof raw === "number" ? num(raw) : text(raw);
    },
    isBold(row, col) {
      return bold.has(`${row}:${col}`);
    },
    write(row, col, value) {
      while (data.length < row) data.push([]);
      const target = data[row - 1];
      while (target.length < col) target.push(null);
      target[col - 1] = value;
    },
  };
}

export function worksheetFromRows(
  rows: RawCell[][],
  boldCells: readonly CellRef[] = []
): { workbook: ExcelJS.Workbook; worksheet: ExcelJS.Worksheet } {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet("Rent Roll");
  rows.forEach((row, r) => {
    row.forEach((value, c) => {
      if (value !== null) worksheet.getCell(r + 1, c + 1).value = value;
    });
  });
  for (const [r, c] of boldCells) {
    worksheet.getCell(r, c).font = { bold: true };
  }
  return { workbook, worksheet };
}

/**
 * "Rent Roll" layout with two units:
 * 101 → rent 1150 + 50, pet 25, total 1,225.00 (row 8)
 * 102 → pet (10.00), water 40, total 30 (row 12)
 * Row 7 is a bold section header in the unit column.
 */
export function sampleRentRoll(): { rows: RawCell[][]; boldCells: CellRef[] } {
  const rows: RawCell[][] = [
    ["Rent Roll"],
    ["Sample Apartments"],
    ["As of 01/31/2026"],
    [],
    [],
    ["Unit", "Unit Type", "Resident", "Name", "Market Rent", "Code", "Amount"],
    ["Current/Notice/Vacant Residents"],
    ["101", "2BR", "t0001", "Jane Doe", 1200, "rent", 1150],
    [null, null, null, null, null, "pet", 25],
    [null, null, null, null, null, "rent", "50.00"],
    [null, null, null, null, null, "Total", "1,225.00"],
    ["102", "1BR", "t0002", "John Roe", 950, "pet", "(10.00)"],
    [null, null, null, null, null, "water", 40],
    [null, null, null, null, null, "total", 30],
  ];
  return { rows, boldCells: [[7, 1]] };
}
