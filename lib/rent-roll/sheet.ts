/**
 * Worksheet access for the rent roll engine: 1-based rows and columns, normalised values,
 * and the bold flag used to tell section headers from unit rows.
 */

import type ExcelJS from "exceljs";
import { EMPTY, toCellValue, type CellValue } from "./cell-value";

export interface SheetGrid {
  /** Last row index holding a row. */
  readonly rowCount: number;
  /** Widest row, in columns. */
  readonly columnCount: number;
  read(row: number, col: number): CellValue;
  isBold(row: number, col: number): boolean;
  write(row: number, col: number, value: string | number): void;
}

/**
 * Decides whether a unit-column cell is a section header rather than a unit label.
 * Swap it out for layouts that mark group headers some other way.
 */
export type SectionHeaderClassifier = (sheet: SheetGrid, row: number, col: number) => boolean;

export const boldIsSectionHeader: SectionHeaderClassifier = (sheet, row, col) => sheet.isBold(row, col);

/**
 * SheetGrid over an exceljs worksheet. Reads never create rows or cells.
 * Secondary cells of a merged range read as empty so a merged label is seen once.
 */
export function worksheetGrid(worksheet: ExcelJS.Worksheet): SheetGrid {
  const findCell = (row: number, col: number): ExcelJS.Cell | undefined => {
    const r = worksheet.findRow(row);
    if (!r || col < 1 || col > r.cellCount) return undefined;
    const cell = r.getCell(col);
    if (cell.isMerged && cell.master.address !== cell.address) return undefined;
    return cell;
  };

  return {
    get rowCount() {
      return worksheet.rowCount;
    },
    get columnCount() {
      return worksheet.columnCount;
    },
    read(row, col) {
      const cell = findCell(row, col);
      return cell ? toCellValue(cell.value) : EMPTY;
    },
    isBold(row, col) {
      return findCell(row, col)?.font?.bold === true;
    },
    write(row, col, value) {
      worksheet.getCell(row, col).value = value;
    },
  };
}
