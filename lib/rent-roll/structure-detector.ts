/**
 * Header detection for the two supported rent roll layouts.
 *
 * A1 selects the layout: "Affordable…" puts unit labels in column C, "Rent…" in column A.
 * Code, amount and name columns are located from header text in rows 5–12.
 * Scans are 1-based; the returned ColumnMap is 0-based.
 */

import { headerText } from "./cell-value";
import { StructureDetectionError } from "./errors";
import type { SheetGrid } from "./sheet";
import type { ColumnMap, RentRollLogger, StructureWarning } from "./types";

export const HEADER_ROW = 6;
export const NAME_FALLBACK_ROW = 5;
export const CODE_FALLBACK_ROWS = { first: 7, last: 12 } as const;

const CODE_HEADERS = new Set(["code", "rent code"]);

export interface DetectStructureHooks {
  onWarning?: (warning: StructureWarning) => void;
  logger?: RentRollLogger;
}

/** 0-based column of the first text cell in `row` accepted by `match`, or null. */
function findHeaderInRow(sheet: SheetGrid, row: number, match: (header: string) => boolean): number | null {
  const lastCol = sheet.columnCount;
  for (let col = 1; col <= lastCol; col++) {
    const header = headerText(sheet.read(row, col));
    if (header !== null && match(header)) return col - 1;
  }
  return null;
}

export function detectUnitColumn(sheet: SheetGrid): number {
  const marker = headerText(sheet.read(1, 1)) ?? "";
  if (marker.startsWith("affordable")) return 2;
  if (marker.startsWith("rent")) return 0;
  throw new StructureDetectionError("unit", "Unit column could not be detected (Row 1 mismatch).");
}

export function detectCodeColumn(sheet: SheetGrid): number {
  const isCodeHeader = (header: string) => CODE_HEADERS.has(header);
  const inHeaderRow = findHeaderInRow(sheet, HEADER_ROW, isCodeHeader);
  if (inHeaderRow !== null) return inHeaderRow;

  for (let row = CODE_FALLBACK_ROWS.first; row <= CODE_FALLBACK_ROWS.last; row++) {
    const col = findHeaderInRow(sheet, row, isCodeHeader);
    if (col !== null) return col;
  }
  throw new StructureDetectionError("code", "Rent Code column not found in row 6 or rows 7–12.");
}

export function detectAmountColumn(sheet: SheetGrid, codeCol: number): number {
  return findHeaderInRow(sheet, HEADER_ROW, (h) => h.includes("amount")) ?? codeCol + 1;
}

export function detectNameColumn(sheet: SheetGrid): number | null {
  const hasName = (h: string) => h.includes("name");
  return findHeaderInRow(sheet, HEADER_ROW, hasName) ?? findHeaderInRow(sheet, NAME_FALLBACK_ROW, hasName);
}

/**
 * Locate the unit, code, amount and name columns.
 * Throws StructureDetectionError when the unit or code column is missing;
 * a missing name column is reported through onWarning and left null.
 */
export function detectStructure(sheet: SheetGrid, hooks: DetectStructureHooks = {}): ColumnMap {
  const logger = hooks.logger ?? console;
  const unitCol = detectUnitColumn(sheet);
  const codeCol = detectCodeColumn(sheet);
  const amountCol = detectAmountColumn(sheet, codeCol);
  const nameCol = detectNameColumn(sheet);

  if (nameCol === null) {
    const warning: StructureWarning = {
      code: "NAME_COLUMN_MISSING",
      message: "Name column not found (row 6/5). Using blank.",
    };
    logger.warn("[rent-roll] name column not found", { rows: [HEADER_ROW, NAME_FALLBACK_ROW] });
    hooks.onWarning?.(warning);
  }

  const columns: ColumnMap = { unitCol, codeCol, amountCol, nameCol };
  logger.info("[rent-roll] detected", columns);
  return columns;
}
