/**
 * Rent roll extraction: walks the sheet body and groups charge rows into unit blocks.
 *
 * A unit block starts on a row whose unit cell holds a known (non-header) unit label,
 * collects charge rows, and ends on its "total" row, on the next block start, or at the
 * end of the sheet. Rows before the first unit are ignored.
 */

import { parseAmount } from "./amount";
import { EMPTY, cellText, headerText, type CellValue } from "./cell-value";
import { boldIsSectionHeader, type SectionHeaderClassifier, type SheetGrid } from "./sheet";
import type { ColumnMap, ExtractionResult, RentRollLogger, UnitRecord } from "./types";

/** First row that can belong to a unit block; rows above are the report header. */
export const FIRST_DATA_ROW = 7;

const TOTAL_CODE = "total";

export type UnitBlockState = { kind: "no-open-unit" } | { kind: "open-unit"; record: UnitRecord };

/** The cells of one body row that extraction looks at. */
export interface RowCells {
  unit: CellValue;
  code: CellValue;
  name: CellValue;
  amount: number;
}

export type RowOutcome = "block-start" | "charge" | "total" | "skipped";

/**
 * Two-state accumulator (no open unit / open unit) fed one row at a time.
 * Independent of any worksheet so block logic can be exercised row by row.
 */
export class RentRollAccumulator {
  private state: UnitBlockState = { kind: "no-open-unit" };
  private readonly units: UnitRecord[] = [];
  private readonly codes: string[] = [];
  private readonly seenCodes = new Set<string>();

  constructor(private readonly unitLabels: ReadonlySet<string>) {}

  get current(): UnitBlockState {
    return this.state;
  }

  consume(row: RowCells): RowOutcome {
    let started = false;
    const unit = cellText(row.unit);
    if (unit && this.unitLabels.has(unit)) {
      this.close();
      this.state = {
        kind: "open-unit",
        record: { unit, name: row.name.kind === "text" ? row.name.text : "", charges: {}, total: 0 },
      };
      started = true;
    }

    if (this.state.kind === "no-open-unit") return "skipped";
    const { record } = this.state;

    if (headerText(row.code) === TOTAL_CODE) {
      record.total = row.amount;
      this.close();
      return "total";
    }

    const code = cellText(row.code).toLowerCase();
    if (code) {
      const sum = Object.hasOwn(record.charges, code) ? record.charges[code] : 0;
      record.charges[code] = sum + row.amount;
      if (!this.seenCodes.has(code)) {
        this.seenCodes.add(code);
        this.codes.push(code);
      }
      return "charge";
    }

    return started ? "block-start" : "skipped";
  }

  /** Close any open unit and return everything collected. */
  finish(): ExtractionResult {
    this.close();
    return { units: [...this.units], codes: [...this.codes] };
  }

  private close(): void {
    if (this.state.kind === "open-unit") {
      this.units.push(this.state.record);
      this.state = { kind: "no-open-unit" };
    }
  }
}

/** Trimmed labels of every non-empty unit-column cell that is not a section header. */
export function collectUnitLabels(
  sheet: SheetGrid,
  unitCol: number,
  isSectionHeader: SectionHeaderClassifier = boldIsSectionHeader
): Set<string> {
  const labels = new Set<string>();
  const col = unitCol + 1;
  const lastRow = sheet.rowCount;
  for (let row = 1; row <= lastRow; row++) {
    if (isSectionHeader(sheet, row, col)) continue;
    const label = cellText(sheet.read(row, col));
    if (label) labels.add(label);
  }
  return labels;
}

export function readRow(sheet: SheetGrid, row: number, columns: ColumnMap): RowCells {
  return {
    unit: sheet.read(row, columns.unitCol + 1),
    code: sheet.read(row, columns.codeCol + 1),
    name: columns.nameCol === null ? EMPTY : sheet.read(row, columns.nameCol + 1),
    amount: parseAmount(sheet.read(row, columns.amountCol + 1)),
  };
}

export interface ExtractOptions {
  isSectionHeader?: SectionHeaderClassifier;
  logger?: RentRollLogger;
}

export function extractRentRoll(sheet: SheetGrid, columns: ColumnMap, options: ExtractOptions = {}): ExtractionResult {
  const logger = options.logger ?? console;
  const labels = collectUnitLabels(sheet, columns.unitCol, options.isSectionHeader);
  const accumulator = new RentRollAccumulator(labels);

  const lastRow = sheet.rowCount;
  for (let row = FIRST_DATA_ROW; row <= lastRow; row++) {
    accumulator.consume(readRow(sheet, row, columns));
  }

  const result = accumulator.finish();
  logger.info("[rent-roll] extracted", {
    unitLabels: labels.size,
    units: result.units.length,
    codes: result.codes.length,
  });
  return result;
}
