/**
 * Shared shapes for the rent roll engine.
 */

/** 0-based column indices located in the header rows. */
export interface ColumnMap {
  readonly unitCol: number;
  readonly codeCol: number;
  /** Falls back to codeCol + 1 when no "amount" header exists. */
  readonly amountCol: number;
  /** null when no name header was found; names are then blank. */
  readonly nameCol: number | null;
}

export interface UnitRecord {
  unit: string;
  name: string;
  /** Lowercased charge code → summed amount */
  charges: Record<string, number>;
  total: number;
}

export interface ExtractionResult {
  units: UnitRecord[];
  /** Distinct charge codes in first-seen order; fixes output column order. */
  codes: string[];
}

export type StructureWarningCode = "NAME_COLUMN_MISSING";

export interface StructureWarning {
  code: StructureWarningCode;
  message: string;
}

export type RentRollLogger = Pick<Console, "info" | "warn">;
