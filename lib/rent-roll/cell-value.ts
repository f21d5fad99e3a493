/**
 * Normalised cell contents. Every read from a worksheet goes through toCellValue
 * so detection and extraction match on explicit variants instead of raw exceljs values.
 */

import type ExcelJS from "exceljs";

export type CellValue =
  | { kind: "empty" }
  | { kind: "text"; text: string }
  | { kind: "number"; value: number };

export const EMPTY: CellValue = { kind: "empty" };

export function text(value: string): CellValue {
  return { kind: "text", text: value };
}

export function num(value: number): CellValue {
  return { kind: "number", value };
}

function formatDate(value: Date): string {
  return Number.isNaN(value.getTime()) ? "" : value.toISOString().slice(0, 10);
}

function fromScalar(value: string | number | boolean | Date): CellValue {
  if (typeof value === "number") return num(value);
  if (typeof value === "string") return text(value);
  if (typeof value === "boolean") return text(String(value));
  return text(formatDate(value));
}

/** Map an exceljs cell value (including formula results, rich text and hyperlinks) to a CellValue. */
export function toCellValue(raw: ExcelJS.CellValue): CellValue {
  if (raw == null) return EMPTY;
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean" || raw instanceof Date) {
    return fromScalar(raw);
  }
  if ("richText" in raw) {
    return text(raw.richText.map((run) => run.text).join(""));
  }
  if ("hyperlink" in raw) {
    return typeof raw.text === "string" ? text(raw.text) : EMPTY;
  }
  if ("formula" in raw || "sharedFormula" in raw) {
    const result = raw.result;
    if (typeof result === "string" || typeof result === "number" || typeof result === "boolean" || result instanceof Date) {
      return fromScalar(result);
    }
    return EMPTY;
  }
  return EMPTY;
}

/** Text form used for label matching: trimmed text, numbers via String(), empty as "". */
export function cellText(value: CellValue): string {
  switch (value.kind) {
    case "text":
      return value.text.trim();
    case "number":
      return String(value.value);
    case "empty":
      return "";
  }
}

/** Lowercased trimmed text of a text cell, or null for anything else. Header matching only considers text cells. */
export function headerText(value: CellValue): string | null {
  return value.kind === "text" ? value.text.trim().toLowerCase() : null;
}
