import type { CellValue } from "./cell-value";

const THOUSANDS_SEPARATORS = /[,\u00A0]/g;
const NON_NUMERIC = /[^\d.\-]/g;

/**
 * Parse a charge amount. Accepts numbers, currency strings, comma grouping and
 * accounting negatives ("(1,234.50)" → -1234.5). Anything unparseable is 0.
 */
export function parseAmount(value: CellValue): number {
  if (value.kind === "number") return Number.isFinite(value.value) ? value.value : 0;
  if (value.kind === "empty") return 0;

  let s = value.text.trim().replace(THOUSANDS_SEPARATORS, "");
  if (!s) return 0;
  if (s.startsWith("(") && s.endsWith(")")) {
    s = "-" + s.slice(1, -1);
  }
  s = s.replace(NON_NUMERIC, "");
  if (!s) return 0;
  const parsed = Number(s);
  return Number.isFinite(parsed) ? parsed : 0;
}
