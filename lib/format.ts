/**
 * Centralized formatting for monetary values and counts shown in the UI.
 */

const USD_DECIMALS = (decimals: number) =>
  new Intl.NumberFormat("en-US", {
    style: "currency",
    currency: "USD",
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });

const NUMBER = (decimals: number) =>
  new Intl.NumberFormat("en-US", {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  });

/** Format as USD. Default 2 decimals. Returns "$0.00" for null/undefined. */
export function formatCurrency(
  value: number | null | undefined,
  opts?: { decimals?: number }
): string {
  const decimals = opts?.decimals ?? 2;
  if (value == null || Number.isNaN(value)) return USD_DECIMALS(decimals).format(0);
  return USD_DECIMALS(decimals).format(value);
}

/** Format number with thousand separators. Default 0 decimals. */
export function formatNumber(
  value: number | null | undefined,
  opts?: { decimals?: number }
): string {
  if (value == null || Number.isNaN(value)) return NUMBER(0).format(0);
  const decimals = opts?.decimals ?? 0;
  return NUMBER(decimals).format(value);
}

/** "1 unit" / "3 units" */
export function formatCount(value: number, singular: string, plural: string = `${singular}s`): string {
  return `${formatNumber(value)} ${value === 1 ? singular : plural}`;
}
