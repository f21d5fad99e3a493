/**
 * Rent roll processing settings. Override through environment variables (.env.local in development).
 */

// NEXT_PUBLIC_ values are inlined into the browser bundle only when read by their literal name.
function readNumber(name: string, value: string | undefined, fallback: number): number {
  const raw = value?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    console.warn(`[config] ${name} is not a positive number; using default:`, fallback);
    return fallback;
  }
  return n;
}

/** Upload limit in megabytes for /api/process and the upload page. */
export const MAX_UPLOAD_MB = readNumber(
  "NEXT_PUBLIC_RENT_ROLL_MAX_UPLOAD_MB",
  process.env.NEXT_PUBLIC_RENT_ROLL_MAX_UPLOAD_MB,
  20
);
export const MAX_UPLOAD_BYTES = MAX_UPLOAD_MB * 1024 * 1024;

/** ARGB colour of the appended result cells. */
export const HIGHLIGHT_ARGB = process.env.NEXT_PUBLIC_RENT_ROLL_HIGHLIGHT_ARGB?.trim() || "FFE20000";

export const OUTPUT_PREFIX = "processed_";
export const ACCEPTED_EXTENSION = ".xlsx";
export const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
