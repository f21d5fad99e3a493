import { ACCEPTED_EXTENSION, MAX_UPLOAD_BYTES, MAX_UPLOAD_MB } from "@/lib/config";

/** Returns an error message, or null when the file can be processed. */
export function validateUpload(file: { name: string; size: number }): string | null {
  if (!file.name.toLowerCase().endsWith(ACCEPTED_EXTENSION)) {
    return "Only .xlsx files are accepted. Upload a Rent Roll or Affordable Rent Roll export.";
  }
  if (file.size > MAX_UPLOAD_BYTES) {
    return `File is larger than ${MAX_UPLOAD_MB} MB.`;
  }
  return null;
}
