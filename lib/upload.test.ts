import { describe, expect, it } from "vitest";
import { MAX_UPLOAD_BYTES } from "@/lib/config";
import { validateUpload } from "@/lib/upload";

describe("validateUpload", () => {
  it("accepts an .xlsx file regardless of extension case", () => {
    expect(validateUpload({ name: "June Rent Roll.XLSX", size: 2048 })).toBeNull();
  });

  it("rejects other spreadsheet formats", () => {
    expect(validateUpload({ name: "rent-roll.xls", size: 2048 })).toBe(
      "Only .xlsx files are accepted. Upload a Rent Roll or Affordable Rent Roll export."
    );
    expect(validateUpload({ name: "rent-roll.csv", size: 10 })).not.toBeNull();
  });

  it("rejects files over the upload limit", () => {
    expect(validateUpload({ name: "big.xlsx", size: MAX_UPLOAD_BYTES })).toBeNull();
    expect(validateUpload({ name: "big.xlsx", size: MAX_UPLOAD_BYTES + 1 })).toBe("File is larger than 20 MB.");
  });
});
