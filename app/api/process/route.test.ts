import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { POST } from "@/app/api/process/route";
import { XLSX_MIME } from "@/lib/config";
import { sampleRentRoll, worksheetFromRows, type RawCell } from "@/lib/rent-roll/testing";

async function xlsxFile(rows: RawCell[][], name: string, boldCells: Parameters<typeof worksheetFromRows>[1] = []) {
  const { workbook } = worksheetFromRows(rows, boldCells);
  const buffer = await workbook.xlsx.writeBuffer();
  return new File([buffer], name, { type: XLSX_MIME });
}

function upload(file?: File | string, headers: Record<string, string> = {}): Request {
  const form = new FormData();
  form.append("source", "test");
  if (file !== undefined) form.append("file", file);
  return new Request("http://localhost/api/process", { method: "POST", body: form, headers });
}

describe("POST /api/process", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the processed workbook as an attachment", async () => {
    const { rows, boldCells } = sampleRentRoll();
    const res = await POST(upload(await xlsxFile(rows, "june.xlsx", boldCells)));

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(XLSX_MIME);
    expect(res.headers.get("content-disposition")).toBe(
      `attachment; filename="processed_june.xlsx"; filename*=UTF-8''processed_june.xlsx`
    );
    expect(res.headers.get("cache-control")).toBe("no-store");
    expect((await res.arrayBuffer()).byteLength).toBeGreaterThan(0);
  });

  it("echoes the caller's request id", async () => {
    const { rows, boldCells } = sampleRentRoll();
    const res = await POST(upload(await xlsxFile(rows, "june.xlsx", boldCells), { "x-request-id": "req-1" }));

    expect(res.headers.get("x-request-id")).toBe("req-1");
  });

  it("rejects an unrecognised layout with 422", async () => {
    const res = await POST(upload(await xlsxFile([["Other"]], "other.xlsx")));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Unit column could not be detected (Row 1 mismatch)." });
  });

  it("rejects files that are not .xlsx", async () => {
    const res = await POST(upload(new File(["unit,code\n"], "rent-roll.csv", { type: "text/csv" })));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Only .xlsx files are accepted." });
  });

  it("rejects a request without a file", async () => {
    const missing = await POST(upload());
    const asText = await POST(upload("june.xlsx"));

    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: "Missing file field." });
    expect(asText.status).toBe(400);
  });

  it("rejects a body that is not multipart", async () => {
    const res = await POST(
      new Request("http://localhost/api/process", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: "{}",
      })
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Expected a multipart/form-data upload with a file field." });
  });
});
