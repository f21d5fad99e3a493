import { describe, expect, it } from "vitest";
import { appendResults, findLastUsedColumn, mapUnitRows } from "@/lib/rent-roll/result-writer";
import { gridFromRows, type RawCell } from "@/lib/rent-roll/testing";
import type { UnitRecord } from "@/lib/rent-roll/types";

function rowValues(rows: RawCell[][], row: number, fromCol: number): RawCell[] {
  return rows[row - 1].slice(fromCol - 1);
}

describe("findLastUsedColumn", () => {
  it("finds the rightmost non-empty cell across all rows", () => {
    const sheet = gridFromRows([["Rent Roll"], ["a", null, null, "d"], ["x", "", null]]);
    expect(findLastUsedColumn(sheet)).toBe(4);
  });

  it("is at least 1 for an empty sheet", () => {
    expect(findLastUsedColumn(gridFromRows([]))).toBe(1);
  });
});

describe("mapUnitRows", () => {
  it("keeps the first row for duplicate labels", () => {
    const sheet = gridFromRows([["Rent Roll"], ["101"], [" 102 "], ["101"]]);
    expect(mapUnitRows(sheet, 0)).toEqual(
      new Map([
        ["Rent Roll", 1],
        ["101", 2],
        ["102", 3],
      ])
    );
  });
});

describe("appendResults", () => {
  const units: UnitRecord[] = [
    { unit: "101", name: "Jane Doe", charges: { rent: 1000, fee: 50 }, total: 1050 },
    { unit: "102", name: "John Roe", charges: { parking: 75 }, total: 75 },
    { unit: "999", name: "Ghost", charges: { rent: 1 }, total: 1 },
  ];
  const codes = ["rent", "fee", "parking"];

  function sheet() {
    return gridFromRows([
      ["Rent Roll", null, null],
      [],
      ["101", "rent", 1000],
      [null, "fee", 50],
      ["102", "parking", 75],
    ]);
  }

  it("writes the header row after the last used column", () => {
    const grid = sheet();
    const cols = appendResults(grid, units, codes, { unitCol: 0 });

    expect(cols).toEqual([4, 5, 6, 7, 8]);
    expect(rowValues(grid.rows, 1, 4)).toEqual(["Resident Name", "rent", "fee", "parking", "Total Amount"]);
  });

  it("writes each unit on the row where its label appears, defaulting absent codes to 0", () => {
    const grid = sheet();
    appendResults(grid, units, codes, { unitCol: 0 });

    expect(rowValues(grid.rows, 3, 4)).toEqual(["Jane Doe", 1000, 50, 0, 1050]);
    expect(rowValues(grid.rows, 5, 4)).toEqual(["John Roe", 0, 0, 75, 75]);
  });

  it("drops units that have no row in the sheet", () => {
    const grid = sheet();
    appendResults(grid, units, codes, { unitCol: 0 });

    expect(grid.rows.flat()).not.toContain("Ghost");
    expect(rowValues(grid.rows, 4, 4)).toEqual([]);
  });

  it("writes only the fixed headers when nothing was extracted", () => {
    const grid = sheet();
    expect(appendResults(grid, [], [], { unitCol: 0 })).toEqual([4, 5]);
    expect(rowValues(grid.rows, 1, 4)).toEqual(["Resident Name", "Total Amount"]);
  });
});
