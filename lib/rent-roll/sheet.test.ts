import { describe, expect, it } from "vitest";
import { EMPTY, num, text } from "@/lib/rent-roll/cell-value";
import { boldIsSectionHeader, worksheetGrid } from "@/lib/rent-roll/sheet";
import { worksheetFromRows } from "@/lib/rent-roll/testing";

describe("worksheetGrid", () => {
  it("reads normalised values with 1-based addressing", () => {
    const { worksheet } = worksheetFromRows([
      ["Rent Roll", null, "Unit"],
      [null, 12.5, "101"],
    ]);
    const grid = worksheetGrid(worksheet);

    expect(grid.rowCount).toBe(2);
    expect(grid.columnCount).toBe(3);
    expect(grid.read(1, 1)).toEqual(text("Rent Roll"));
    expect(grid.read(2, 2)).toEqual(num(12.5));
    expect(grid.read(2, 1)).toEqual(EMPTY);
  });

  it("does not grow the sheet when reading outside the used range", () => {
    const { worksheet } = worksheetFromRows([["Rent Roll", "Code"]]);
    const grid = worksheetGrid(worksheet);

    expect(grid.read(1, 40)).toEqual(EMPTY);
    expect(grid.read(50, 1)).toEqual(EMPTY);
    expect(grid.isBold(50, 1)).toBe(false);
    expect(worksheet.rowCount).toBe(1);
    expect(worksheet.columnCount).toBe(2);
  });

  it("reports bold cells", () => {
    const { worksheet } = worksheetFromRows([["Current Residents"], ["101"]], [[1, 1]]);
    const grid = worksheetGrid(worksheet);

    expect(grid.isBold(1, 1)).toBe(true);
    expect(grid.isBold(2, 1)).toBe(false);
    expect(boldIsSectionHeader(grid, 1, 1)).toBe(true);
  });

  it("reads secondary cells of a merged range as empty", () => {
    const { worksheet } = worksheetFromRows([["101", null], [null, null]]);
    worksheet.mergeCells("A1:A2");
    const grid = worksheetGrid(worksheet);

    expect(grid.read(1, 1)).toEqual(text("101"));
    expect(grid.read(2, 1)).toEqual(EMPTY);
  });

  it("reads cached formula results", () => {
    const { worksheet } = worksheetFromRows([[100, 25]]);
    worksheet.getCell("C1").value = { formula: "A1+B1", result: 125, date1904: false };
    expect(worksheetGrid(worksheet).read(1, 3)).toEqual(num(125));
  });

  it("writes values into the worksheet", () => {
    const { worksheet } = worksheetFromRows([["Rent Roll"]]);
    worksheetGrid(worksheet).write(3, 4, "Total Amount");
    expect(worksheet.getCell(3, 4).value).toBe("Total Amount");
  });
});
