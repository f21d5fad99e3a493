import { describe, expect, it } from "vitest";
import { formatCount, formatCurrency, formatNumber } from "@/lib/format";

describe("format", () => {
  it("formats currency with two decimals by default", () => {
    expect(formatCurrency(1255)).toBe("$1,255.00");
    expect(formatCurrency(-10)).toBe("-$10.00");
    expect(formatCurrency(null)).toBe("$0.00");
    expect(formatCurrency(1255.4, { decimals: 0 })).toBe("$1,255");
  });

  it("formats plain numbers", () => {
    expect(formatNumber(12345.678)).toBe("12,346");
    expect(formatNumber(undefined)).toBe("0");
  });

  it("pluralises counts", () => {
    expect(formatCount(1, "unit")).toBe("1 unit");
    expect(formatCount(3, "charge code")).toBe("3 charge codes");
    expect(formatCount(0, "entry", "entries")).toBe("0 entries");
  });
});
