import { describe, it, expect } from "@effect/vitest";
import { billingMonthOf, calendarYearOf, daysInYear, peakImportByMonth } from "../../../finance/tariffs.js";
import { configure, idleFlow } from "../../fixtures.js";

describe("tariffs", () => {
  it("should count leap years", () => {
    expect(daysInYear(2023)).toBe(365);
    expect(daysInYear(2024)).toBe(366);
    expect(daysInYear(1900)).toBe(365);
    expect(daysInYear(2000)).toBe(366);
  });

  it("should place billing months and years in market time", () => {
    const { market } = configure({ market: { utcOffsetMinutes: 600 } });
    const timestamp = new Date("2024-12-31T20:00:00Z");

    expect(billingMonthOf(timestamp, market)).toBe("2025-01");
    expect(calendarYearOf(timestamp, market)).toBe(2025);
  });

  it("should convert interval imports to MW when tracking the monthly peak", () => {
    const { tariff, market } = configure({ market: { resolutionMinutes: 30 } });
    const flows = [
      idleFlow(new Date("2024-01-01T00:00:00Z"), { gridImportMwh: 0.25 }),
      idleFlow(new Date("2024-01-01T00:30:00Z"), { gridImportMwh: 0.5 }),
    ];

    expect([...peakImportByMonth(flows, tariff, market)]).toEqual([["2024-01", 1]]);
  });
});
