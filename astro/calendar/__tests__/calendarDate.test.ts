import { describe, expect, it } from "vitest";
import { addDays, dayOfYear, parseCalendarDate, utcMidnight } from "../calendarDate.js";
import { InvalidCalendarDateError } from "../../errors.js";

describe("calendarDate", () => {
  it("computes 1-based day of year", () => {
    expect(dayOfYear("2025-01-01")).toBe(1);
    expect(dayOfYear("2025-03-22")).toBe(81);
    expect(dayOfYear("2025-12-31")).toBe(365);
    expect(dayOfYear("2024-12-31")).toBe(366);
  });

  it("anchors dates at midnight UTC", () => {
    expect(utcMidnight("2025-03-22")).toBe(Date.parse("2025-03-22T00:00:00Z"));
  });

  it("adds days across month and year boundaries", () => {
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("rejects malformed and rolled-over dates", () => {
    expect(() => parseCalendarDate("2025-3-22")).toThrow(InvalidCalendarDateError);
    expect(() => parseCalendarDate("2025-02-30")).toThrow('Invalid calendar date "2025-02-30"');
  });
});
