import { describe, expect, it } from "vitest";
import {
  addDays,
  calendarDateOf,
  dayStartTimestamp,
  formatDate,
  formatDayKey,
  formatUpdateStamp,
} from "./time";

const KYIV = "Europe/Kyiv";

describe("dayStartTimestamp", () => {
  it("returns local midnight in winter time", () => {
    expect(dayStartTimestamp({ year: 2025, month: 11, day: 14 }, KYIV)).toBe(1763071200);
  });

  it("returns local midnight in summer time", () => {
    expect(dayStartTimestamp({ year: 2025, month: 7, day: 1 }, KYIV)).toBe(
      Date.UTC(2025, 5, 30, 21) / 1000
    );
  });

  it("handles the days the clocks change", () => {
    expect(dayStartTimestamp({ year: 2025, month: 3, day: 30 }, KYIV)).toBe(
      Date.UTC(2025, 2, 29, 22) / 1000
    );
    expect(dayStartTimestamp({ year: 2025, month: 10, day: 26 }, KYIV)).toBe(
      Date.UTC(2025, 9, 25, 21) / 1000
    );
  });
});

describe("calendar helpers", () => {
  it("reads the local date of an instant", () => {
    // 23:30 UTC is already the next day in Kyiv
    expect(calendarDateOf(new Date(Date.UTC(2025, 10, 13, 23, 30)), KYIV)).toEqual({
      year: 2025,
      month: 11,
      day: 14,
    });
  });

  it("rolls over month and year ends", () => {
    expect(addDays({ year: 2025, month: 12, day: 31 }, 1)).toEqual({ year: 2026, month: 1, day: 1 });
  });

  it("formats dates the way the page prints them", () => {
    expect(formatDate({ year: 2025, month: 3, day: 5 })).toBe("05.03.2025");
    expect(formatDayKey("1763071200", KYIV)).toBe("14.11.2025");
    expect(formatUpdateStamp(new Date(Date.UTC(2025, 10, 14, 6, 5)), KYIV)).toBe(
      "08:05 14.11.2025"
    );
  });
});
