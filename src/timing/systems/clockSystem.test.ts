import { describe, expect, it } from "vitest";
import { formatTimestamp, toLocalTimestamp } from "./clockSystem";

const DATE = { year: 1994, month: 3, day: 23 };

describe("clockSystem", () => {
  it("shifts the hour within the same day", () => {
    expect(toLocalTimestamp(DATE, { hour: 12, minute: 35, second: 19 }, 9)).toEqual({
      year: 1994,
      month: 3,
      day: 23,
      hour: 21,
      minute: 35,
      second: 19
    });
  });

  it("carries into the day only", () => {
    const ts = toLocalTimestamp({ year: 2024, month: 1, day: 31 }, { hour: 20, minute: 0, second: 0 }, 9);
    expect(ts).toEqual({ year: 2024, month: 1, day: 32, hour: 5, minute: 0, second: 0 });
  });

  it("borrows a day for negative offsets", () => {
    const ts = toLocalTimestamp(DATE, { hour: 2, minute: 10, second: 0 }, -5);
    expect(ts.day).toBe(22);
    expect(ts.hour).toBe(21);
  });

  it("formats with zero padding", () => {
    expect(formatTimestamp({ year: 2024, month: 7, day: 5, hour: 8, minute: 3, second: 9 })).toBe("2024/07/05-08:03:09");
  });
});
