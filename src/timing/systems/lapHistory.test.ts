import { describe, expect, it } from "vitest";
import type { LapRecord } from "../types/lap";
import { createLapHistory, latestLap, listLaps, previousLap, pushLap } from "./lapHistory";

function makeLap(ordinal: number): LapRecord {
  return {
    ordinal,
    durationSeconds: 60 + ordinal,
    topSpeedKmh: 40,
    completedAt: { year: 2024, month: 7, day: 15, hour: 17, minute: 30, second: ordinal }
  };
}

describe("lapHistory", () => {
  it("starts empty", () => {
    const history = createLapHistory();
    expect(listLaps(history)).toEqual([]);
    expect(latestLap(history)).toBeNull();
    expect(previousLap(history)).toBeNull();
  });

  it("lists newest first", () => {
    const history = createLapHistory();
    pushLap(history, makeLap(1));
    pushLap(history, makeLap(2));
    expect(listLaps(history).map((lap) => lap.ordinal)).toEqual([2, 1]);
    expect(latestLap(history)?.ordinal).toBe(2);
    expect(previousLap(history)?.ordinal).toBe(1);
  });

  it("evicts the oldest entry past capacity", () => {
    const history = createLapHistory();
    for (let i = 1; i <= 7; i += 1) pushLap(history, makeLap(i));
    expect(history.size).toBe(5);
    expect(listLaps(history).map((lap) => lap.ordinal)).toEqual([7, 6, 5, 4, 3]);
  });
});
