import { describe, expect, it } from "vitest";
import { formatLapLogLine, LAP_LOG_HEADER } from "./lapLogSystem";

describe("lapLogSystem", () => {
  it("exposes the session header", () => {
    expect(LAP_LOG_HEADER).toBe("LAPCount,LapTime,TopSpeed,YYYY/MM/DD/Hour:Minute:Second");
  });

  it("formats one lap per line", () => {
    const line = formatLapLogLine({
      ordinal: 3,
      durationSeconds: 83,
      topSpeedKmh: 41.4848,
      completedAt: { year: 1994, month: 3, day: 23, hour: 21, minute: 35, second: 19 }
    });
    expect(line).toBe("3,83,41.48,1994/03/23-21:35:19");
  });
});
