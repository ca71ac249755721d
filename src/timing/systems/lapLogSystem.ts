import { LAP_LOG_HEADER } from "../constants";
import type { LapRecord } from "../types/lap";
import { formatTimestamp } from "./clockSystem";

export { LAP_LOG_HEADER };

export function formatLapLogLine(lap: LapRecord) {
  return [lap.ordinal, lap.durationSeconds, lap.topSpeedKmh.toFixed(2), formatTimestamp(lap.completedAt)].join(",");
}
