import type { LocalTimestamp } from "./fix";

export interface LapRecord {
  ordinal: number;
  durationSeconds: number;
  topSpeedKmh: number;
  completedAt: LocalTimestamp;
}

export interface BestLap {
  ordinal: number;
  durationSeconds: number;
}

export interface ManualSignals {
  setOrigin: boolean;
  cycleRadius: boolean;
  forceLap: boolean;
}
