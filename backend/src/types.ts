import type { BestLap, Fix, GeoPoint, LapRecord } from "../../src/timing/index.js";

export const SIGNAL_NAMES = ["set-origin", "cycle-radius", "force-lap"] as const;
export type SignalName = (typeof SIGNAL_NAMES)[number];

export interface FixView {
  fix: Fix;
  origin: GeoPoint;
  distanceMeters: number;
}

export interface LapsView {
  lapCount: number;
  laps: LapRecord[];
  bestLap: BestLap | null;
  averageLapSeconds: number | null;
}
