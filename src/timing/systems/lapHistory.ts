import { LAP_HISTORY_SIZE } from "../constants";
import type { LapRecord } from "../types/lap";

export interface LapHistory {
  slots: Array<LapRecord | null>;
  head: number;
  size: number;
}

export function createLapHistory(capacity = LAP_HISTORY_SIZE): LapHistory {
  return { slots: Array.from({ length: capacity }, () => null), head: 0, size: 0 };
}

/** Overwrites the oldest entry once the history is full. */
export function pushLap(history: LapHistory, lap: LapRecord) {
  history.slots[history.head] = lap;
  history.head = (history.head + 1) % history.slots.length;
  history.size = Math.min(history.size + 1, history.slots.length);
}

/** Newest first. */
export function listLaps(history: LapHistory): LapRecord[] {
  const laps: LapRecord[] = [];
  const capacity = history.slots.length;
  for (let i = 1; i <= history.size; i += 1) {
    const lap = history.slots[(history.head - i + capacity) % capacity];
    if (lap) laps.push(lap);
  }
  return laps;
}

export function latestLap(history: LapHistory) {
  return listLaps(history)[0] ?? null;
}

export function previousLap(history: LapHistory) {
  return listLaps(history)[1] ?? null;
}
