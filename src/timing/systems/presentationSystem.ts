import type { Fix, LocalTimestamp } from "../types/fix";
import type { BestLap } from "../types/lap";
import { latestLap, previousLap } from "./lapHistory";
import { elapsedSinceLapStartMs, type TimerState } from "./lapSystem";

export interface CurrentLapView {
  ordinal: number;
  seconds: number;
  running: boolean;
}

export interface PresentationSnapshot {
  localTime: LocalTimestamp;
  satellites: number;
  lapCount: number;
  currentLap: CurrentLapView | null;
  elapsedSeconds: number;
  deltaSeconds: number | null;
  bestLap: BestLap | null;
  averageLapSeconds: number | null;
  speedKmh: number;
  distanceMeters: number;
  triggerRadius: number;
  bestProgress: number | null;
  averageProgress: number | null;
}

export interface BuildPresentationParams {
  fix: Fix;
  timer: TimerState;
  localTime: LocalTimestamp;
  distanceMeters: number;
  nowMs: number;
}

function progressAgainst(referenceSeconds: number | undefined, elapsedSeconds: number) {
  if (!referenceSeconds) return null;
  return (referenceSeconds - elapsedSeconds) / referenceSeconds;
}

export function buildPresentation(params: BuildPresentationParams): PresentationSnapshot {
  const { fix, timer, localTime, distanceMeters, nowMs } = params;
  const elapsedSeconds = elapsedSinceLapStartMs(timer, nowMs) / 1000;
  const latest = latestLap(timer.history);
  const previous = previousLap(timer.history);

  let currentLap: CurrentLapView | null = null;
  if (timer.lapCount > 1 && latest) {
    currentLap = { ordinal: latest.ordinal, seconds: latest.durationSeconds, running: false };
  } else if (timer.lapCount === 1) {
    currentLap = { ordinal: 1, seconds: elapsedSeconds, running: true };
  }

  return {
    localTime: { ...localTime },
    satellites: fix.satellites,
    lapCount: timer.lapCount,
    currentLap,
    elapsedSeconds,
    deltaSeconds: latest && previous ? latest.durationSeconds - previous.durationSeconds : null,
    bestLap: timer.bestLap ? { ...timer.bestLap } : null,
    averageLapSeconds: timer.averageLapSeconds,
    speedKmh: fix.speedKmh,
    distanceMeters,
    triggerRadius: timer.triggerRadius,
    bestProgress: progressAgainst(timer.bestLap?.durationSeconds, elapsedSeconds),
    averageProgress: progressAgainst(timer.averageLapSeconds ?? undefined, elapsedSeconds)
  };
}
