import { LAP_DEBOUNCE_MS } from "../constants";
import type { LocalTimestamp } from "../types/fix";
import type { BestLap, LapRecord } from "../types/lap";
import { createLapHistory, pushLap, type LapHistory } from "./lapHistory";
import type { RadiusState } from "./radiusSystem";

export interface TimerState extends RadiusState {
  lapCount: number;
  armed: boolean;
  lastLapStartMs: number;
  debounceMs: number;
  durationSumSeconds: number;
  bestLap: BestLap | null;
  averageLapSeconds: number | null;
  topSpeedKmh: number;
  history: LapHistory;
}

export interface LapInput {
  distanceMeters: number;
  forceLap: boolean;
  nowMs: number;
  completedAt: LocalTimestamp;
}

export function createTimerState(startedAtMs: number, triggerRadius: number, debounceMs = LAP_DEBOUNCE_MS): TimerState {
  return {
    lapCount: 0,
    armed: false,
    lastLapStartMs: startedAtMs,
    debounceMs,
    triggerRadius,
    radiusLatch: false,
    durationSumSeconds: 0,
    bestLap: null,
    averageLapSeconds: null,
    topSpeedKmh: 0,
    history: createLapHistory()
  };
}

export function recordSpeed(state: TimerState, speedKmh: number) {
  if (speedKmh > state.topSpeedKmh) state.topSpeedKmh = speedKmh;
}

export function elapsedSinceLapStartMs(state: TimerState, nowMs: number) {
  return nowMs - state.lastLapStartMs;
}

function isInsideZone(state: TimerState, distanceMeters: number) {
  return distanceMeters !== 0 && distanceMeters <= state.triggerRadius;
}

function completeLap(state: TimerState, input: LapInput): LapRecord {
  const ordinal = state.lapCount;
  const durationSeconds = Math.floor(elapsedSinceLapStartMs(state, input.nowMs) / 1000);
  const lap: LapRecord = {
    ordinal,
    durationSeconds,
    topSpeedKmh: state.topSpeedKmh,
    completedAt: { ...input.completedAt }
  };

  pushLap(state.history, lap);
  if (state.bestLap == null || durationSeconds < state.bestLap.durationSeconds) {
    state.bestLap = { ordinal, durationSeconds };
  }
  state.durationSumSeconds += durationSeconds;
  if (state.lapCount > 1) {
    state.averageLapSeconds = state.durationSumSeconds / state.lapCount;
  }
  state.topSpeedKmh = 0;
  return lap;
}

/**
 * Runs the armed/unarmed detector for one tick and returns the lap completed
 * by this crossing, if any. The first crossing only starts the clock.
 */
export function evaluateLap(state: TimerState, input: LapInput): LapRecord | null {
  // Holding force-lap keeps the detector armed.
  if (state.armed && input.distanceMeters >= state.triggerRadius && !input.forceLap) {
    state.armed = false;
  }

  if (state.armed) return null;
  if (!isInsideZone(state, input.distanceMeters) && !input.forceLap) return null;
  if (elapsedSinceLapStartMs(state, input.nowMs) <= state.debounceMs) return null;

  const lap = state.lapCount > 0 ? completeLap(state, input) : null;
  state.lastLapStartMs = input.nowMs;
  state.lapCount += 1;
  state.armed = true;
  return lap;
}
