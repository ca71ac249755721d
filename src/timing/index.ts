import { sessionOptionsSchema, type SessionOptions } from "../validation/sessionOptionsSchema";
import type { Fix, GeoPoint, LocalTimestamp } from "./types/fix";
import type { LapRecord, ManualSignals } from "./types/lap";
import { toLocalTimestamp } from "./systems/clockSystem";
import { tokenizeFields } from "./systems/fieldTokenizer";
import { FrameAccumulator } from "./systems/frameAccumulator";
import { distanceBetween } from "./systems/geodesy";
import { createTimerState, evaluateLap, recordSpeed, type TimerState } from "./systems/lapSystem";
import { buildPresentation, type PresentationSnapshot } from "./systems/presentationSystem";
import { cycleRadius } from "./systems/radiusSystem";
import { applyFixDelta, createEmptyFix, interpretSentence } from "./systems/sentenceInterpreter";
import { validateSentence } from "./systems/sentenceValidator";

/** Everything the tick loop mutates, owned by a single caller. */
export interface TimerSession {
  fix: Fix;
  origin: GeoPoint;
  timer: TimerState;
  frames: FrameAccumulator;
  utcOffsetHours: number;
  refreshIntervalMs: number;
  lastRefreshAtMs: number;
}

export interface TickInput {
  bytes: Iterable<number>;
  signals: ManualSignals;
  nowMs: number;
}

export interface TickResult {
  framesReceived: number;
  fixUpdates: number;
  distanceMeters: number;
  originChanged: boolean;
  radiusChanged: boolean;
  lap: LapRecord | null;
  presentation: PresentationSnapshot | null;
}

export const NO_SIGNALS: ManualSignals = { setOrigin: false, cycleRadius: false, forceLap: false };

export function createTimerSession(options: SessionOptions = {}): TimerSession {
  const resolved = sessionOptionsSchema.parse(options);
  return {
    fix: createEmptyFix(),
    origin: { ...resolved.origin },
    timer: createTimerState(resolved.startedAtMs, resolved.triggerRadius, resolved.debounceMs),
    frames: new FrameAccumulator(resolved.frameCapacity),
    utcOffsetHours: resolved.utcOffsetHours,
    refreshIntervalMs: resolved.refreshIntervalMs,
    lastRefreshAtMs: resolved.startedAtMs
  };
}

/** Feeds one frame through validation and interpretation. Returns true when the fix changed. */
export function ingestFrame(session: TimerSession, frame: string) {
  const validated = validateSentence(frame);
  if (!validated.ok) return false;
  const fields = tokenizeFields(validated.payload);
  if (fields.length === 0) return false;
  const delta = interpretSentence(fields);
  if (!delta) return false;
  applyFixDelta(session.fix, delta);
  return true;
}

export function localTimeOf(session: TimerSession): LocalTimestamp {
  return toLocalTimestamp(session.fix.date, session.fix.time, session.utcOffsetHours);
}

export function distanceFromOrigin(session: TimerSession) {
  return distanceBetween(session.fix.position, session.origin);
}

export function snapshotSession(session: TimerSession, nowMs: number): PresentationSnapshot {
  return buildPresentation({
    fix: session.fix,
    timer: session.timer,
    localTime: localTimeOf(session),
    distanceMeters: distanceFromOrigin(session),
    nowMs
  });
}

/**
 * One processing tick: parse every byte available, then run the lap detector
 * once against the fix those bytes produced.
 */
export function tickSession(session: TimerSession, input: TickInput): TickResult {
  const frames = session.frames.feedAll(input.bytes);
  let fixUpdates = 0;
  for (const frame of frames) {
    if (ingestFrame(session, frame)) fixUpdates += 1;
  }

  recordSpeed(session.timer, session.fix.speedKmh);
  const localTime = localTimeOf(session);

  const originChanged = input.signals.setOrigin;
  if (originChanged) {
    session.origin = { ...session.fix.position };
  }
  const radiusChanged = cycleRadius(session.timer, input.signals.cycleRadius);

  const distanceMeters = distanceFromOrigin(session);
  const lap = evaluateLap(session.timer, {
    distanceMeters,
    forceLap: input.signals.forceLap,
    nowMs: input.nowMs,
    completedAt: localTime
  });

  let presentation: PresentationSnapshot | null = null;
  if (input.nowMs > session.lastRefreshAtMs + session.refreshIntervalMs) {
    session.lastRefreshAtMs = input.nowMs;
    presentation = buildPresentation({ fix: session.fix, timer: session.timer, localTime, distanceMeters, nowMs: input.nowMs });
  }

  return {
    framesReceived: frames.length,
    fixUpdates,
    distanceMeters,
    originChanged,
    radiusChanged,
    lap,
    presentation
  };
}

export { FrameAccumulator } from "./systems/frameAccumulator";
export { computeChecksum, validateSentence } from "./systems/sentenceValidator";
export { tokenizeFields } from "./systems/fieldTokenizer";
export { applyFixDelta, classifySentence, interpretSentence } from "./systems/sentenceInterpreter";
export { distanceBetween, haversineDistance, nmeaToDegrees } from "./systems/geodesy";
export { listLaps } from "./systems/lapHistory";
export { formatLapLogLine, LAP_LOG_HEADER } from "./systems/lapLogSystem";
export type { Fix, FixDelta, GeoPoint, LocalTimestamp } from "./types/fix";
export type { BestLap, LapRecord, ManualSignals } from "./types/lap";
export type { PresentationSnapshot } from "./systems/presentationSystem";
export type { TimerState } from "./systems/lapSystem";
export type { SessionOptions } from "../validation/sessionOptionsSchema";
