import type { FastifyBaseLogger } from "fastify";
import {
  distanceFromOrigin,
  formatLapLogLine,
  listLaps,
  NO_SIGNALS,
  snapshotSession,
  tickSession,
  type ManualSignals,
  type PresentationSnapshot,
  type TickResult,
  type TimerSession
} from "../../src/timing/index.js";
import type { ByteSource } from "./byteSource.js";
import type { LapLogStore } from "./lapLogStore.js";
import { SIGNAL_NAMES, type FixView, type LapsView, type SignalName } from "./types.js";

export class DeviceError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
  }
}

export function isSignalName(value: string): value is SignalName {
  return SIGNAL_NAMES.some((name) => name === value);
}

/** Current level of the three manual inputs, as last reported by the client. */
export class SignalPanel {
  private levels: ManualSignals = { ...NO_SIGNALS };

  set(name: SignalName, pressed: boolean): void {
    switch (name) {
      case "set-origin":
        this.levels.setOrigin = pressed;
        break;
      case "cycle-radius":
        this.levels.cycleRadius = pressed;
        break;
      case "force-lap":
        this.levels.forceLap = pressed;
        break;
    }
  }

  read(): ManualSignals {
    return { ...this.levels };
  }
}

export type PresentationListener = (snapshot: PresentationSnapshot) => void;

export interface DeviceRuntimeOptions {
  session: TimerSession;
  source: ByteSource;
  lapLog: LapLogStore;
  log: FastifyBaseLogger;
  tickIntervalMs: number;
  now?: () => number;
}

/**
 * Sole owner of the timer session. Every mutation happens inside `tick`;
 * request handlers only set signal levels or read snapshots.
 */
export class DeviceRuntime {
  readonly signals = new SignalPanel();
  private readonly session: TimerSession;
  private readonly source: ByteSource;
  private readonly lapLog: LapLogStore;
  private readonly log: FastifyBaseLogger;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private interval: NodeJS.Timeout | null = null;
  private latest: PresentationSnapshot | null = null;
  private listeners = new Set<PresentationListener>();
  private pendingWrites: Promise<void> = Promise.resolve();

  constructor(options: DeviceRuntimeOptions) {
    this.session = options.session;
    this.source = options.source;
    this.lapLog = options.lapLog;
    this.log = options.log;
    this.tickIntervalMs = options.tickIntervalMs;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  /** Writes the session header; must run before any lap line. */
  async open(): Promise<void> {
    await this.lapLog.writeHeader();
  }

  startTicking(): void {
    if (this.interval) return;
    this.interval = setInterval(() => {
      this.tick(this.now());
    }, this.tickIntervalMs);
    this.log.info({ event: "device.start", tickIntervalMs: this.tickIntervalMs }, "device_event");
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  /** Resolves once every queued lap line has been handed to the store. */
  flush(): Promise<void> {
    return this.pendingWrites;
  }

  onPresentation(listener: PresentationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  tick(nowMs: number): TickResult {
    const bytes = this.source.drain();
    if (bytes.length > 0) {
      this.log.trace({ event: "input.raw", text: Buffer.from(bytes).toString("latin1") }, "device_event");
    }
    const result = tickSession(this.session, {
      bytes,
      signals: this.signals.read(),
      nowMs
    });

    if (result.originChanged) {
      this.log.debug({ event: "origin.set", origin: this.session.origin }, "device_event");
    }
    if (result.radiusChanged) {
      this.log.info({ event: "radius.changed", triggerRadius: this.session.timer.triggerRadius }, "device_event");
    }
    if (result.lap) {
      this.log.info({ event: "lap.completed", ...result.lap }, "device_event");
      this.enqueueLapLine(formatLapLogLine(result.lap));
    }
    if (result.presentation) {
      this.latest = result.presentation;
      for (const listener of this.listeners) {
        listener(result.presentation);
      }
    }
    return result;
  }

  presentation(): PresentationSnapshot {
    return this.latest ?? snapshotSession(this.session, this.now());
  }

  fixView(): FixView {
    return {
      fix: structuredClone(this.session.fix),
      origin: { ...this.session.origin },
      distanceMeters: distanceFromOrigin(this.session)
    };
  }

  lapsView(): LapsView {
    const timer = this.session.timer;
    return {
      lapCount: timer.lapCount,
      laps: listLaps(timer.history),
      bestLap: timer.bestLap,
      averageLapSeconds: timer.averageLapSeconds
    };
  }

  private enqueueLapLine(line: string): void {
    // Appends stay in completion order; a failed write is logged and the next one still runs.
    this.pendingWrites = this.pendingWrites
      .then(() => this.lapLog.append(line))
      .catch((err: unknown) => {
        this.log.error({ err, line }, "laplog.write_failed");
      });
  }
}
