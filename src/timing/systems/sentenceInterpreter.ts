import { CENTURY_PIVOT_YEAR, KNOTS_TO_KMH } from "../constants";
import type { CalendarDate, ClockTime, Fix, FixDelta, GeoPoint } from "../types/fix";
import { nmeaToDegrees, parseDecimal } from "./geodesy";

const MIN_FIELDS = 10;
const VALID_FIX_MARKER = "A";

export type SentenceKind =
  | { kind: "position-velocity"; fields: string[] }
  | { kind: "fix-data"; fields: string[] }
  | { kind: "unrecognized"; type: string };

export function parseInteger(text: string) {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value;
}

/** Talker prefixes (GP, GN, GL, ...) are ignored; only the three-letter suffix matters. */
export function classifySentence(fields: string[]): SentenceKind {
  const type = fields[0] ?? "";
  if (type.length < 3) return { kind: "unrecognized", type };

  switch (type.slice(-3)) {
    case "RMC":
      return { kind: "position-velocity", fields };
    case "GGA":
      return { kind: "fix-data", fields };
    default:
      return { kind: "unrecognized", type };
  }
}

export function parseClockTime(text: string): ClockTime | undefined {
  if (text.length < 6) return undefined;
  return {
    hour: parseInteger(text.slice(0, 2)),
    minute: parseInteger(text.slice(2, 4)),
    second: parseInteger(text.slice(4, 6))
  };
}

export function parseCalendarDate(text: string): CalendarDate | undefined {
  if (text.length < 6) return undefined;
  const shortYear = parseInteger(text.slice(4, 6));
  return {
    day: parseInteger(text.slice(0, 2)),
    month: parseInteger(text.slice(2, 4)),
    year: shortYear >= CENTURY_PIVOT_YEAR ? 1900 + shortYear : 2000 + shortYear
  };
}

export function parsePosition(lat: string, ns: string, lon: string, ew: string): GeoPoint | undefined {
  if (lat.length === 0 || lon.length === 0) return undefined;
  const latitude = nmeaToDegrees(lat);
  const longitude = nmeaToDegrees(lon);
  return {
    latitude: ns.startsWith("S") ? -latitude : latitude,
    longitude: ew.startsWith("W") ? -longitude : longitude
  };
}

// $..RMC,time,status,lat,N/S,lon,E/W,knots,course,date,...
function interpretPositionVelocity(f: string[]): FixDelta | null {
  if (f.length < MIN_FIELDS) return null;
  // A void fix must not overwrite a good previous one.
  if (!f[2].startsWith(VALID_FIX_MARKER)) return null;

  const knots = f[7].length > 0 ? parseDecimal(f[7]) : 0;
  return {
    time: parseClockTime(f[1]),
    position: parsePosition(f[3], f[4], f[5], f[6]),
    speedKmh: knots * KNOTS_TO_KMH,
    date: parseCalendarDate(f[9])
  };
}

// $..GGA,time,lat,N/S,lon,E/W,quality,sats,hdop,alt,...
function interpretFixData(f: string[]): FixDelta | null {
  if (f.length < MIN_FIELDS) return null;
  return {
    time: parseClockTime(f[1]),
    position: parsePosition(f[2], f[3], f[4], f[5]),
    satellites: f[7].length > 0 ? parseInteger(f[7]) : undefined,
    altitudeMeters: f[9].length > 0 ? parseDecimal(f[9]) : undefined
  };
}

export function interpretSentence(fields: string[]): FixDelta | null {
  const sentence = classifySentence(fields);
  switch (sentence.kind) {
    case "position-velocity":
      return interpretPositionVelocity(sentence.fields);
    case "fix-data":
      return interpretFixData(sentence.fields);
    case "unrecognized":
      return null;
    default: {
      const unreachable: never = sentence;
      return unreachable;
    }
  }
}

export function applyFixDelta(fix: Fix, delta: FixDelta) {
  if (delta.position) fix.position = { ...delta.position };
  if (delta.date) fix.date = { ...delta.date };
  if (delta.time) fix.time = { ...delta.time };
  if (delta.speedKmh !== undefined) fix.speedKmh = delta.speedKmh;
  if (delta.altitudeMeters !== undefined) fix.altitudeMeters = delta.altitudeMeters;
  if (delta.satellites !== undefined) fix.satellites = delta.satellites;
}

export function createEmptyFix(): Fix {
  return {
    position: { latitude: 0, longitude: 0 },
    date: { year: 0, month: 0, day: 0 },
    time: { hour: 0, minute: 0, second: 0 },
    speedKmh: 0,
    altitudeMeters: 0,
    satellites: 0
  };
}
