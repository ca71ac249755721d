export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
  second: number;
}

export interface Fix {
  position: GeoPoint;
  date: CalendarDate;
  time: ClockTime;
  speedKmh: number;
  altitudeMeters: number;
  satellites: number;
}

/** Fields carried by a single accepted sentence; absent keys leave the fix untouched. */
export interface FixDelta {
  position?: GeoPoint;
  date?: CalendarDate;
  time?: ClockTime;
  speedKmh?: number;
  altitudeMeters?: number;
  satellites?: number;
}

export type LocalTimestamp = CalendarDate & ClockTime;
