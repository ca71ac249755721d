import type { CalendarDate, ClockTime, LocalTimestamp } from "../types/fix";

/**
 * Shifts receiver UTC into local time by a fixed offset. Only the day absorbs
 * the carry; month and year never roll over.
 */
export function toLocalTimestamp(date: CalendarDate, time: ClockTime, utcOffsetHours: number): LocalTimestamp {
  let hour = time.hour + utcOffsetHours;
  let day = date.day;
  if (hour >= 24) {
    day += Math.trunc(hour / 24);
    hour %= 24;
  } else if (hour < 0) {
    day -= 1;
    hour += 24;
  }
  return { year: date.year, month: date.month, day, hour, minute: time.minute, second: time.second };
}

function pad2(value: number) {
  return String(value).padStart(2, "0");
}

/** `YYYY/MM/DD-HH:MM:SS` */
export function formatTimestamp(ts: LocalTimestamp) {
  return `${ts.year}/${pad2(ts.month)}/${pad2(ts.day)}-${pad2(ts.hour)}:${pad2(ts.minute)}:${pad2(ts.second)}`;
}
