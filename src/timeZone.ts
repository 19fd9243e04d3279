const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-GB", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

/** Wall-clock fields of an instant as seen in `timezone`. */
export function wallClock(date: Date, timezone: string): WallClock {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timezone).formatToParts(date)) {
    if (part.type !== "literal") {
      fields[part.type] = Number(part.value);
    }
  }

  return {
    year: fields.year ?? NaN,
    month: fields.month ?? NaN,
    day: fields.day ?? NaN,
    hour: fields.hour ?? NaN,
    minute: fields.minute ?? NaN,
    second: fields.second ?? NaN,
  };
}

function offsetMs(instant: number, timezone: string): number {
  const wall = wallClock(new Date(instant), timezone);
  const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return asUtc - Math.floor(instant / 1000) * 1000;
}

/**
 * Instant at which the wall clock in `timezone` reads the given fields.
 * Out-of-range days roll over the way Date.UTC does. A wall time skipped by
 * a DST jump resolves to the instant after the gap.
 */
export function zonedTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timezone: string
): Date {
  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const first = guess - offsetMs(guess, timezone);
  const second = guess - offsetMs(first, timezone);
  return new Date(second);
}

/** `YYYY-MM-DD` of the calendar day the instant falls on in `timezone`. */
export function calendarKey(date: Date, timezone: string): string {
  const { year, month, day } = wallClock(date, timezone);
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/** Same wall-clock time, `days` calendar days later in `timezone`. */
export function addCalendarDays(date: Date, days: number, timezone: string): Date {
  const wall = wallClock(date, timezone);
  return zonedTime(wall.year, wall.month, wall.day + days, wall.hour, wall.minute, timezone);
}

function dayNumber(date: Date, timezone: string): number {
  const { year, month, day } = wallClock(date, timezone);
  return Date.UTC(year, month - 1, day) / MS_PER_DAY;
}

/**
 * Whole calendar days from `from` to `to` in `timezone`, counted
 * midnight-to-midnight so the time of day never matters.
 */
export function daysBetween(from: Date, to: Date, timezone: string): number {
  return dayNumber(to, timezone) - dayNumber(from, timezone);
}
