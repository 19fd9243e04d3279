import type { CollectionEvent, DaySummary, StreamName } from "./types";
import { addCalendarDays, calendarKey } from "./timeZone";

export { daysBetween } from "./timeZone";

/** How long after its start a collection still counts as "today". */
export const COLLECTION_WINDOW_MS = 60 * 60 * 1000;

/**
 * Buckets events by calendar day in `timezone`, ascending. Stream order
 * within a day follows the order events were first seen after sorting by time.
 */
export function groupByDay(events: readonly CollectionEvent[], timezone: string): DaySummary[] {
  const sorted = [...events].sort((a, b) => a.date.getTime() - b.date.getTime());
  const days = new Map<string, DaySummary>();

  for (const event of sorted) {
    const key = calendarKey(event.date, timezone);
    let summary = days.get(key);
    if (!summary) {
      summary = { date: event.date, types: [] };
      days.set(key, summary);
    }
    if (!summary.types.includes(event.type)) {
      summary.types.push(event.type);
    }
  }

  return [...days.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, summary]) => summary);
}

function windowOpen(now: Date, day: DaySummary): boolean {
  return now.getTime() < day.date.getTime() + COLLECTION_WINDOW_MS;
}

/** Streams collected today whose one-hour window has not yet closed. */
export function today(
  now: Date,
  events: readonly CollectionEvent[],
  timezone: string
): StreamName[] {
  const key = calendarKey(now, timezone);
  const day = groupByDay(events, timezone).find(
    (summary) => calendarKey(summary.date, timezone) === key && windowOpen(now, summary)
  );
  return day ? [...day.types] : [];
}

export function tomorrow(
  now: Date,
  events: readonly CollectionEvent[],
  timezone: string
): StreamName[] {
  const key = calendarKey(addCalendarDays(now, 1, timezone), timezone);
  const day = groupByDay(events, timezone).find(
    (summary) => calendarKey(summary.date, timezone) === key
  );
  return day ? [...day.types] : [];
}

/**
 * First day on a later calendar date than `now`, or today while its
 * collection window is still open.
 */
export function nextDay(
  now: Date,
  events: readonly CollectionEvent[],
  timezone: string
): DaySummary | undefined {
  const nowKey = calendarKey(now, timezone);
  return groupByDay(events, timezone).find((summary) => {
    const key = calendarKey(summary.date, timezone);
    return key > nowKey || (key === nowKey && windowOpen(now, summary));
  });
}
