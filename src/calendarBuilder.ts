import ical, { ICalAlarmType, ICalCalendarMethod } from "ical-generator";
import type { CollectionEvent } from "./types";
import { calendarKey } from "./timeZone";
import { COLLECTION_WINDOW_MS } from "./dayResolver";

const UID_DOMAIN = "redbridge-ics";
const PROD_ID = { company: "council-bin-calendar", product: "collections", language: "EN" };
const REMINDERS_BEFORE_SECONDS = [11 * 60 * 60, 30 * 60];
const MISSED_PATTERN = /missed/i;

export interface CalendarBuilderOptions {
  name: string;
  description?: string;
  timezone: string;
  startHour: number;
}

export function titleCase(value: string): string {
  const words = value.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return "Collection";
  }
  return words.map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join(" ");
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** Stable per (stream, day), so regenerated feeds never duplicate events in clients. */
export function eventId(event: CollectionEvent, timezone: string): string {
  const day = calendarKey(event.date, timezone).replace(/-/g, "");
  return `${slugify(event.type)}-${day}@${UID_DOMAIN}`;
}

function isMissedCollectionLink(instructionText: string, link: string): boolean {
  if (MISSED_PATTERN.test(instructionText)) {
    return true;
  }
  return URL.canParse(link) && MISSED_PATTERN.test(new URL(link).pathname);
}

function bullets(lines: string[]): string {
  return lines.map((line) => `• ${line}`).join("\n");
}

export function describeCollection(event: CollectionEvent, startHour: number): string {
  const sections: string[] = [];

  const instructionLines =
    event.instructions.length > 0
      ? event.instructions.map((instruction) => instruction.text)
      : [`Place bins out by ${String(startHour).padStart(2, "0")}:00 on collection day.`];
  sections.push(`INSTRUCTIONS\n${bullets(instructionLines)}`);

  const missed: string[] = [];
  const other: string[] = [];
  for (const instruction of event.instructions) {
    for (const link of instruction.links) {
      if (missed.includes(link) || other.includes(link)) {
        continue;
      }
      (isMissedCollectionLink(instruction.text, link) ? missed : other).push(link);
    }
  }
  if (missed.length > 0) {
    sections.push(`MISSED COLLECTION\n${bullets(missed)}`);
  }
  if (other.length > 0) {
    sections.push(`LINKS\n${bullets(other)}`);
  }

  const noteLines = event.note
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  if (noteLines.length > 0) {
    sections.push(`NOTE\n${bullets(noteLines)}`);
  }

  return sections.join("\n\n");
}

export class CalendarBuilder {
  constructor(private readonly options: CalendarBuilderOptions) {
    if (!options.name.trim()) {
      throw new Error("Calendar name is required");
    }
  }

  /** Renders the events as an iCalendar document; output depends only on the input. */
  build(events: readonly CollectionEvent[]): string {
    const calendar = ical({
      name: this.options.name,
      description: this.options.description ?? null,
      prodId: PROD_ID,
      method: ICalCalendarMethod.PUBLISH,
      scale: "gregorian",
    });

    for (const event of events) {
      const summary = `Bin: ${titleCase(event.type)}`;
      calendar.createEvent({
        id: eventId(event, this.options.timezone),
        start: event.date,
        end: new Date(event.date.getTime() + COLLECTION_WINDOW_MS),
        stamp: event.date,
        summary,
        description: describeCollection(event, this.options.startHour),
        categories: [{ name: event.type }],
        alarms: REMINDERS_BEFORE_SECONDS.map((seconds) => ({
          type: ICalAlarmType.display,
          triggerBefore: seconds,
          description: summary,
        })),
      });
    }

    return calendar.toString();
  }
}
