import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { AnyNode, Element } from "domhandler";
import {
  type CollectionEvent,
  type ExtractedStream,
  GARDEN_WASTE,
  type Instruction,
  type RawEntry,
  type StreamName,
  type StreamRule,
} from "./types";
import {
  DETAIL_SELECTOR,
  ENTRY_NOTE_SELECTOR,
  INSTRUCTION_SELECTOR,
  NOTICE_SELECTOR,
  SCHEDULE_CONTAINER_SELECTOR,
  STREAM_RULES,
} from "./streamRules";
import { NoCollectionsError, ParseError } from "./errors";
import { wallClock, zonedTime } from "./timeZone";
import { logger } from "./logger";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

// A date read without a year that lands further back than this belongs to next year.
const YEAR_ROLLOVER_MS = 180 * 24 * 60 * 60 * 1000;

export interface ScheduleParserOptions {
  baseUrl: string;
  timezone: string;
  startHour: number;
  rules?: readonly StreamRule[];
  now?: () => Date;
}

export function normalizeSpaces(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(" ");
}

/** Appends `extra` on its own line unless `existing` already contains it. */
export function appendNote(existing: string, extra: string): string {
  const current = existing.trim();
  const addition = extra.trim();
  if (!addition) {
    return current;
  }
  if (!current) {
    return addition;
  }
  if (current.includes(addition)) {
    return current;
  }
  return `${current}\n${addition}`;
}

function cloneInstructions(values: Instruction[]): Instruction[] {
  return values.map((instruction) => ({
    text: instruction.text,
    links: [...instruction.links],
  }));
}

export class ScheduleParser {
  private readonly rules: readonly StreamRule[];
  private readonly now: () => Date;

  constructor(private readonly options: ScheduleParserOptions) {
    this.rules = options.rules ?? STREAM_RULES;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Turns the schedule page into sorted, deduplicated collection events.
   * Throws NoCollectionsError when the page holds no usable entries.
   */
  parse(html: string): CollectionEvent[] {
    let $: CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      throw new ParseError("Schedule document could not be parsed", { cause: error });
    }

    const streams = this.extract($);
    if (streams === null) {
      logger.debug(`No ${SCHEDULE_CONTAINER_SELECTOR} element found`);
      throw new NoCollectionsError();
    }

    const { events, datedEntries } = this.normalize(streams);
    applyGardenNotice(events, streams, datedEntries);

    if (events.length === 0) {
      throw new NoCollectionsError();
    }

    return events.sort((a, b) => a.date.getTime() - b.date.getTime());
  }

  /**
   * Pulls raw text out of every stream container present on the page.
   * Returns null when the outer schedule container itself is missing.
   */
  extract($: CheerioAPI): ExtractedStream[] | null {
    const container = $(SCHEDULE_CONTAINER_SELECTOR).first();
    if (container.length === 0) {
      return null;
    }

    const streams: ExtractedStream[] = [];

    for (const rule of this.rules) {
      const block = container.find(rule.containerSelector);
      if (block.length === 0) {
        logger.debug(`Stream ${rule.streamName} not present on page`);
        continue;
      }

      const entries: RawEntry[] = [];
      block.find(rule.entrySelector).each((_, node) => {
        const entry = $(node);
        const dayText = entry.find(rule.daySelector).text().trim();
        const monthText = entry.find(rule.monthSelector).text().trim();
        if (!dayText || !monthText) {
          return;
        }

        entries.push({ dayText, monthText, note: this.extractEntryNote($, entry, rule) });
      });

      streams.push({
        rule,
        instructions: this.extractInstructions($, block),
        notice: normalizeSpaces(block.find(NOTICE_SELECTOR).first().text()),
        entries,
      });
    }

    return streams;
  }

  /**
   * Dates each raw entry and folds repeats of the same (date, stream) into
   * one event. `datedEntries` counts entries that parsed, per stream.
   */
  normalize(streams: ExtractedStream[]): {
    events: CollectionEvent[];
    datedEntries: Map<StreamName, number>;
  } {
    const events: CollectionEvent[] = [];
    const seen = new Map<string, CollectionEvent>();
    const datedEntries = new Map<StreamName, number>();

    for (const stream of streams) {
      const type = stream.rule.streamName;
      let dated = 0;

      for (const entry of stream.entries) {
        const date = this.parseDate(entry.dayText, entry.monthText);
        if (!date) {
          logger.debug(`Skipping unparseable ${type} date "${entry.dayText} ${entry.monthText}"`);
          continue;
        }
        dated++;

        const key = `${date.toISOString()}|${type}`;
        const existing = seen.get(key);
        if (existing) {
          if (!existing.note && entry.note) {
            existing.note = entry.note;
          }
          if (existing.instructions.length === 0 && stream.instructions.length > 0) {
            existing.instructions = cloneInstructions(stream.instructions);
          }
          continue;
        }

        const event: CollectionEvent = {
          date,
          type,
          instructions: cloneInstructions(stream.instructions),
          note: entry.note,
        };
        seen.set(key, event);
        events.push(event);
      }

      datedEntries.set(type, (datedEntries.get(type) ?? 0) + dated);
    }

    return { events, datedEntries };
  }

  /**
   * Reads "1st" + "December" (or "December 2025") as that day at the
   * configured start hour in the configured timezone.
   */
  parseDate(dayText: string, monthText: string): Date | null {
    const dayDigits = dayText.match(/\d+/)?.[0];
    if (!dayDigits) {
      return null;
    }

    const monthMatch = normalizeSpaces(monthText).match(/^([A-Za-z]+),?(?:\s+(\d{4}))?$/);
    const monthName = monthMatch?.[1];
    if (!monthMatch || !monthName) {
      return null;
    }

    const monthIndex = MONTHS.indexOf(monthName.toLowerCase());
    if (monthIndex < 0) {
      return null;
    }

    const day = Number(dayDigits);
    const month = monthIndex + 1;
    const explicitYear = monthMatch[2];
    const { timezone, startHour } = this.options;

    let year = explicitYear ? Number(explicitYear) : wallClock(this.now(), timezone).year;
    if (!isValidDay(year, month, day)) {
      return null;
    }

    let date = zonedTime(year, month, day, startHour, 0, timezone);
    if (!explicitYear && date.getTime() < this.now().getTime() - YEAR_ROLLOVER_MS) {
      year++;
      if (!isValidDay(year, month, day)) {
        return null;
      }
      date = zonedTime(year, month, day, startHour, 0, timezone);
    }

    return date;
  }

  private extractInstructions($: CheerioAPI, block: Cheerio<Element>): Instruction[] {
    const detail = block.find(DETAIL_SELECTOR).first();
    if (detail.length === 0) {
      return [];
    }

    const instructions: Instruction[] = [];
    detail.find(INSTRUCTION_SELECTOR).each((_, node) => {
      const paragraph = $(node);
      const text = instructionText($, paragraph);
      if (!text) {
        return;
      }
      instructions.push({ text, links: this.extractLinks($, paragraph) });
    });

    return instructions;
  }

  private extractLinks($: CheerioAPI, paragraph: Cheerio<Element>): string[] {
    const links: string[] = [];
    paragraph.find("a[href]").each((_, anchor) => {
      const href = ($(anchor).attr("href") ?? "").trim();
      if (!href || !URL.canParse(href, this.options.baseUrl)) {
        return;
      }

      const resolved = new URL(href, this.options.baseUrl).toString();
      if (!links.includes(resolved)) {
        links.push(resolved);
      }
    });
    return links;
  }

  private extractEntryNote($: CheerioAPI, entry: Cheerio<Element>, rule: StreamRule): string {
    const notes: string[] = [];
    entry.find(ENTRY_NOTE_SELECTOR).each((_, node) => {
      const note = $(node);
      if (note.is(rule.daySelector) || note.is(rule.monthSelector)) {
        return;
      }

      const classes = note.attr("class") ?? "";
      if (classes.includes("collection-day") || classes.includes("collection-month")) {
        return;
      }

      const text = normalizeSpaces(note.text());
      if (text) {
        notes.push(text);
      }
    });
    return notes.join(" ");
  }
}

function instructionText($: CheerioAPI, paragraph: Cheerio<Element>): string {
  const parts: string[] = [];
  paragraph.contents().each((_, child: AnyNode) => {
    const text = $(child).text().trim();
    if (text) {
      parts.push(text);
    }
  });
  return normalizeSpaces(parts.join(" "));
}

function isValidDay(year: number, month: number, day: number): boolean {
  if (day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

/**
 * A garden-waste block with a notice but no dated entries means the service
 * is paused; the notice is copied onto every other stream's note instead.
 */
export function applyGardenNotice(
  events: CollectionEvent[],
  streams: ExtractedStream[],
  datedEntries: Map<StreamName, number>
): void {
  const garden = streams.find((stream) => stream.rule.streamName === GARDEN_WASTE);
  if (!garden || !garden.notice || (datedEntries.get(GARDEN_WASTE) ?? 0) > 0) {
    return;
  }

  logger.debug(`Garden waste paused, annotating other streams: ${garden.notice}`);
  for (const event of events) {
    if (event.type !== GARDEN_WASTE) {
      event.note = appendNote(event.note, garden.notice);
    }
  }
}
