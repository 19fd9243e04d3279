import type { StreamRule } from "./types";

export const SCHEDULE_CONTAINER_SELECTOR = ".your-collection-schedule-container";
export const DETAIL_SELECTOR = ".collectionDetail";
export const INSTRUCTION_SELECTOR = "p.instructions";
export const NOTICE_SELECTOR = ".collectionDates-container .upcoming-dates";
export const ENTRY_NOTE_SELECTOR = ".asterisk-note";

const ENTRY_SELECTOR = ".collectionDates-container .garden-collection-postdate";

/**
 * One row per waste stream, processed in this order. The order also breaks
 * ties between streams collected at the same time.
 */
export const STREAM_RULES: readonly StreamRule[] = [
  {
    containerSelector: ".refuse-container",
    entrySelector: ENTRY_SELECTOR,
    daySelector: ".refuse-garden-collection-day-numeric",
    monthSelector: ".refuse-collection-month",
    streamName: "Refuse",
  },
  {
    containerSelector: ".recycle-container",
    entrySelector: ENTRY_SELECTOR,
    daySelector: ".recycling-garden-collection-day-numeric",
    monthSelector: ".recycling-collection-month",
    streamName: "Recycling",
  },
  {
    containerSelector: ".garden-container",
    entrySelector: ENTRY_SELECTOR,
    daySelector: ".garden-collection-day-numeric",
    monthSelector: ".garden-collection-month",
    streamName: "Garden Waste",
  },
  {
    containerSelector: ".foodwasteCollectionDay",
    entrySelector: ENTRY_SELECTOR,
    daySelector: ".food-garden-collection-day-numeric",
    monthSelector: ".food-collection-month",
    streamName: "Food Waste",
  },
];
