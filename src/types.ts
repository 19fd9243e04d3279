export type StreamName = "Refuse" | "Recycling" | "Garden Waste" | "Food Waste";

export const GARDEN_WASTE: StreamName = "Garden Waste";

export interface AddressQuery {
  uprn: string; // unique property reference number
  addressLine?: string;
  postcode?: string;
  latitude?: string;
  longitude?: string;
}

export interface Instruction {
  text: string;
  links: string[]; // absolute, deduplicated, in page order
}

export interface CollectionEvent {
  date: Date; // calendar date stamped with the configured start hour
  type: StreamName;
  instructions: Instruction[];
  note: string;
}

export interface StreamRule {
  containerSelector: string;
  entrySelector: string;
  daySelector: string;
  monthSelector: string;
  streamName: StreamName;
}

export interface DaySummary {
  date: Date;
  types: StreamName[];
}

export interface CacheEntry {
  events: readonly CollectionEvent[];
  fetchedAt: Date;
}

/**
 * Text harvested for one stream before any date parsing happens.
 */
export interface ExtractedStream {
  rule: StreamRule;
  instructions: Instruction[];
  notice: string;
  entries: RawEntry[];
}

export interface RawEntry {
  dayText: string;
  monthText: string;
  note: string;
}
