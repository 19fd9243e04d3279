import { CouncilClient, type FetchLike } from "./councilClient";
import { ScheduleParser } from "./scheduleParser";
import type { CollectionEvent } from "./types";
import type { AppConfig } from "./config";

export interface CollectionSource {
  fetchCollections(signal?: AbortSignal): Promise<CollectionEvent[]>;
}

export class Scraper implements CollectionSource {
  constructor(
    private readonly client: CouncilClient,
    private readonly parser: ScheduleParser
  ) {}

  /** Handshake, fetch, extract and normalize; one request each, no retries. */
  async fetchCollections(signal?: AbortSignal): Promise<CollectionEvent[]> {
    const html = await this.client.fetchRawSchedule(signal);
    return this.parser.parse(html);
  }
}

export function createScraper(
  config: AppConfig,
  overrides: { fetch?: FetchLike; now?: () => Date } = {}
): Scraper {
  const client = new CouncilClient({
    baseUrl: config.baseUrl,
    sessionPath: config.sessionPath,
    schedulePath: config.schedulePath,
    sessionCookie: config.sessionCookie,
    address: config.address,
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    courtesyDelayMs: config.courtesyDelayMs,
    ...overrides,
  });

  const parser = new ScheduleParser({
    baseUrl: config.baseUrl,
    timezone: config.timezone,
    startHour: config.startHour,
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  return new Scraper(client, parser);
}
