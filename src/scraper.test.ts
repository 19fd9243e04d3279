import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "fs";
import path from "path";
import { createScraper } from "./scraper";
import { loadConfig } from "./config";
import { NoCollectionsError, SessionError } from "./errors";
import type { FetchLike } from "./councilClient";

const fixture = readFileSync(path.join(__dirname, "__fixtures__", "schedule.html"), "utf8");

function councilFetch(schedule: string): FetchLike {
  return vi.fn<FetchLike>(async (input) => {
    if (input.includes("/Shared/SaveAddress")) {
      return new Response(null, {
        status: 200,
        headers: { "Set-Cookie": "RedbridgeIV3LivePref=test-session; Path=/" },
      });
    }
    return new Response(schedule, { status: 200 });
  });
}

describe("Scraper", () => {
  const config = loadConfig({ UPRN: "100000000001", COURTESY_DELAY_MS: "0" });
  const now = (): Date => new Date("2025-11-20T12:00:00Z");

  it("should turn the council pages into sorted collection events", async () => {
    const scraper = createScraper(config, { fetch: councilFetch(fixture), now });

    const events = await scraper.fetchCollections();

    expect(events.map((event) => `${event.date.toISOString()} ${event.type}`)).toEqual([
      "2025-12-01T06:00:00.000Z Refuse",
      "2025-12-01T06:00:00.000Z Food Waste",
      "2025-12-02T06:00:00.000Z Recycling",
      "2025-12-08T06:00:00.000Z Refuse",
      "2025-12-08T06:00:00.000Z Food Waste",
      "2025-12-09T06:00:00.000Z Recycling",
    ]);
  });

  it("should surface an empty schedule as NoCollectionsError", async () => {
    const scraper = createScraper(config, { fetch: councilFetch("<html></html>"), now });

    await expect(scraper.fetchCollections()).rejects.toBeInstanceOf(NoCollectionsError);
  });

  it("should stop before the schedule request when the handshake fails", async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(new Response("down", { status: 502 }));
    const scraper = createScraper(config, { fetch, now });

    await expect(scraper.fetchCollections()).rejects.toBeInstanceOf(SessionError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
