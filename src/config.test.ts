import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("should apply defaults around the required UPRN", () => {
    const config = loadConfig({ UPRN: "100000000001" });

    expect(config).toEqual({
      listenPort: 8080,
      baseUrl: "https://my.redbridge.gov.uk",
      sessionPath: "/Shared/SaveAddress",
      schedulePath: "/RecycleRefuse",
      sessionCookie: "RedbridgeIV3LivePref",
      address: { uprn: "100000000001" },
      userAgent: "council-bin-calendar/1.0",
      startHour: 6,
      requestTimeoutMs: 15000,
      cacheTtlMs: 604800000,
      courtesyDelayMs: 150,
      timezone: "Europe/London",
      calendarName: "Redbridge Collections",
      calendarDescription: "Household waste & recycling (scraped)",
      logLevel: "info",
    });
  });

  it("should read overrides and normalise paths", () => {
    const config = loadConfig({
      UPRN: " 42 ",
      BASE_URL: "https://council.test///",
      SCHEDULE_PATH: "bins",
      ADDRESS_LINE: "1 Test Road",
      POSTCODE: "IG1 1AA",
      LATITUDE: "51.5",
      LONGITUDE: "0.07",
      START_HOUR: "7",
      LOG_LEVEL: "DEBUG",
      REFRESH_CRON: "0 5 * * *",
    });

    expect(config.baseUrl).toBe("https://council.test");
    expect(config.schedulePath).toBe("/bins");
    expect(config.address).toEqual({
      uprn: "42",
      addressLine: "1 Test Road",
      postcode: "IG1 1AA",
      latitude: "51.5",
      longitude: "0.07",
    });
    expect(config.startHour).toBe(7);
    expect(config.logLevel).toBe("debug");
    expect(config.refreshCron).toBe("0 5 * * *");
  });

  it("should fall back to info for an unknown log level", () => {
    expect(loadConfig({ UPRN: "1", LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it.each([
    [{}, "Missing required environment variable: UPRN"],
    [{ UPRN: "1", START_HOUR: "24" }, "START_HOUR must be between 0 and 23"],
    [{ UPRN: "1", START_HOUR: "6am" }, "Invalid integer for START_HOUR: 6am"],
    [{ UPRN: "1", REQUEST_TIMEOUT_MS: "0" }, "REQUEST_TIMEOUT_MS must be positive"],
    [{ UPRN: "1", CACHE_TTL_MS: "-1" }, "CACHE_TTL_MS and COURTESY_DELAY_MS cannot be negative"],
    [{ UPRN: "1", TIMEZONE: "Mars/Olympus" }, "Unknown timezone in TIMEZONE: Mars/Olympus"],
    [{ UPRN: "1", REFRESH_CRON: "every morning" }, "Invalid REFRESH_CRON pattern: every morning"],
  ])("should reject %o", (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });
});
