import dotenv from "dotenv";
import cron from "node-cron";
import type { AddressQuery } from "./types";
import { type LogLevel, isLogLevel } from "./logger";

dotenv.config();

const DEFAULT_BASE_URL = "https://my.redbridge.gov.uk";
const DEFAULT_SESSION_PATH = "/Shared/SaveAddress";
const DEFAULT_SCHEDULE_PATH = "/RecycleRefuse";
const DEFAULT_SESSION_COOKIE = "RedbridgeIV3LivePref";
const DEFAULT_USER_AGENT = "council-bin-calendar/1.0";
const DEFAULT_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export interface AppConfig {
  listenPort: number;
  baseUrl: string;
  sessionPath: string;
  schedulePath: string;
  sessionCookie: string;
  address: AddressQuery;
  userAgent: string;
  startHour: number;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  courtesyDelayMs: number;
  timezone: string;
  calendarName: string;
  calendarDescription: string;
  refreshCron?: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = read(env, key);
  if (raw === undefined) {
    return fallback;
  }

  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`Invalid integer for ${key}: ${raw}`);
  }
  return Number(raw);
}

function ensurePath(value: string): string {
  return value.startsWith("/") ? value : `/${value}`;
}

function assertTimezone(timezone: string): void {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: timezone });
  } catch (error) {
    throw new Error(`Unknown timezone in TIMEZONE: ${timezone}`, { cause: error });
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const uprn = read(env, "UPRN");
  if (!uprn) {
    throw new Error("Missing required environment variable: UPRN");
  }

  const startHour = readInt(env, "START_HOUR", 6);
  if (startHour < 0 || startHour > 23) {
    throw new Error("START_HOUR must be between 0 and 23");
  }

  const requestTimeoutMs = readInt(env, "REQUEST_TIMEOUT_MS", 15000);
  if (requestTimeoutMs <= 0) {
    throw new Error("REQUEST_TIMEOUT_MS must be positive");
  }

  const cacheTtlMs = readInt(env, "CACHE_TTL_MS", DEFAULT_CACHE_TTL_MS);
  const courtesyDelayMs = readInt(env, "COURTESY_DELAY_MS", 150);
  if (cacheTtlMs < 0 || courtesyDelayMs < 0) {
    throw new Error("CACHE_TTL_MS and COURTESY_DELAY_MS cannot be negative");
  }

  const timezone = read(env, "TIMEZONE") ?? "Europe/London";
  assertTimezone(timezone);

  const address: AddressQuery = { uprn };
  const addressLine = read(env, "ADDRESS_LINE");
  const postcode = read(env, "POSTCODE");
  const latitude = read(env, "LATITUDE");
  const longitude = read(env, "LONGITUDE");

  if (addressLine) {
    address.addressLine = addressLine;
  }
  if (postcode) {
    address.postcode = postcode;
  }
  if (latitude) {
    address.latitude = latitude;
  }
  if (longitude) {
    address.longitude = longitude;
  }

  const logLevel = read(env, "LOG_LEVEL")?.toLowerCase();

  const config: AppConfig = {
    listenPort: readInt(env, "LISTEN_PORT", 8080),
    baseUrl: (read(env, "BASE_URL") ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    sessionPath: ensurePath(read(env, "SESSION_PATH") ?? DEFAULT_SESSION_PATH),
    schedulePath: ensurePath(read(env, "SCHEDULE_PATH") ?? DEFAULT_SCHEDULE_PATH),
    sessionCookie: read(env, "SESSION_COOKIE") ?? DEFAULT_SESSION_COOKIE,
    address,
    userAgent: read(env, "USER_AGENT") ?? DEFAULT_USER_AGENT,
    startHour,
    requestTimeoutMs,
    cacheTtlMs,
    courtesyDelayMs,
    timezone,
    calendarName: read(env, "CALENDAR_NAME") ?? "Redbridge Collections",
    calendarDescription:
      read(env, "CALENDAR_DESCRIPTION") ?? "Household waste & recycling (scraped)",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };

  const refreshCron = read(env, "REFRESH_CRON");
  if (refreshCron) {
    if (!cron.validate(refreshCron)) {
      throw new Error(`Invalid REFRESH_CRON pattern: ${refreshCron}`);
    }
    config.refreshCron = refreshCron;
  }

  return config;
}
