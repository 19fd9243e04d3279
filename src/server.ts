import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { CollectionEvent } from "./types";
import type { CollectionService } from "./collectionService";
import type { CalendarBuilder } from "./calendarBuilder";
import { CollectionError, InvalidTimeInputError, errorMessage } from "./errors";
import { daysBetween, nextDay, today, tomorrow } from "./dayResolver";
import { calendarKey } from "./timeZone";
import { logger } from "./logger";

const CACHE_CONTROL_ICS = "public, max-age=300";
const RFC3339 = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

export interface ServerDependencies {
  service: Pick<CollectionService, "getCollections">;
  calendar: Pick<CalendarBuilder, "build">;
  timezone: string;
  now?: () => Date;
}

/** Reads the optional `?now=` override; anything but an RFC 3339 instant is rejected. */
export function resolveNow(raw: unknown, clock: () => Date): Date {
  if (raw === undefined || (typeof raw === "string" && raw.trim() === "")) {
    return clock();
  }
  if (typeof raw !== "string" || !RFC3339.test(raw.trim())) {
    throw new InvalidTimeInputError(String(raw));
  }

  const parsed = new Date(raw.trim());
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidTimeInputError(raw);
  }
  return parsed;
}

function scrapeErrorDetail(error: unknown): string {
  if (error instanceof CollectionError) {
    if (error.code === "no_collections") {
      return "failed_to_parse_schedule";
    }
    if (error.code === "session_failed") {
      return "address_setup_failed";
    }
  }
  return "scrape_failed";
}

/** Aborts when the client disconnects before the response is written. */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("client disconnected"));
    }
  });
  return controller.signal;
}

type LookupHandler = (
  now: Date,
  events: readonly CollectionEvent[],
  res: Response
) => void;

export function createApp(deps: ServerDependencies): Express {
  const { service, calendar, timezone } = deps;
  const clock = deps.now ?? (() => new Date());
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info("Request", {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
    next();
  });

  const lookup =
    (handler: LookupHandler) =>
    async (req: Request, res: Response): Promise<void> => {
      let now: Date;
      try {
        now = resolveNow(req.query.now, clock);
      } catch (error) {
        logger.warn(`Rejected now override: ${errorMessage(error)}`);
        res.status(400).json({ error: "invalid_now" });
        return;
      }

      let events: readonly CollectionEvent[];
      try {
        events = await service.getCollections(requestSignal(res));
      } catch (error) {
        logger.error(`Collections unavailable: ${errorMessage(error)}`, error);
        res.status(503).json({ error: "unavailable" });
        return;
      }

      handler(now, events, res);
    };

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.get("/calendar.ics", async (_req: Request, res: Response) => {
    let events: readonly CollectionEvent[];
    try {
      events = await service.getCollections(requestSignal(res));
    } catch (error) {
      logger.error(`Scrape failed: ${errorMessage(error)}`, error);
      res.status(502).json({ error: scrapeErrorDetail(error) });
      return;
    }

    let payload: string;
    try {
      payload = calendar.build(events);
    } catch (error) {
      logger.error(`Calendar build failed: ${errorMessage(error)}`, error);
      res.status(500).json({ error: "calendar_failed" });
      return;
    }

    res
      .status(200)
      .set("Content-Type", "text/calendar; charset=utf-8")
      .set("Cache-Control", CACHE_CONTROL_ICS)
      .send(payload);
  });

  app.get(
    "/api/next",
    lookup((now, events, res) => {
      const day = nextDay(now, events, timezone);
      if (!day) {
        res.status(404).json({ error: "no_upcoming_collections" });
        return;
      }
      res.json({
        date: calendarKey(day.date, timezone),
        days: daysBetween(now, day.date, timezone),
        types: day.types,
      });
    })
  );

  app.get(
    "/api/types",
    lookup((now, events, res) => {
      res.json({
        today: today(now, events, timezone),
        tomorrow: tomorrow(now, events, timezone),
      });
    })
  );

  app.get(
    "/api/is-today",
    lookup((now, events, res) => {
      const types = today(now, events, timezone);
      res.json({ today: types.length > 0, types });
    })
  );

  app.get(
    "/api/is-tomorrow",
    lookup((now, events, res) => {
      const types = tomorrow(now, events, timezone);
      res.json({ tomorrow: types.length > 0, types });
    })
  );

  return app;
}
