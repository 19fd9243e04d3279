import cron, { type ScheduledTask } from "node-cron";
import { loadConfig } from "./config";
import { createScraper } from "./scraper";
import { CalendarBuilder } from "./calendarBuilder";
import { CollectionCache } from "./collectionCache";
import { CollectionService } from "./collectionService";
import { createApp } from "./server";
import { errorMessage } from "./errors";
import { logger, setLogLevel } from "./logger";

const config = loadConfig();
setLogLevel(config.logLevel);

const cache = new CollectionCache();
const service = new CollectionService(createScraper(config), cache, {
  cacheTtlMs: config.cacheTtlMs,
});

const calendar = new CalendarBuilder({
  name: config.calendarName,
  description: config.calendarDescription,
  timezone: config.timezone,
  startHour: config.startHour,
});

async function refreshCollections(): Promise<void> {
  try {
    const events = await service.refresh();
    logger.info(`Background refresh stored ${events.length} collections`);
  } catch (error) {
    // Whatever is already cached keeps being served.
    const kept = cache.peek();
    logger.error(`Background refresh failed: ${errorMessage(error)}`, error, {
      keptItems: kept?.events.length ?? 0,
      keptFetchedAt: kept?.fetchedAt.toISOString(),
    });
  }
}

function bootstrap(): void {
  const app = createApp({ service, calendar, timezone: config.timezone });
  const server = app.listen(config.listenPort, () => {
    logger.info(`Listening on port ${config.listenPort}`);
  });

  let schedule: ScheduledTask | null = null;
  if (config.refreshCron) {
    schedule = cron.schedule(config.refreshCron, () => void refreshCollections(), {
      timezone: config.timezone,
    });
    logger.info(`Refresh scheduler ready with pattern "${config.refreshCron}"`);
  }

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down...`);
    schedule?.stop();
    service.close();
    server.close((error) => {
      if (error) {
        logger.error(`Graceful shutdown failed: ${error.message}`, error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap();
