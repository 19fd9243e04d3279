import { loadConfig } from "./config";
import { createScraper } from "./scraper";
import { daysBetween, nextDay, today, tomorrow } from "./dayResolver";
import { calendarKey } from "./timeZone";
import { errorMessage } from "./errors";
import { logger, setLogLevel } from "./logger";

async function checkSchedule(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info(`Scraping schedule for UPRN ${config.address.uprn}...`);

  const events = await createScraper(config).fetchCollections(
    AbortSignal.timeout(config.requestTimeoutMs * 3)
  );
  const now = new Date();

  logger.info(`\n=== Collections (${events.length}) ===`);
  events.forEach((event, index) => {
    logger.info(`  ${index + 1}. ${calendarKey(event.date, config.timezone)} ${event.type}`);
  });

  const next = nextDay(now, events, config.timezone);
  const summary = {
    today: today(now, events, config.timezone),
    tomorrow: tomorrow(now, events, config.timezone),
    next: next
      ? {
          date: calendarKey(next.date, config.timezone),
          days: daysBetween(now, next.date, config.timezone),
          types: next.types,
        }
      : null,
  };

  logger.info("\n=== Lookups ===");
  console.log(JSON.stringify(summary, null, 2));
}

checkSchedule()
  .then(() => {
    logger.info("Check completed");
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error(`Check failed: ${errorMessage(error)}`, error);
    process.exit(1);
  });
