import type { CollectionEvent } from "./types";
import type { CollectionSource } from "./scraper";
import type { CollectionCache } from "./collectionCache";
import { errorMessage } from "./errors";
import { logger } from "./logger";

interface Flight {
  generation: number;
  controller: AbortController;
  promise: Promise<readonly CollectionEvent[]>;
  waiters: number;
}

export interface CollectionServiceOptions {
  cacheTtlMs: number;
}

/**
 * Serves collections from the cache, scraping on a miss. Concurrent misses
 * against the same cache generation share one scrape, which is aborted only
 * once every caller waiting on it has gone away.
 */
export class CollectionService {
  private flight: Flight | null = null;

  constructor(
    private readonly source: CollectionSource,
    private readonly cache: CollectionCache,
    private readonly options: CollectionServiceOptions
  ) {}

  async getCollections(signal?: AbortSignal): Promise<readonly CollectionEvent[]> {
    const cached = this.cache.get(this.options.cacheTtlMs);
    if (cached) {
      logger.info("Cache hit", { items: cached.length });
      return cached;
    }

    return this.share(signal);
  }

  /** Scrapes regardless of cache freshness, sharing any scrape already running. */
  async refresh(signal?: AbortSignal): Promise<readonly CollectionEvent[]> {
    return this.share(signal);
  }

  /** Aborts the running scrape, if any; its result never reaches the cache. */
  close(): void {
    this.flight?.controller.abort(new Error("collection service closed"));
  }

  private share(signal?: AbortSignal): Promise<readonly CollectionEvent[]> {
    // A caller that has already gone never starts upstream work.
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    return this.join(this.current() ?? this.launch(), signal);
  }

  private current(): Flight | null {
    return this.flight?.generation === this.cache.generation ? this.flight : null;
  }

  private launch(): Flight {
    const controller = new AbortController();
    const flight: Flight = {
      generation: this.cache.generation,
      controller,
      waiters: 0,
      promise: Promise.resolve([]),
    };

    flight.promise = this.scrape(controller.signal).finally(() => {
      if (this.flight === flight) {
        this.flight = null;
      }
    });
    void flight.promise.catch((error: unknown) => {
      logger.warn(`Scrape failed: ${errorMessage(error)}`);
    });
    this.flight = flight;
    return flight;
  }

  private async scrape(signal: AbortSignal): Promise<readonly CollectionEvent[]> {
    const started = Date.now();
    logger.info("Scrape start");

    const events = await this.source.fetchCollections(signal);
    // The source may finish after an abort it did not observe.
    signal.throwIfAborted();

    const entry = this.cache.set(events);
    logger.info("Scrape complete", { items: entry.events.length, tookMs: Date.now() - started });
    return entry.events;
  }

  private join(flight: Flight, signal?: AbortSignal): Promise<readonly CollectionEvent[]> {
    flight.waiters++;
    if (!signal) {
      return flight.promise;
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        flight.waiters--;
        if (flight.waiters === 0) {
          flight.controller.abort(signal.reason);
          if (this.flight === flight) {
            this.flight = null;
          }
        }
        reject(signal.reason);
      };
      signal.addEventListener("abort", onAbort, { once: true });

      flight.promise.then(
        (events) => {
          signal.removeEventListener("abort", onAbort);
          resolve(events);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }
}
