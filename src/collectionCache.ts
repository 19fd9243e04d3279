import type { CacheEntry, CollectionEvent } from "./types";

function freeze<T extends object>(value: T): T {
  Object.freeze(value);
  return value;
}

function freezeEvent(event: CollectionEvent): CollectionEvent {
  return freeze({
    date: new Date(event.date.getTime()),
    type: event.type,
    instructions: freeze(
      event.instructions.map((instruction) =>
        freeze({ text: instruction.text, links: freeze([...instruction.links]) })
      )
    ),
    note: event.note,
  });
}

/** Frozen freshly dated copy; Object.freeze leaves a Date's time settable. */
function snapshot(entry: CacheEntry): CacheEntry {
  return freeze({
    events: freeze(entry.events.map(freezeEvent)),
    fetchedAt: new Date(entry.fetchedAt.getTime()),
  });
}

/**
 * Single-slot store for the latest scrape. Entries are frozen and replaced
 * whole. Every read hands out its own dates, so no reader can shift a
 * collection for the next one.
 */
export class CollectionCache {
  private entry: CacheEntry | null = null;
  private currentGeneration = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Bumped on every write; identifies which cache contents a scrape was started against. */
  get generation(): number {
    return this.currentGeneration;
  }

  get(ttlMs: number): readonly CollectionEvent[] | null {
    const entry = this.entry;
    if (ttlMs <= 0 || !entry) {
      return null;
    }
    if (this.now().getTime() - entry.fetchedAt.getTime() > ttlMs) {
      return null;
    }
    return snapshot(entry).events;
  }

  /** Latest entry regardless of age. */
  peek(): CacheEntry | null {
    return this.entry ? snapshot(this.entry) : null;
  }

  set(events: readonly CollectionEvent[]): CacheEntry {
    this.entry = freeze({
      events: freeze(events.map(freezeEvent)),
      fetchedAt: this.now(),
    });
    this.currentGeneration++;
    return snapshot(this.entry);
  }
}
