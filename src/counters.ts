import type { Clock, CounterEntry, CounterSnapshot, MetricKey } from './types.js';

/**
 * CounterAggregator accumulates view/click counts per metric key for the current flush window.
 * @method recordView: increments the view count, creating the entry if absent
 * @method recordClick: increments the click count, creating the entry if absent
 * @method drain: swaps the live map for an empty one and returns the old one as a snapshot
 * @method restore: adds a snapshot's counts back into the live map (failed upload)
 * @method peek: copy of the live counts without resetting them
 */
export class CounterAggregator {
  private counters: Map<MetricKey, CounterEntry> = new Map();

  constructor(private clock: Clock = Date.now) {}

  recordView = (key: MetricKey): void => {
    this.entry(key).views++;
  }

  // A click may arrive after a drain swapped out the entry its view created
  recordClick = (key: MetricKey): void => {
    this.entry(key).clicks++;
  }

  /**
   * Hands back the accumulated counts and resets the aggregator.
   * The snapshot's map is no longer reachable from the live map and its entries are frozen;
   * the map itself is read-only by type only.
   */
  drain = (): CounterSnapshot => {
    const drained = this.counters;
    this.counters = new Map();
    for (const entry of drained.values()) {
      Object.freeze(entry);
    }
    return { drainedAt: this.clock(), counters: drained };
  }

  restore = (snapshot: CounterSnapshot): void => {
    for (const [key, counts] of snapshot.counters) {
      const entry = this.entry(key);
      entry.views += counts.views;
      entry.clicks += counts.clicks;
    }
  }

  peek = (): Map<MetricKey, CounterEntry> => {
    return new Map(Array.from(this.counters, ([key, entry]) => [key, { ...entry }]));
  }

  get size(): number {
    return this.counters.size;
  }

  private entry(key: MetricKey): CounterEntry {
    let entry = this.counters.get(key);
    if (!entry) {
      entry = { views: 0, clicks: 0 };
      this.counters.set(key, entry);
    }
    return entry;
  }
}

export const snapshotToJson = (counters: ReadonlyMap<MetricKey, Readonly<CounterEntry>>): Record<MetricKey, CounterEntry> => {
  return Object.fromEntries(Array.from(counters, ([key, entry]) => [key, { views: entry.views, clicks: entry.clicks }]));
}
