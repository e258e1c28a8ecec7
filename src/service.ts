import type { Config } from './config.js';
import { CounterAggregator } from './counters.js';
import { LogCounterStore, type CounterStore } from './counterStore.js';
import { logger } from './logger.js';
import { PeriodicSweeper } from './sweeper.js';
import type { Clock, ServiceHealth } from './types.js';
import { errorMessage } from './utils.js';
import { VisitorRegistry } from './visitors.js';

export type TrafficServiceConfig = Pick<Config, 'rateLimit' | 'visitors' | 'counters' | 'failurePolicy'>;

export type TrafficServiceDeps = {
  store?: CounterStore;
  clock?: Clock;
}

/**
 * TrafficService owns the per-client rate-limit state and the view/click counters,
 * plus the two background sweepers that keep them bounded:
 * - visitor-sweep evicts visitors idle for longer than visitors.staleAfterMs
 * - counter-flush drains the counters and uploads the snapshot to the store
 */
export class TrafficService {
  readonly visitors: VisitorRegistry;
  readonly counters: CounterAggregator;
  private readonly store: CounterStore;
  private readonly visitorSweeper: PeriodicSweeper;
  private readonly counterFlusher: PeriodicSweeper;

  constructor(private config: TrafficServiceConfig, deps: TrafficServiceDeps = {}) {
    const clock = deps.clock ?? Date.now;
    this.store = deps.store ?? new LogCounterStore();
    this.visitors = new VisitorRegistry(config.rateLimit, clock);
    this.counters = new CounterAggregator(clock);

    this.visitorSweeper = new PeriodicSweeper({
      name: 'visitor-sweep',
      intervalMs: config.visitors.sweepIntervalMs,
      task: this.sweepVisitors,
      failurePolicy: config.failurePolicy,
      clock,
    });
    this.counterFlusher = new PeriodicSweeper({
      name: 'counter-flush',
      intervalMs: config.counters.flushIntervalMs,
      task: this.flushCounters,
      failurePolicy: config.failurePolicy,
      clock,
    });
  }

  start = (): void => {
    this.visitorSweeper.start();
    this.counterFlusher.start();
  }

  /**
   * Stops both sweepers, waits for any run in progress, then flushes the remaining counters once
   */
  stop = async (): Promise<void> => {
    await Promise.all([this.visitorSweeper.stop(), this.counterFlusher.stop()]);
    try {
      await this.flushCounters();
    } catch (error) {
      logger.error('Final counter flush failed', { error: errorMessage(error), pending: this.counters.size });
    }
  }

  sweepVisitors = (): number => {
    const removed = this.visitors.sweep(this.config.visitors.staleAfterMs);
    if (removed > 0) {
      logger.debug('Evicted stale visitors', { removed, remaining: this.visitors.size });
    }
    return removed;
  }

  /**
   * Drains the counters and uploads the snapshot. The upload runs after the swap,
   * so requests keep counting into the fresh map while it is in progress.
   * @throws the store's error after putting the snapshot's counts back for the next flush
   */
  flushCounters = async (): Promise<void> => {
    const snapshot = this.counters.drain();
    try {
      await this.store.upload(snapshot);
    } catch (error) {
      this.counters.restore(snapshot);
      logger.warn('Counter upload failed, snapshot requeued', {
        error: errorMessage(error),
        keys: snapshot.counters.size,
      });
      throw error;
    }
    logger.debug('Flushed counters', { keys: snapshot.counters.size });
  }

  health = (): ServiceHealth => {
    const sweepers = [this.visitorSweeper.health(), this.counterFlusher.health()];
    return {
      ok: this.visitorSweeper.running && this.counterFlusher.running,
      visitors: this.visitors.size,
      pendingCounters: this.counters.size,
      sweepers,
    };
  }
}
