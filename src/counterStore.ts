import { logger } from './logger.js';
import { snapshotToJson } from './counters.js';
import type { CounterSnapshot } from './types.js';

/**
 * Destination for drained counter snapshots (Elasticsearch, Redis, ...).
 * A rejected upload counts as a failed flush.
 */
export interface CounterStore {
  upload(snapshot: CounterSnapshot): Promise<void>;
}

// Default store: writes each snapshot to the log
export class LogCounterStore implements CounterStore {
  upload = async (snapshot: CounterSnapshot): Promise<void> => {
    if (snapshot.counters.size === 0) {
      logger.debug('No counters to upload', { drainedAt: snapshot.drainedAt });
      return;
    }
    logger.info('Uploading counters', {
      drainedAt: new Date(snapshot.drainedAt).toISOString(),
      keys: snapshot.counters.size,
      counters: snapshotToJson(snapshot.counters),
    });
  }
}
