import { logger } from './logger.js';
import type { Clock, FailurePolicy, SweeperHealth, SweeperState } from './types.js';
import { errorMessage } from './utils.js';

export type SweeperOptions = {
  name: string;
  intervalMs: number;
  task: () => unknown;
  failurePolicy?: FailurePolicy;
  clock?: Clock;
}

/**
 * Runs a task on a fixed interval until stopped.
 *
 * With failurePolicy 'continue' a failed run is logged and the next tick runs as usual.
 * With 'stop' the first failure stops the timer for good; the stopped state shows up in health().
 * A tick that fires while the previous run is still in flight is skipped.
 */
export class PeriodicSweeper {
  readonly name: string;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private state: SweeperState = 'stopped';
  private runs = 0;
  private failures = 0;
  private consecutiveFailures = 0;
  private lastRunAt: number | null = null;
  private lastError: string | null = null;
  private readonly failurePolicy: FailurePolicy;
  private readonly clock: Clock;

  constructor(private options: SweeperOptions) {
    if (!(options.intervalMs > 0)) {
      throw new Error(`Sweeper ${options.name} needs a positive interval, got ${options.intervalMs}`);
    }
    this.name = options.name;
    this.failurePolicy = options.failurePolicy ?? 'continue';
    this.clock = options.clock ?? Date.now;
  }

  start = (): void => {
    if (this.timer) return;
    this.state = 'running';
    this.timer = setInterval(() => {
      if (this.inFlight) {
        logger.debug('Skipping tick, previous run still in progress', { sweeper: this.name });
        return;
      }
      void this.tick();
    }, this.options.intervalMs);
  }

  /**
   * Clears the timer and waits for a run already in progress to finish
   */
  stop = async (): Promise<void> => {
    this.halt();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Runs the task once. Never rejects: failures are recorded and handled per the failure policy.
   */
  tick = (): Promise<void> => {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.run().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  get running(): boolean {
    return this.state === 'running';
  }

  health = (): SweeperHealth => {
    return {
      name: this.name,
      state: this.state,
      runs: this.runs,
      failures: this.failures,
      consecutiveFailures: this.consecutiveFailures,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError,
    };
  }

  private async run(): Promise<void> {
    this.runs++;
    this.lastRunAt = this.clock();
    try {
      await this.options.task();
      this.consecutiveFailures = 0;
    } catch (error) {
      this.failures++;
      this.consecutiveFailures++;
      this.lastError = errorMessage(error);

      if (this.failurePolicy === 'stop') {
        this.halt();
        logger.error('Sweeper failed and has been stopped', { sweeper: this.name, error: this.lastError });
      } else {
        logger.warn('Sweeper run failed', {
          sweeper: this.name,
          error: this.lastError,
          consecutiveFailures: this.consecutiveFailures,
        });
      }
    }
  }

  private halt(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.state = 'stopped';
  }
}
