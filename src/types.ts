export type Category = 'sports' | 'entertainment' | 'business' | 'education';

// Epoch milliseconds source, injectable so tests can step time
export type Clock = () => number;

// "<category>:<time window>", e.g. "sports:2024-1-5 12:00"
export type MetricKey = string;

export type CounterEntry = {
  views: number;
  clicks: number;
}

export type CounterSnapshot = {
  drainedAt: number; // epoch ms the live map was swapped out
  counters: ReadonlyMap<MetricKey, Readonly<CounterEntry>>;
}

export type FailurePolicy = 'continue' | 'stop';

export type SweeperState = 'running' | 'stopped';

export type SweeperHealth = {
  name: string;
  state: SweeperState;
  runs: number;
  failures: number;
  consecutiveFailures: number;
  lastRunAt: number | null;
  lastError: string | null;
}

export type ServiceHealth = {
  ok: boolean;
  visitors: number;
  pendingCounters: number;
  sweepers: SweeperHealth[];
}
