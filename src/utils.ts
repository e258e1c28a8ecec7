import type { Category, MetricKey } from './types.js';

export const CONTENT_CATEGORIES: readonly Category[] = ['sports', 'entertainment', 'business', 'education'];

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Minute-granularity reporting window in local time, month and day unpadded: "2024-1-5 09:07"
 */
export const timeWindow = (at: Date): string => {
  return `${at.getFullYear()}-${at.getMonth() + 1}-${at.getDate()} ${pad2(at.getHours())}:${pad2(at.getMinutes())}`;
}

export const metricKey = (category: Category, at: Date): MetricKey => {
  return `${category}:${timeWindow(at)}`;
}

export const pickCategory = (random: () => number): Category => {
  const index = Math.min(Math.floor(random() * CONTENT_CATEGORIES.length), CONTENT_CATEGORIES.length - 1);
  const category = CONTENT_CATEGORIES[index];
  if (!category) {
    throw new Error(`No content category at index ${index}`);
  }
  return category;
}

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
}

// defaults
export const DEFAULT_BUCKET_CAPACITY = 5; // burst of 5 requests
export const DEFAULT_REFILL_PER_SEC = 1; // sustained 1 request/second per client
export const DEFAULT_SWEEP_INTERVAL_MS = 5_000;
export const DEFAULT_STALE_AFTER_MS = 5 * 60 * 1000;
export const DEFAULT_FLUSH_INTERVAL_MS = 5_000;
