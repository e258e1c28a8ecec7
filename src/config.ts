import { z } from 'zod';
import {
  DEFAULT_BUCKET_CAPACITY,
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_REFILL_PER_SEC,
  DEFAULT_STALE_AFTER_MS,
  DEFAULT_SWEEP_INTERVAL_MS,
} from './utils.js';
import type { LogLevel } from './logger.js';
import type { FailurePolicy } from './types.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RATE_LIMIT_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_BUCKET_CAPACITY),
  RATE_LIMIT_REFILL_PER_SEC: z.coerce.number().positive().default(DEFAULT_REFILL_PER_SEC),
  VISITOR_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_SWEEP_INTERVAL_MS),
  VISITOR_STALE_AFTER_MS: z.coerce.number().int().positive().default(DEFAULT_STALE_AFTER_MS),
  COUNTER_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_FLUSH_INTERVAL_MS),
  SWEEPER_FAILURE_POLICY: z.enum(['continue', 'stop']).default('continue'),
  TRUST_PROXY: booleanFlag,
  SIMULATED_LATENCY_MS: z.coerce.number().int().min(0).default(50),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Config = {
  port: number;
  rateLimit: {
    capacity: number;
    refillPerSec: number;
  };
  visitors: {
    sweepIntervalMs: number;
    staleAfterMs: number;
  };
  counters: {
    flushIntervalMs: number;
  };
  failurePolicy: FailurePolicy;
  trustProxy: boolean;
  simulatedLatencyMs: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the service configuration from environment variables.
 * Unset variables take their defaults; empty strings count as unset.
 * @throws ConfigError listing every invalid variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const raw = Object.fromEntries(
    Object.keys(ConfigSchema.shape).map((name) => [name, env[name] === '' ? undefined : env[name]]),
  );
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    rateLimit: {
      capacity: vars.RATE_LIMIT_CAPACITY,
      refillPerSec: vars.RATE_LIMIT_REFILL_PER_SEC,
    },
    visitors: {
      sweepIntervalMs: vars.VISITOR_SWEEP_INTERVAL_MS,
      staleAfterMs: vars.VISITOR_STALE_AFTER_MS,
    },
    counters: {
      flushIntervalMs: vars.COUNTER_FLUSH_INTERVAL_MS,
    },
    failurePolicy: vars.SWEEPER_FAILURE_POLICY,
    trustProxy: vars.TRUST_PROXY,
    simulatedLatencyMs: vars.SIMULATED_LATENCY_MS,
    logLevel: vars.LOG_LEVEL,
  };
}
