import type { Request, RequestHandler, Response } from 'express';
import { setTimeout as sleep } from 'node:timers/promises';
import { snapshotToJson } from './counters.js';
import { logger } from './logger.js';
import type { TrafficService } from './service.js';
import type { Clock } from './types.js';
import { errorMessage, metricKey, pickCategory } from './utils.js';

export type ControllerOptions = {
  clock?: Clock;
  random?: () => number;
  simulatedLatencyMs?: number; // upper bound of the fake processing delay in /view
}

const CLICK_PROBABILITY = 0.5;

export class Controllers {
  private clock: Clock;
  private random: () => number;
  private simulatedLatencyMs: number;

  constructor(private service: TrafficService, options: ControllerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.simulatedLatencyMs = options.simulatedLatencyMs ?? 0;
  }

  welcome = (_req: Request, res: Response): void => {
    res.status(200).type('text/plain').send('Welcome to the visit counter service');
  }

  /**
   * Records a view on a random content category for the current minute,
   * then, after a simulated processing delay, a click half of the time
   */
  view = withErrorHandling(async (_req: Request, res: Response): Promise<void> => {
    const key = metricKey(pickCategory(this.random), new Date(this.clock()));
    this.service.counters.recordView(key);

    await this.processRequest();

    const clicked = this.random() < CLICK_PROBABILITY;
    if (clicked) {
      this.service.counters.recordClick(key);
    }

    res.status(200).json({ key, clicked });
  })

  stats = withErrorHandling((_req: Request, res: Response): void => {
    res.status(200).json({ counters: snapshotToJson(this.service.counters.peek()) });
  })

  healthCheck = (_req: Request, res: Response): void => {
    const health = this.service.health();
    res.status(health.ok ? 200 : 503).json(health);
  }

  private async processRequest(): Promise<void> {
    const delayMs = Math.floor(this.random() * this.simulatedLatencyMs);
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}

type ControllerHandler = (req: Request, res: Response) => void | Promise<void>;
const withErrorHandling = (handler: ControllerHandler): RequestHandler => {
  return (req: Request, res: Response): void => {
    void Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        logger.error('Request handler failed', { path: req.path, error: errorMessage(error) });
        if (res.headersSent) return;
        res.status(500).json({
          error: 'Internal server error',
          message: errorMessage(error),
        });
      });
  };
};
