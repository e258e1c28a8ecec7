import express from 'express';
import { Controllers, type ControllerOptions } from './controllers.js';
import { rateLimit, type ClientKeyResolver } from './middleware.js';
import type { TrafficService } from './service.js';

export type AppOptions = ControllerOptions & {
  trustProxy?: boolean;
  resolveClientKey?: ClientKeyResolver;
}

/**
 * Express app with every route behind the per-client rate limiter,
 * except /healthz so monitors polling from one address always get the health status
 */
export const createApp = (service: TrafficService, options: AppOptions = {}): express.Application => {
  const app = express();
  const controllers = new Controllers(service, options);

  app.set('trust proxy', options.trustProxy ?? false);
  app.get('/healthz', controllers.healthCheck);
  app.use(rateLimit(service.visitors, options.resolveClientKey));

  // Routes
  app.get('/', controllers.welcome);
  app.get('/view', controllers.view);
  app.get('/stats', controllers.stats);

  return app;
}
