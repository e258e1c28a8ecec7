import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig, type Config } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { TrafficService } from './service.js';
import { errorMessage } from './utils.js';

// Load environment variables
dotenv.config();

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  logger.error('Invalid configuration', { error: errorMessage(error) });
  process.exit(1);
}
setLogLevel(config.logLevel);

const service = new TrafficService(config);
const app = createApp(service, {
  trustProxy: config.trustProxy,
  simulatedLatencyMs: config.simulatedLatencyMs,
});

service.start();
const server = app.listen(config.port, () => {
  logger.info('Server started', {
    port: config.port,
    capacity: config.rateLimit.capacity,
    refillPerSec: config.rateLimit.refillPerSec,
    failurePolicy: config.failurePolicy,
  });
});

const shutdown = (signal: string): void => {
  logger.info('Shutting down', { signal });
  server.close();
  service
    .stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
