import Fastify from 'fastify';
import type { HealthStatus } from './health-status.js';
import { healthRoutes } from './routes/health.js';
import { resolveLogLevel } from '../utils/logger.js';

export async function createServer(health: HealthStatus) {
  const app = Fastify({
    disableRequestLogging: true,
    logger: {
      level: resolveLogLevel(process.env.LOG_LEVEL),
      ...(process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
        ? {}
        : { transport: { target: 'pino-pretty', options: { colorize: true } } }),
    },
  });

  await app.register(healthRoutes, { health });

  return app;
}
