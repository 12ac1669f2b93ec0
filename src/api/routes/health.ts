import type { FastifyPluginAsync } from 'fastify';
import type { HealthStatus } from '../health-status.js';

export interface HealthRoutesOptions {
  health: HealthStatus;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, opts) => {
  app.get('/health', async (_request, reply) => {
    const healthy = opts.health.isHealthy();
    return reply.code(healthy ? 200 : 503).send({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/status', async () => opts.health.report());
};
