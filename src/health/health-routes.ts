import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';

export function registerHealthRoutes(app: FastifyInstance, redis?: Redis): void {
  /** Liveness probe: always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: checks the session store backend */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (redis) {
      const start = Date.now();
      try {
        await redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
