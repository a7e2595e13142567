import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { getMetrics, getContentType } from '../observability/metrics';
import { DependencyHealthTracker } from '../resilience/dependency-health';

export interface HealthOptions {
  redis?: Redis;
  dependencies: DependencyHealthTracker;
  enableMetrics: boolean;
}

export function registerHealthRoutes(app: FastifyInstance, options: HealthOptions): void {
  /** Liveness probe */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: Redis when configured, plus the outcome of recent service calls */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; lastError?: string }> = {};
    const { redis, dependencies } = options;

    if (redis) {
      const start = Date.now();
      try {
        await redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
        dependencies.recordSuccess('redis');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        checks.redis = { status: 'error', latencyMs: Date.now() - start, lastError: message };
        dependencies.recordFailure('redis', message);
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    for (const [name, health] of Object.entries(dependencies.report())) {
      if (name === 'redis') continue;
      checks[name] = {
        status: health.status === 'down' ? 'error' : health.status === 'degraded' ? 'degraded' : 'ok',
        ...(health.lastError ? { lastError: health.lastError } : {}),
      };
    }

    const ready = checks.redis.status !== 'error';
    return reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (options.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
