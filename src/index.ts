import { logger } from './observability/logger';

async function main(): Promise<void> {
  // Loaded here so a missing required variable is logged instead of crashing on import
  const { env } = await import('./config/env');
  const { buildApp } = await import('./app');
  const { enableDefaultMetrics } = await import('./observability/metrics');

  if (env.observability.enableMetrics) enableDefaultMetrics();

  const { app, redis } = await buildApp();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.port, host: '0.0.0.0' });
  logger.info({ port: env.port, env: env.nodeEnv, catalog: env.retail.catalogId }, 'Storefront started');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
