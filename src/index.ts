import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, redis } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({ port: env.port, env: env.nodeEnv }, 'Store assistant started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
