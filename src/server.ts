import http from 'http';
import env from './config/env';
import { buildExpressApp } from './app';
import { connectDB, disconnectDB } from './config/db';
import { createAppDeps } from './deps';
import { closeRedis, getRedis } from './redis/client';
import logger from './middleware/requestLogger';

/**
 * Local / VPS entrypoint.
 * Creates the HTTP server and handles graceful shutdown.
 */
async function bootstrap() {
  if (!env.JWT_ACCESS_SECRET || !env.JWT_REFRESH_SECRET) {
    throw new Error('JWT_ACCESS_SECRET and JWT_REFRESH_SECRET must be set in production');
  }

  await connectDB();
  logger.info('Mongo connected');

  const deps = createAppDeps(getRedis());
  const app = buildExpressApp(deps);
  const server = http.createServer(app);

  server.listen(env.PORT, () => {
    logger.info(`HTTP server running at http://localhost:${env.PORT}`);
  });

  const closeAll = async () => {
    await deps.credentials.settled();
    await closeRedis();
    await disconnectDB();
  };

  const shutdown = (signal: string) => {
    logger.info(`${signal} received: closing server, redis, and DB...`);
    server.close(() => {
      closeAll()
        .then(() => {
          logger.info('Clean shutdown complete.');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.warn('Forcing shutdown...');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
