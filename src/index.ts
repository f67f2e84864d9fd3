import { createApp } from './app';
import { config } from './config';
import { describeError } from './errors';
import { logger } from './logger';
import { UrlShortener } from './services/url.service';
import { createStorage } from './storage';

async function main(): Promise<void> {
  // Connect storage first: an unreachable backend aborts startup
  logger.info(`Using ${config.storage.backend} storage`);
  const storage = await createStorage(config.storage, {
    signal: AbortSignal.timeout(config.storage.redis.connectTimeoutMs + config.storage.redis.commandTimeoutMs),
  });

  const shortener = new UrlShortener(config.host, storage);
  const app = createApp(shortener, { requestTimeoutMs: config.requestTimeoutMs });

  const server = app.listen(config.port, () => {
    logger.info(`URL Shortener serving on :${config.port}`);
    logger.info(`Base URL for short links: ${config.host}`);
    logger.info('Endpoints:');
    logger.info('  GET    /        - Usage');
    logger.info('  GET    /:id     - Redirect to original URL');
    logger.info('  POST   /        - Create short URL (URL in body)');
  });

  // Graceful shutdown
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);

    server.close((serverError?: Error) => {
      if (serverError) {
        logger.error('Error closing HTTP server:', serverError);
      }
      storage.close().then(
        () => process.exit(serverError ? 1 : 0),
        (error: unknown) => {
          logger.error(`Error closing storage: ${describeError(error)}`);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
