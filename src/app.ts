import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import { ConnectionError, ValidationError } from './errors';
import { type Logger, logger as defaultLogger } from './logger';
import { createUrlRoutes } from './routes/url.routes';
import type { UrlShortener } from './services/url.service';

export interface AppOptions {
  requestTimeoutMs: number;
  logger?: Logger;
}

export function createApp(shortener: UrlShortener, options: AppOptions): Application {
  const app: Application = express();
  const logger = options.logger ?? defaultLogger;

  app.disable('x-powered-by');

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = performance.now();
    res.on('finish', () => {
      logger.request(req.method, req.originalUrl, res.statusCode, performance.now() - start);
    });
    next();
  });

  // URL shortener routes
  app.use('/', createUrlRoutes(shortener, { requestTimeoutMs: options.requestTimeoutMs }));

  // Error handler: map error kinds to statuses, never leak internals
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(error.status).type('text/plain').send(`${error.message}\n`);
      return;
    }
    if (error instanceof ConnectionError) {
      logger.error('Storage unavailable:', error);
      res.status(503).type('text/plain').send('Storage unavailable\n');
      return;
    }
    logger.error('Request failed:', error);
    res.status(500).type('text/plain').send('Internal server error\n');
  });

  return app;
}
