import express, { type NextFunction, type Request, type Response, Router } from 'express';
import { ValidationError } from '../errors';
import type { UrlShortener } from '../services/url.service';
import type { StorageOptions } from '../types';

const USAGE = [
  'URL Shortener Service',
  'Usage:',
  '  GET  /<short-id> - Redirect to original URL',
  '  POST /           - Create short URL (send URL in body)',
  '',
].join('\n');

// Printable ASCII goes into a header unchanged
const HEADER_SAFE = /^[\t\x20-\x7e]*$/;

export interface UrlRoutesOptions {
  requestTimeoutMs: number;
}

// Any path; no capture group, so Express leaves the path undecoded
const ANY_PATH = /^\/.*$/;

// Largest POST body read as a URL
export const MAX_BODY_BYTES = 1024 * 1024;

function requestOptions(timeoutMs: number): StorageOptions {
  return { signal: AbortSignal.timeout(timeoutMs) };
}

// Percent-decoded path without the leading slash; null when malformed
function decodeShortId(path: string): string | null {
  try {
    return decodeURIComponent(path.slice(1));
  } catch {
    return null;
  }
}

export function createUrlRoutes(shortener: UrlShortener, options: UrlRoutesOptions): Router {
  const router = Router();

  // Read every body as raw bytes, whatever its Content-Type or charset
  const parseRaw = express.raw({ type: () => true, limit: MAX_BODY_BYTES });
  const rawBody = (req: Request, res: Response, next: NextFunction) => {
    parseRaw(req, res, (error?: unknown) => {
      next(error === undefined ? undefined : new ValidationError('Failed to read request body'));
    });
  };

  /**
   * HEAD - Not part of the protocol
   */
  router.head(ANY_PATH, (_req: Request, _res: Response, next: NextFunction) => {
    next(new ValidationError('Method not allowed', 405));
  });

  /**
   * GET / - Usage banner
   */
  router.get('/', (_req: Request, res: Response) => {
    res.status(200).type('text/plain').send(USAGE);
  });

  /**
   * POST / - Shorten the URL sent as the request body
   */
  router.post('/', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const url = Buffer.isBuffer(body) ? body.toString('utf8').trim() : '';
      if (url === '') {
        throw new ValidationError('URL cannot be empty');
      }

      const shortUrl = await shortener.getShortUrl(url, requestOptions(options.requestTimeoutMs));
      res.status(200).type('text/plain').send(shortUrl);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /:id - Redirect to the stored URL
   */
  router.get(ANY_PATH, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const shortId = decodeShortId(req.path);
      if (shortId === null) {
        res.status(404).type('text/plain').send('404 page not found\n');
        return;
      }

      const { url, found } = await shortener.resolve(shortId, requestOptions(options.requestTimeoutMs));

      if (!found) {
        res.status(404).type('text/plain').send('404 page not found\n');
        return;
      }

      // Location carries the stored URL byte for byte when it is plain ASCII
      if (HEADER_SAFE.test(url)) {
        res.setHeader('Location', url);
      } else {
        res.location(url);
      }
      res.status(301).type('text/plain').send('Moved Permanently\n');
    } catch (error) {
      next(error);
    }
  });

  router.post(ANY_PATH, (_req: Request, _res: Response, next: NextFunction) => {
    next(new ValidationError('POST only allowed at root path'));
  });

  router.all(ANY_PATH, (_req: Request, _res: Response, next: NextFunction) => {
    next(new ValidationError('Method not allowed', 405));
  });

  return router;
}
