import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger.js';

const SKIP_PATHS = ['/health'];

/**
 * Logs each request once its response has been sent.
 * Health checks are not logged.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.some(path => req.url === path || req.url.startsWith(path + '?'))) {
    return next();
  }

  const startTime = Date.now();

  res.on('finish', () => {
    logger.info('API Response', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
    });
  });

  next();
}
