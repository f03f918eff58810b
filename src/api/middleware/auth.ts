import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from './errorHandler.js';

function presentedKey(req: Request): string | undefined {
  const header = req.get('X-API-Key');
  if (header) {
    return header;
  }
  const authorization = req.get('Authorization');
  return authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : undefined;
}

/**
 * API key validation middleware.
 * The accepted key is exposed to later handlers as `res.locals.apiKey`.
 */
export function validateApiKey(validApiKeys: string[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = presentedKey(req);

    if (!apiKey) {
      throw new UnauthorizedError('API key required. Provide it in X-API-Key header or Authorization header as Bearer token.');
    }

    if (!validApiKeys.includes(apiKey)) {
      throw new UnauthorizedError('Invalid API key');
    }

    res.locals.apiKey = apiKey;
    next();
  };
}
