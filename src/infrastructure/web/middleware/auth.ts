import { RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { getLogger } from '../../../utils/logger.js';

const logger = getLogger('Auth');

// Everything after the scheme is the token, inner spaces included
const BEARER_PATTERN = /^Bearer\s+(.+?)\s*$/i;

function safeCompare(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `Authorization: Bearer <apiKey>`
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req, res, next) => {
    const match = BEARER_PATTERN.exec(req.get('authorization') ?? '');

    if (!match) {
      logger.warn('auth_missing_credentials', { path: req.path });
      res.status(401).set('WWW-Authenticate', 'Bearer').json({ detail: 'Not authenticated' });
      return;
    }

    if (!safeCompare(match[1], apiKey)) {
      logger.warn('auth_invalid_api_key', { path: req.path });
      res.status(401).set('WWW-Authenticate', 'Bearer').json({ detail: 'Invalid API key' });
      return;
    }

    next();
  };
}
