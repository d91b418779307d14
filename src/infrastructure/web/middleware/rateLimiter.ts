import { RequestHandler } from 'express';
import { rateLimit } from 'express-rate-limit';
import { Config, RATE_LIMIT_PATTERN, RateLimitedOperation } from '../../../config.js';
import { getLogger } from '../../../utils/logger.js';

const logger = getLogger('RateLimiter');

export interface RateLimitWindow {
  limit: number;
  windowMs: number;
}

export type RateLimiters = Record<RateLimitedOperation, RequestHandler>;

/**
 * Parse "N/unit" into a request budget and window length
 */
export function parseRateLimit(value: string): RateLimitWindow {
  const match = RATE_LIMIT_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid rate limit "${value}"`);
  }

  const limit = parseInt(match[1], 10);
  let windowMs: number;
  switch (match[2]) {
    case 'second':
      windowMs = 1000;
      break;
    case 'minute':
      windowMs = 60 * 1000;
      break;
    case 'hour':
      windowMs = 60 * 60 * 1000;
      break;
    default:
      windowMs = 24 * 60 * 60 * 1000;
  }

  return { limit, windowMs };
}

const passthrough: RequestHandler = (_req, _res, next) => next();

function createLimiter(operation: RateLimitedOperation, value: string): RequestHandler {
  const { limit, windowMs } = parseRateLimit(value);

  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn('rate_limit_exceeded', {
        operation,
        limit: value,
        method: req.method,
        path: req.path,
        clientIp: req.ip,
      });
      res.status(429).json({ detail: `Rate limit exceeded: ${value}` });
    },
  });
}

/**
 * One limiter per operation so each endpoint keeps its own budget.
 */
export function createRateLimiters(settings: Config['rateLimit']): RateLimiters {
  if (!settings.enabled) {
    logger.info('rate_limiting_disabled');
    return {
      createSession: passthrough,
      listSessions: passthrough,
      updateSession: passthrough,
      toggleFavorite: passthrough,
      deleteSession: passthrough,
      createMessage: passthrough,
      getMessages: passthrough,
      updateMessage: passthrough,
      deleteMessage: passthrough,
      resumeMessage: passthrough,
    };
  }

  const { limits } = settings;
  return {
    createSession: createLimiter('createSession', limits.createSession),
    listSessions: createLimiter('listSessions', limits.listSessions),
    updateSession: createLimiter('updateSession', limits.updateSession),
    toggleFavorite: createLimiter('toggleFavorite', limits.toggleFavorite),
    deleteSession: createLimiter('deleteSession', limits.deleteSession),
    createMessage: createLimiter('createMessage', limits.createMessage),
    getMessages: createLimiter('getMessages', limits.getMessages),
    updateMessage: createLimiter('updateMessage', limits.updateMessage),
    deleteMessage: createLimiter('deleteMessage', limits.deleteMessage),
    resumeMessage: createLimiter('resumeMessage', limits.resumeMessage),
  };
}
