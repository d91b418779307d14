import { RequestHandler } from 'express';
import { randomUUID } from 'crypto';
import { getLogger, runWithRequestContext } from '../../../utils/logger.js';

const logger = getLogger('HTTP');

function clientIp(forwardedFor: string | undefined, realIp: string | undefined, fallback: string | undefined): string {
  if (forwardedFor) {
    return forwardedFor.split(',')[0].trim();
  }
  return realIp ?? fallback ?? 'unknown';
}

/**
 * Attach a correlation id to the request, echo it back as X-Request-ID and
 * log the start and end of every request.
 */
export function requestLogging(): RequestHandler {
  return (req, res, next) => {
    const requestId = req.get('x-request-id') || randomUUID();
    const userId = req.get('x-user-id') || undefined;
    const startedAt = Date.now();

    res.setHeader('X-Request-ID', requestId);
    res.locals.requestId = requestId;

    runWithRequestContext({ requestId, userId }, () => {
      logger.info('request_started', {
        requestId,
        method: req.method,
        path: req.path,
        userAgent: req.get('user-agent'),
        clientIp: clientIp(req.get('x-forwarded-for'), req.get('x-real-ip'), req.ip),
        contentLength: req.get('content-length'),
      });

      res.on('finish', () => {
        const failed = res.statusCode >= 500;
        logger.log(failed ? 'error' : 'info', failed ? 'request_failed' : 'request_completed', {
          requestId,
          method: req.method,
          path: req.originalUrl.split('?')[0],
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
          contentLength: res.get('content-length'),
        });
      });

      next();
    });
  };
}
