import { ErrorRequestHandler, RequestHandler } from 'express';
import { DomainError, SessionNotFoundError } from '../../../core/errors/DomainError.js';
import { ValidationError } from '../../../presentation/http/ValidationError.js';
import { getLogger } from '../../../utils/logger.js';

const logger = getLogger('ErrorHandler');

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/**
 * Fallback for unmatched routes
 */
export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ detail: `Route ${req.method} ${req.path} not found` });
};

/**
 * Map errors to HTTP responses: validation and domain-rule failures are
 * client errors, a missing session is 404, anything else is 500.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json({ detail: err.message, errors: err.issues });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ detail: 'Malformed JSON body' });
    return;
  }

  if (err instanceof SessionNotFoundError) {
    res.status(404).json({ detail: err.message });
    return;
  }

  if (err instanceof DomainError) {
    res.status(400).json({ detail: err.message, code: err.code });
    return;
  }

  logger.error('unhandled_exception', {
    error: err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : String(err),
    method: req.method,
    path: req.path,
  });

  const requestId: unknown = res.locals.requestId;
  res.status(500).json({
    detail: 'Internal server error',
    request_id: typeof requestId === 'string' ? requestId : 'unknown',
  });
};
