import { requireApiKey } from '../src/infrastructure/web/middleware/auth.js';
import { errorHandler, notFoundHandler } from '../src/infrastructure/web/middleware/errorHandler.js';
import { requestLogging } from '../src/infrastructure/web/middleware/requestLogging.js';
import { createRateLimiters, parseRateLimit } from '../src/infrastructure/web/middleware/rateLimiter.js';
import { ValidationError } from '../src/presentation/http/ValidationError.js';
import {
  MessageNotResumableError,
  SessionNotFoundError,
} from '../src/core/errors/DomainError.js';
import { DEFAULT_RATE_LIMITS } from '../src/config.js';
import { RequestContext, getRequestContext } from '../src/utils/logger.js';
import { MockResponse, mockNext, mockRequest } from './helpers/http.js';

const API_KEY = 'test-secret-key';
const SESSION_ID = '11111111-1111-4111-8111-111111111111';

describe('requireApiKey', () => {
  const guard = requireApiKey(API_KEY);

  test('should pass a matching bearer token through', () => {
    const res = new MockResponse();
    const next = mockNext();

    guard(mockRequest({ headers: { Authorization: `Bearer ${API_KEY}` } }), res.asResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.body).toBeUndefined();
  });

  test('should answer 401 when the header is missing', () => {
    const res = new MockResponse();
    const next = mockNext();

    guard(mockRequest(), res.asResponse(), next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ detail: 'Not authenticated' });
    expect(res.get('WWW-Authenticate')).toBe('Bearer');
  });

  test('should answer 401 for a wrong key', () => {
    const res = new MockResponse();
    const next = mockNext();

    guard(mockRequest({ headers: { Authorization: 'Bearer wrong-secret-key' } }), res.asResponse(), next);

    expect(next).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ detail: 'Invalid API key' });
  });

  test('should accept a key that contains spaces', () => {
    const spaced = requireApiKey('test secret key');
    const res = new MockResponse();
    const next = mockNext();

    spaced(mockRequest({ headers: { Authorization: 'Bearer test secret key' } }), res.asResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.body).toBeUndefined();
  });

  test('should not accept a prefix of a key that contains spaces', () => {
    const spaced = requireApiKey('test secret key');
    const res = new MockResponse();

    spaced(mockRequest({ headers: { Authorization: 'Bearer test' } }), res.asResponse(), mockNext());

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({ detail: 'Invalid API key' });
  });

  test('should treat a non-bearer scheme as missing credentials', () => {
    const res = new MockResponse();

    guard(mockRequest({ headers: { Authorization: `Basic ${API_KEY}` } }), res.asResponse(), mockNext());

    expect(res.body).toEqual({ detail: 'Not authenticated' });
  });
});

describe('requestLogging', () => {
  test('should reuse an incoming request id and expose it to the handler', () => {
    const res = new MockResponse();
    let seen: RequestContext | undefined;
    const next = jest.fn(() => {
      seen = getRequestContext();
    });

    requestLogging()(
      mockRequest({ headers: { 'X-Request-ID': 'req-123', 'X-User-ID': 'user-9' } }),
      res.asResponse(),
      next
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(seen).toEqual({ requestId: 'req-123', userId: 'user-9' });
    expect(res.get('X-Request-ID')).toBe('req-123');
    expect(res.locals.requestId).toBe('req-123');
  });

  test('should generate a request id when none is sent', () => {
    const res = new MockResponse();

    requestLogging()(mockRequest(), res.asResponse(), mockNext());
    res.emit('finish');

    expect(res.get('X-Request-ID')).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('errorHandler', () => {
  const handle = (error: unknown) => {
    const res = new MockResponse();
    res.locals.requestId = 'req-1';
    errorHandler(error, mockRequest(), res.asResponse(), mockNext());
    return res;
  };

  test('should map validation errors to 400 with field details', () => {
    const res = handle(
      new ValidationError([{ location: 'body', field: 'name', message: 'Name is required for update' }])
    );

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      detail: 'name: Name is required for update',
      errors: [{ location: 'body', field: 'name', message: 'Name is required for update' }],
    });
  });

  test('should map a missing session to 404', () => {
    const res = handle(new SessionNotFoundError(SESSION_ID));

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ detail: `Session ${SESSION_ID} not found` });
  });

  test('should map other domain errors to 400', () => {
    const res = handle(new MessageNotResumableError('m1', 'complete'));

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      detail: 'Latest message is not in a resumable state',
      code: 'message_not_resumable',
    });
  });

  test('should map malformed JSON bodies to 400', () => {
    const parseError = Object.assign(new SyntaxError('Unexpected token'), {
      type: 'entity.parse.failed',
    });

    const res = handle(parseError);

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ detail: 'Malformed JSON body' });
  });

  test('should hide unexpected errors behind a 500 with the request id', () => {
    const res = handle(new Error('disk on fire'));

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ detail: 'Internal server error', request_id: 'req-1' });
  });

  test('should defer to express once headers are sent', () => {
    const res = new MockResponse();
    res.headersSent = true;
    const next = mockNext();
    const error = new Error('late');

    errorHandler(error, mockRequest(), res.asResponse(), next);

    expect(next).toHaveBeenCalledWith(error);
  });
});

test('notFoundHandler should answer 404 with the route', () => {
  const res = new MockResponse();

  notFoundHandler(mockRequest({ method: 'GET', path: '/nowhere' }), res.asResponse(), mockNext());

  expect(res.statusCode).toBe(404);
  expect(res.body).toEqual({ detail: 'Route GET /nowhere not found' });
});

describe('rate limiting', () => {
  test.each([
    ['10/minute', { limit: 10, windowMs: 60_000 }],
    ['5 / second', { limit: 5, windowMs: 1_000 }],
    ['100/hour', { limit: 100, windowMs: 3_600_000 }],
    ['2/day', { limit: 2, windowMs: 86_400_000 }],
  ])('parseRateLimit(%s)', (value, expected) => {
    expect(parseRateLimit(value)).toEqual(expected);
  });

  test('parseRateLimit should reject an unknown unit', () => {
    expect(() => parseRateLimit('10/week')).toThrow('Invalid rate limit "10/week"');
  });

  test('should pass every request through when disabled', () => {
    const limiters = createRateLimiters({ enabled: false, limits: DEFAULT_RATE_LIMITS });
    const next = mockNext();

    limiters.resumeMessage(mockRequest(), new MockResponse().asResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  test('should build one limiter per operation when enabled', () => {
    const limiters = createRateLimiters({ enabled: true, limits: DEFAULT_RATE_LIMITS });

    expect(Object.keys(limiters).sort()).toEqual(Object.keys(DEFAULT_RATE_LIMITS).sort());
    expect(limiters.createSession).not.toBe(limiters.listSessions);
  });
});
