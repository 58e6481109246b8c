import type { IncomingMessage, ServerResponse } from 'http';
import {
  RateLimitConfigError,
  RateLimitExceededError,
  silentLogger,
  type CounterStore,
} from '@throttlekit/core';
import { InMemoryCounterStore } from '@throttlekit/store-memory';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { RateLimitMiddlewareOptions } from './config.js';
import { createRateLimitMiddleware } from './middleware.js';
import { MockResponse, mockRequest } from './test/mock-http.js';

const clock = () => 1_000;

/** Runs the middleware and settles once it either calls next or responds. */
function run(
  options: RateLimitMiddlewareOptions,
): (req?: IncomingMessage) => Promise<{ res: MockResponse; passed: boolean }> {
  const middleware = createRateLimitMiddleware(options);
  return (req = mockRequest()) => {
    const res = new MockResponse();
    return new Promise((resolve) => {
      void res.whenEnded().then(() => resolve({ res, passed: false }));
      middleware(req, res as unknown as ServerResponse, () =>
        resolve({ res, passed: true }),
      );
    });
  };
}

describe('createRateLimitMiddleware', () => {
  let store: InMemoryCounterStore;

  beforeEach(() => {
    store = new InMemoryCounterStore({ cleanupIntervalMs: 0 });
  });

  afterEach(() => {
    store.destroy();
  });

  it('should pass admitted requests on with rate-limit headers', async () => {
    const handle = run({ limits: '2,1', store, clock, logger: silentLogger });

    const { res, passed } = await handle();

    expect(passed).toBe(true);
    expect(res.headers).toEqual({
      'X-RateLimit-Limit': '2',
      'X-RateLimit-Remaining': '1',
      'X-RateLimit-Reset': '1020',
    });
  });

  it('should answer denied requests with 429 JSON', async () => {
    const handle = run({ limits: '1,1', store, clock, logger: silentLogger });

    await handle();
    const { res, passed } = await handle();

    expect(passed).toBe(false);
    expect(res.statusCode).toBe(429);
    expect(res.headers).toMatchObject({
      'X-RateLimit-Limit': '1',
      'X-RateLimit-Remaining': '0',
      'X-RateLimit-Reset': '1020',
      'Retry-After': '20',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(res.body ?? '')).toEqual({
      error:
        'Rate limit exceeded for ip. Limit: 1 requests per 60 seconds. Try again in 20 seconds.',
      retryAfter: 20,
    });
  });

  it('should hand denials to onRejected when given', async () => {
    const onRejected = vi.fn(
      (_req: IncomingMessage, res: ServerResponse, error: RateLimitExceededError) => {
        res.end(error.code);
      },
    );
    const handle = run({
      limits: '1,1',
      store,
      clock,
      logger: silentLogger,
      onRejected,
    });

    await handle();
    const { res } = await handle();

    expect(res.body).toBe('RATE_LIMIT_EXCEEDED');
    expect(res.statusCode).toBe(200);
    const error = onRejected.mock.calls[0]?.[2];
    expect(error).toBeInstanceOf(RateLimitExceededError);
    expect(error?.identifierKind).toBe('ip');
    expect(error?.retryAfter).toBe(20);
  });

  it('should use custom header names', async () => {
    const handle = run({
      limits: '5,1',
      store,
      clock,
      logger: silentLogger,
      headers: { limit: 'RateLimit-Limit', remaining: 'RateLimit-Remaining' },
    });

    const { res } = await handle();

    expect(res.headers).toEqual({
      'RateLimit-Limit': '5',
      'RateLimit-Remaining': '4',
      'X-RateLimit-Reset': '1020',
    });
  });

  it('should keep default header names for undefined entries', async () => {
    const handle = run({
      limits: '5,1',
      store,
      clock,
      logger: silentLogger,
      headers: { limit: undefined, reset: 'RateLimit-Reset' },
    });

    const { res } = await handle();

    expect(res.headers).toEqual({
      'X-RateLimit-Limit': '5',
      'X-RateLimit-Remaining': '4',
      'RateLimit-Reset': '1020',
    });
  });

  it('should do nothing when disabled', async () => {
    const increment = vi.spyOn(store, 'increment');
    const handle = run({ limits: '1,1', store, enabled: false });

    await handle();
    const { passed, res } = await handle();

    expect(passed).toBe(true);
    expect(res.headers).toEqual({});
    expect(increment).not.toHaveBeenCalled();
  });

  it('should count users separately through getUserId', async () => {
    const handle = run({
      limits: { limit: 1, windowSeconds: 60, identifier: 'user' },
      store,
      clock,
      logger: silentLogger,
      getUserId: (req) => req.headers['x-user']?.toString(),
    });
    const as = (user: string) => mockRequest({ headers: { 'x-user': user } });

    expect((await handle(as('alice'))).passed).toBe(true);
    expect((await handle(as('bob'))).passed).toBe(true);
    expect((await handle(as('alice'))).passed).toBe(false);
  });

  it('should fall back to the session cookie for anonymous users', async () => {
    const handle = run({
      limits: '1,1,fixed,user',
      store,
      clock,
      logger: silentLogger,
    });
    const session = (remoteAddress: string) =>
      mockRequest({ headers: { cookie: 'sessionid=s-1' }, remoteAddress });

    expect((await handle(session('198.51.100.7'))).passed).toBe(true);
    expect((await handle(session('198.51.100.8'))).passed).toBe(false);
  });

  it('should admit requests when the store is down', async () => {
    const broken: CounterStore = {
      get: () => Promise.reject(new Error('connection refused')),
      put: () => Promise.reject(new Error('connection refused')),
      delete: () => Promise.reject(new Error('connection refused')),
    };
    const handle = run({ limits: '3,1', store: broken, clock, logger: silentLogger });

    const { res, passed } = await handle();

    expect(passed).toBe(true);
    expect(res.headers['X-RateLimit-Remaining']).toBe('2');
    expect(res.headers['X-RateLimit-Reset']).toBe('1060');
  });

  it('should pass the request through when the check itself fails', async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const handle = run({
      limits: '1,1,fixed,user',
      store,
      clock,
      logger,
      getUserId: () => {
        throw new Error('session store offline');
      },
    });

    const { passed } = await handle();

    expect(passed).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      'middleware',
      'Rate limit check failed, passing request through',
      { error: { name: 'Error', message: 'session store offline' } },
    );
  });

  it('should answer 500 when the rejection handler throws', async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const handle = run({
      limits: '1,1',
      store,
      clock,
      logger,
      onRejected: () => {
        throw new Error('template missing');
      },
    });

    await handle();
    const { res } = await handle();

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('{"error":"Internal server error"}');
    expect(logger.error).toHaveBeenCalledWith(
      'middleware',
      'Request handler failed',
      { error: { name: 'Error', message: 'template missing' } },
    );
  });

  it('should reject invalid options at construction', () => {
    expect(() =>
      createRateLimitMiddleware({
        limits: '1,1',
        store: {} as unknown as CounterStore,
      }),
    ).toThrow(
      'Invalid middleware configuration: store: store must implement get, put and delete',
    );
  });

  it('should surface limit grammar errors at construction', () => {
    expect(() => createRateLimitMiddleware({ limits: '1', store })).toThrow(
      RateLimitConfigError,
    );
  });
});
