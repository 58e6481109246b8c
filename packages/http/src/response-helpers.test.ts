import type { ServerResponse } from 'http';
import { RateLimitExceededError } from '@throttlekit/core';
import { describe, it, expect } from 'vitest';
import { sendJson, sendTooManyRequests } from './response-helpers.js';
import { MockResponse } from './test/mock-http.js';

describe('sendJson', () => {
  it('should write a JSON body with length and no-store', () => {
    const res = new MockResponse();

    sendJson(res as unknown as ServerResponse, { ok: true });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('{"ok":true}');
    expect(res.headers).toEqual({
      'Content-Type': 'application/json',
      'Content-Length': 11,
      'Cache-Control': 'no-store',
    });
  });

  it('should merge extra headers', () => {
    const res = new MockResponse();

    sendJson(res as unknown as ServerResponse, {}, 202, { 'X-Trace': 't-1' });

    expect(res.statusCode).toBe(202);
    expect(res.headers['X-Trace']).toBe('t-1');
  });
});

describe('sendTooManyRequests', () => {
  it('should answer 429 with the error headers', () => {
    const res = new MockResponse();
    const error = new RateLimitExceededError({
      limit: 5,
      windowSeconds: 60,
      retryAfter: 12,
      resetTime: 1_020,
      identifierKind: 'user',
      headers: { 'Retry-After': '12' },
    });

    sendTooManyRequests(res as unknown as ServerResponse, error);

    expect(res.statusCode).toBe(429);
    expect(res.headers['Retry-After']).toBe('12');
    expect(JSON.parse(res.body ?? '')).toEqual({
      error:
        'Rate limit exceeded for user. Limit: 5 requests per 60 seconds. Try again in 12 seconds.',
      retryAfter: 12,
    });
  });
});
