import { describe, it, expect } from 'vitest';
import { createRateLimitRequest } from './request.js';

describe('createRateLimitRequest', () => {
  it('looks headers up case-insensitively', () => {
    const request = createRateLimitRequest({
      headers: { 'X-Forwarded-For': '8.8.8.8' },
    });
    expect(request.header('x-forwarded-for')).toBe('8.8.8.8');
    expect(request.header('X-FORWARDED-FOR')).toBe('8.8.8.8');
    expect(request.header('X-Real-IP')).toBeUndefined();
  });

  it('joins repeated headers and skips undefined ones', () => {
    const request = createRateLimitRequest({
      headers: { 'X-Forwarded-For': ['8.8.8.8', '1.1.1.1'], 'X-Real-IP': undefined },
    });
    expect(request.header('X-Forwarded-For')).toBe('8.8.8.8, 1.1.1.1');
    expect(request.header('X-Real-IP')).toBeUndefined();
  });

  it('carries identity fields', () => {
    const request = createRateLimitRequest({
      remoteAddress: '127.0.0.1',
      userId: '42',
      sessionId: 'abc',
    });
    expect(request).toMatchObject({
      remoteAddress: '127.0.0.1',
      userId: '42',
      sessionId: 'abc',
    });
  });
});
