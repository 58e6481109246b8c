import { describe, it, expect } from 'vitest';
import { readCookie, toRateLimitRequest } from './request-adapter.js';
import { mockRequest } from './test/mock-http.js';

describe('readCookie', () => {
  it('should find a cookie among several', () => {
    expect(readCookie('theme=dark; sessionid=abc; lang=en', 'sessionid')).toBe(
      'abc',
    );
  });

  it('should decode percent-escapes', () => {
    expect(readCookie('sessionid=abc%20def', 'sessionid')).toBe('abc def');
  });

  it('should keep malformed escapes verbatim', () => {
    expect(readCookie('sessionid=abc%E0%A4%A', 'sessionid')).toBe(
      'abc%E0%A4%A',
    );
  });

  it('should not match on a name prefix', () => {
    expect(readCookie('sessionid_old=stale', 'sessionid')).toBeUndefined();
  });

  it('should return undefined without a cookie header', () => {
    expect(readCookie(undefined, 'sessionid')).toBeUndefined();
  });
});

describe('toRateLimitRequest', () => {
  it('should expose headers case-insensitively', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { 'x-api-key': 'test-secret' } }),
    );

    expect(request.header('X-API-Key')).toBe('test-secret');
    expect(request.remoteAddress).toBe('198.51.100.7');
  });

  it('should join repeated headers', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { 'set-cookie': ['a=1', 'b=2'] } }),
    );

    expect(request.header('set-cookie')).toBe('a=1, b=2');
  });

  it('should read the user id through the lookup', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { 'x-user': 'alice' } }),
      { getUserId: (req) => req.headers['x-user']?.toString() },
    );

    expect(request.userId).toBe('alice');
  });

  it('should read the session id from the default cookie', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { cookie: 'sessionid=s-1' } }),
    );

    expect(request.sessionId).toBe('s-1');
  });

  it('should honour a custom session cookie name', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { cookie: 'sessionid=s-1; sid=s-2' } }),
      { sessionCookie: 'sid' },
    );

    expect(request.sessionId).toBe('s-2');
  });

  it('should treat an empty session cookie as absent', () => {
    const request = toRateLimitRequest(
      mockRequest({ headers: { cookie: 'sessionid=' } }),
    );

    expect(request.sessionId).toBeUndefined();
  });
});
