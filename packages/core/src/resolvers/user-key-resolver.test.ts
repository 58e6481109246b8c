import { describe, it, expect } from 'vitest';
import { createRateLimitRequest } from '../types/request.js';
import { UserKeyResolver } from './user-key-resolver.js';

describe('UserKeyResolver', () => {
  const resolver = new UserKeyResolver();

  it('prefers the authenticated user', () => {
    const request = createRateLimitRequest({
      remoteAddress: '8.8.8.8',
      userId: '42',
      sessionId: 'abc',
    });
    expect(resolver.resolve(request)).toBe('user:42');
  });

  it('falls back to the session identifier', () => {
    const request = createRateLimitRequest({
      remoteAddress: '8.8.8.8',
      userId: '   ',
      sessionId: 'abc',
    });
    expect(resolver.resolve(request)).toBe('session:abc');
  });

  it('falls back to the client address', () => {
    expect(
      resolver.resolve(createRateLimitRequest({ remoteAddress: '8.8.8.8' })),
    ).toBe('ip:8.8.8.8');
  });

  it('reads identities through an injected lookup', () => {
    const custom = new UserKeyResolver({
      identity: {
        userId: (request) => request.header('X-User'),
        sessionId: () => undefined,
      },
    });
    const request = createRateLimitRequest({ headers: { 'X-User': 'carol' } });
    expect(custom.resolve(request)).toBe('user:carol');
  });
});
