import { describe, it, expect } from 'vitest';
import { RateLimitConfigError } from '../errors/rate-limit-config-error.js';
import { createRateLimitRequest } from '../types/request.js';
import { IpKeyResolver, UNKNOWN_CLIENT_KEY } from './ip-key-resolver.js';

describe('IpKeyResolver', () => {
  const resolver = new IpKeyResolver();

  it('uses the first public X-Forwarded-For entry', () => {
    const request = createRateLimitRequest({
      remoteAddress: '10.0.0.2',
      headers: { 'x-forwarded-for': '8.8.8.8, 10.0.0.1' },
    });
    expect(resolver.resolve(request)).toBe('ip:8.8.8.8');
  });

  it('ignores private forwarded addresses and falls back to the peer', () => {
    const request = createRateLimitRequest({
      remoteAddress: '127.0.0.1',
      headers: { 'X-Forwarded-For': '10.0.0.1' },
    });
    expect(resolver.resolve(request)).toBe('ip:127.0.0.1');
  });

  it('tries X-Real-IP and CF-Connecting-IP in order', () => {
    expect(
      resolver.resolve(
        createRateLimitRequest({
          headers: { 'X-Real-IP': '1.1.1.1', 'CF-Connecting-IP': '9.9.9.9' },
        }),
      ),
    ).toBe('ip:1.1.1.1');
    expect(
      resolver.resolve(
        createRateLimitRequest({
          headers: { 'X-Real-IP': 'garbage', 'CF-Connecting-IP': '9.9.9.9' },
        }),
      ),
    ).toBe('ip:9.9.9.9');
  });

  it('canonicalises IPv6 addresses', () => {
    expect(
      resolver.resolve(
        createRateLimitRequest({
          headers: { 'X-Forwarded-For': '2606:4700:0:0:0:0:0:1111' },
        }),
      ),
    ).toBe('ip:2606:4700::1111');
    expect(
      resolver.resolve(
        createRateLimitRequest({ remoteAddress: '::ffff:192.168.1.5' }),
      ),
    ).toBe('ip:192.168.1.5');
  });

  it('returns the unknown key when nothing validates', () => {
    const request = createRateLimitRequest({
      remoteAddress: 'not-an-address',
      headers: { 'X-Forwarded-For': 'unknown' },
    });
    expect(resolver.resolve(request)).toBe(UNKNOWN_CLIENT_KEY);
    expect(resolver.resolve(createRateLimitRequest())).toBe('unknown');
  });

  it('honours a custom proxy header list', () => {
    const direct = new IpKeyResolver({ proxyHeaders: [] });
    const request = createRateLimitRequest({
      remoteAddress: '10.0.0.2',
      headers: { 'X-Forwarded-For': '8.8.8.8' },
    });
    expect(direct.resolve(request)).toBe('ip:10.0.0.2');
  });

  it('masks addresses to the configured subnet', () => {
    const subnet = new IpKeyResolver({ ipv4SubnetBits: 24, ipv6SubnetBits: 64 });
    expect(
      subnet.resolve(createRateLimitRequest({ remoteAddress: '8.8.8.8' })),
    ).toBe('ip:8.8.8.0');
    expect(
      subnet.resolve(
        createRateLimitRequest({ remoteAddress: '2606:4700:10:20:1:2:3:4' }),
      ),
    ).toBe('ip:2606:4700:10:20::');
  });

  it('rejects out-of-range subnet sizes', () => {
    expect(() => new IpKeyResolver({ ipv4SubnetBits: 33 })).toThrow(
      RateLimitConfigError,
    );
    expect(() => new IpKeyResolver({ ipv6SubnetBits: -1 })).toThrow(
      'ipv6SubnetBits must be an integer between 0 and 128',
    );
  });
});
