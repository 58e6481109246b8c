import { RateLimitConfigError } from '../errors/rate-limit-config-error.js';
import type { RateLimitRequest } from '../types/request.js';
import { canonicalizeIp, isPublicIp, maskIp } from './ip-address.js';
import type { KeyResolver } from './key-resolver.js';

export const DEFAULT_PROXY_HEADERS: ReadonlyArray<string> = Object.freeze([
  'X-Forwarded-For',
  'X-Real-IP',
  'CF-Connecting-IP',
]);

/** Key used when no candidate address validates. */
export const UNKNOWN_CLIENT_KEY = 'unknown';

export interface IpKeyResolverOptions {
  /**
   * Headers consulted, in order, before the transport address. Only public
   * addresses are accepted from them.
   */
  proxyHeaders?: ReadonlyArray<string>;
  /** Share one quota per IPv4 prefix of this length (default 32). */
  ipv4SubnetBits?: number;
  /** Share one quota per IPv6 prefix of this length (default 128). */
  ipv6SubnetBits?: number;
}

function assertPrefixLength(bits: number, max: number, field: string): number {
  if (!Number.isInteger(bits) || bits < 0 || bits > max) {
    throw new RateLimitConfigError(
      `Invalid rate limit configuration: ${field} must be an integer between 0 and ${max}`,
    );
  }
  return bits;
}

export class IpKeyResolver implements KeyResolver {
  readonly kind = 'ip';
  private readonly proxyHeaders: ReadonlyArray<string>;
  private readonly ipv4SubnetBits: number;
  private readonly ipv6SubnetBits: number;

  constructor({
    proxyHeaders = DEFAULT_PROXY_HEADERS,
    ipv4SubnetBits = 32,
    ipv6SubnetBits = 128,
  }: IpKeyResolverOptions = {}) {
    this.proxyHeaders = proxyHeaders;
    this.ipv4SubnetBits = assertPrefixLength(ipv4SubnetBits, 32, 'ipv4SubnetBits');
    this.ipv6SubnetBits = assertPrefixLength(ipv6SubnetBits, 128, 'ipv6SubnetBits');
  }

  resolve(request: RateLimitRequest): string {
    const address = this.clientAddress(request);
    if (address === undefined) return UNKNOWN_CLIENT_KEY;
    return `ip:${maskIp(address, this.ipv4SubnetBits, this.ipv6SubnetBits)}`;
  }

  /** Canonical client address before subnet masking. */
  clientAddress(request: RateLimitRequest): string | undefined {
    for (const name of this.proxyHeaders) {
      const value = request.header(name);
      if (!value) continue;
      // X-Forwarded-For lists the original client first.
      const first = value.split(',')[0] ?? '';
      const candidate = canonicalizeIp(first);
      if (candidate !== undefined && isPublicIp(candidate)) {
        return candidate;
      }
    }

    if (request.remoteAddress) {
      return canonicalizeIp(request.remoteAddress);
    }
    return undefined;
  }
}
