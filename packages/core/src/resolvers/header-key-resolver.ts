import { createHash } from 'crypto';
import type { RateLimitRequest } from '../types/request.js';
import { IpKeyResolver } from './ip-key-resolver.js';
import type { KeyResolver } from './key-resolver.js';

export const DEFAULT_TOKEN_HEADER = 'X-API-Key';

export const DEFAULT_FALLBACK_TOKEN_HEADERS: ReadonlyArray<string> =
  Object.freeze(['Authorization', 'X-Auth-Token', 'X-Client-ID']);

export interface HeaderKeyResolverOptions {
  header?: string;
  fallbackHeaders?: ReadonlyArray<string>;
  ipResolver?: KeyResolver;
}

function extractToken(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const token = value.trim().replace(/^bearer\s+/i, '').trim();
  return token.length > 0 ? token : undefined;
}

/**
 * Keys callers by an API token. Tokens are hashed so that the raw secret
 * never reaches the counter store or the logs.
 */
export class HeaderKeyResolver implements KeyResolver {
  readonly kind = 'header';
  private readonly headers: ReadonlyArray<string>;
  private readonly ipResolver: KeyResolver;

  constructor({
    header = DEFAULT_TOKEN_HEADER,
    fallbackHeaders = DEFAULT_FALLBACK_TOKEN_HEADERS,
    ipResolver = new IpKeyResolver(),
  }: HeaderKeyResolverOptions = {}) {
    this.headers = [header, ...fallbackHeaders];
    this.ipResolver = ipResolver;
  }

  resolve(request: RateLimitRequest): string {
    for (const name of this.headers) {
      const token = extractToken(request.header(name));
      if (token !== undefined) {
        return `header:${createHash('sha256').update(token).digest('hex')}`;
      }
    }
    return this.ipResolver.resolve(request);
  }
}
