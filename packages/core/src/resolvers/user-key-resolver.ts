import type { RateLimitRequest } from '../types/request.js';
import { IpKeyResolver } from './ip-key-resolver.js';
import type { KeyResolver } from './key-resolver.js';

/**
 * Where the user and session identifiers come from. The default reads the
 * fields the HTTP adapter put on the request.
 */
export interface IdentityLookup {
  userId(request: RateLimitRequest): string | undefined;
  sessionId(request: RateLimitRequest): string | undefined;
}

export const requestIdentity: IdentityLookup = {
  userId: (request) => request.userId,
  sessionId: (request) => request.sessionId,
};

export interface UserKeyResolverOptions {
  identity?: IdentityLookup;
  ipResolver?: KeyResolver;
}

export class UserKeyResolver implements KeyResolver {
  readonly kind = 'user';
  private readonly identity: IdentityLookup;
  private readonly ipResolver: KeyResolver;

  constructor({
    identity = requestIdentity,
    ipResolver = new IpKeyResolver(),
  }: UserKeyResolverOptions = {}) {
    this.identity = identity;
    this.ipResolver = ipResolver;
  }

  resolve(request: RateLimitRequest): string {
    const userId = this.identity.userId(request)?.trim();
    if (userId) return `user:${userId}`;

    const sessionId = this.identity.sessionId(request)?.trim();
    if (sessionId) return `session:${sessionId}`;

    return this.ipResolver.resolve(request);
  }
}
