import { RateLimitConfigError } from '../errors/rate-limit-config-error.js';
import type { RateLimitRequest } from '../types/request.js';
import type { KeyResolver } from './key-resolver.js';

function escapeKeyPart(key: string): string {
  return key.replace(/%/g, '%25').replace(/\|/g, '%7C');
}

/** Charges the combination of several identities as one caller. */
export class CompositeKeyResolver implements KeyResolver {
  readonly kind = 'composite';

  constructor(private readonly resolvers: ReadonlyArray<KeyResolver>) {
    if (resolvers.length < 2) {
      throw new RateLimitConfigError(
        'Invalid rate limit configuration: a composite identifier needs at least two parts',
      );
    }
  }

  resolve(request: RateLimitRequest): string {
    const parts = this.resolvers.map((resolver) =>
      escapeKeyPart(resolver.resolve(request)),
    );
    return `composite:${parts.join('|')}`;
  }
}
