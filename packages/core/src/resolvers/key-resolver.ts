import type { IdentifierKind } from '../config/rate-limit-config.js';
import type { RateLimitRequest } from '../types/request.js';

/** Maps a request to the counter key it is charged against. Never throws. */
export interface KeyResolver {
  readonly kind: IdentifierKind;
  resolve(request: RateLimitRequest): string;
}
