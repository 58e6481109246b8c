import type { StrategyName } from '../config/rate-limit-config.js';

interface RateLimitResultFields {
  /** Configured maximum for the window. */
  limit: number;
  /** Admissions left after this attempt, between 0 and `limit`. */
  remaining: number;
  /** Epoch seconds at which capacity is next fully or partially restored. */
  resetTime: number;
  strategy: StrategyName;
  windowSeconds: number;
  /** Resolved caller key, when known. */
  key?: string;
  /** Set when the counter store failed and the request was admitted blind. */
  approximate?: boolean;
}

export interface AllowedResult extends RateLimitResultFields {
  allowed: true;
  retryAfter?: undefined;
}

export interface DeniedResult extends RateLimitResultFields {
  allowed: false;
  remaining: 0;
  /** Whole seconds the caller should wait before retrying. */
  retryAfter: number;
}

export type RateLimitResult = AllowedResult | DeniedResult;

function clampRemaining(remaining: number, limit: number): number {
  return Math.min(limit, Math.max(0, Math.floor(remaining)));
}

export function allowedResult(
  fields: Omit<AllowedResult, 'allowed' | 'retryAfter'>,
): AllowedResult {
  return {
    ...fields,
    allowed: true,
    remaining: clampRemaining(fields.remaining, fields.limit),
  };
}

export function deniedResult(
  fields: Omit<DeniedResult, 'allowed' | 'remaining'>,
): DeniedResult {
  return {
    ...fields,
    allowed: false,
    remaining: 0,
    retryAfter: Math.max(0, Math.ceil(fields.retryAfter)),
  };
}
