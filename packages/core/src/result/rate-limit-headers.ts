import type { HeaderSink } from '../types/request.js';
import type { RateLimitResult } from './rate-limit-result.js';

export interface RateLimitHeaderNames {
  limit: string;
  remaining: string;
  reset: string;
  retryAfter: string;
}

export const DEFAULT_HEADER_NAMES: Readonly<RateLimitHeaderNames> =
  Object.freeze({
    limit: 'X-RateLimit-Limit',
    remaining: 'X-RateLimit-Remaining',
    reset: 'X-RateLimit-Reset',
    retryAfter: 'Retry-After',
  });

/**
 * Maps a {@link RateLimitResult} onto response headers.
 *
 * Limit, remaining and reset are always written; `Retry-After` only for
 * denials.
 */
export class RateLimitHeaders {
  public readonly names: Readonly<RateLimitHeaderNames>;

  constructor(names: Partial<RateLimitHeaderNames> = {}) {
    this.names = Object.freeze({
      limit: names.limit ?? DEFAULT_HEADER_NAMES.limit,
      remaining: names.remaining ?? DEFAULT_HEADER_NAMES.remaining,
      reset: names.reset ?? DEFAULT_HEADER_NAMES.reset,
      retryAfter: names.retryAfter ?? DEFAULT_HEADER_NAMES.retryAfter,
    });
  }

  toRecord(result: RateLimitResult): Record<string, string> {
    const headers: Record<string, string> = {
      [this.names.limit]: String(result.limit),
      [this.names.remaining]: String(result.allowed ? result.remaining : 0),
      [this.names.reset]: String(result.resetTime),
    };
    if (!result.allowed) {
      headers[this.names.retryAfter] = String(result.retryAfter);
    }
    return headers;
  }

  apply(sink: HeaderSink, result: RateLimitResult): void {
    for (const [name, value] of Object.entries(this.toRecord(result))) {
      sink.setHeader(name, value);
    }
  }
}
