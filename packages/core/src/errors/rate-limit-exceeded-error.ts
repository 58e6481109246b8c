import type {
  IdentifierKind,
  RateLimitConfig,
} from '../config/rate-limit-config.js';
import { RateLimitHeaders } from '../result/rate-limit-headers.js';
import type { DeniedResult } from '../result/rate-limit-result.js';

export interface RateLimitExceededErrorOptions {
  limit: number;
  windowSeconds: number;
  retryAfter: number;
  resetTime: number;
  identifierKind: IdentifierKind;
  /** Response headers describing the denial. */
  headers?: Record<string, string>;
}

/**
 * Denial signal for HTTP layers. Strategies and the engine never throw it;
 * middleware builds one from a denied result.
 */
export class RateLimitExceededError extends Error {
  public readonly statusCode = 429;
  public readonly code = 'RATE_LIMIT_EXCEEDED';
  public readonly limit: number;
  public readonly windowSeconds: number;
  public readonly retryAfter: number;
  public readonly resetTime: number;
  public readonly identifierKind: IdentifierKind;
  public readonly headers: Readonly<Record<string, string>>;

  constructor(options: RateLimitExceededErrorOptions) {
    super(
      `Rate limit exceeded for ${options.identifierKind}. Limit: ${options.limit} requests per ${options.windowSeconds} seconds. Try again in ${options.retryAfter} seconds.`,
    );
    this.name = 'RateLimitExceededError';
    this.limit = options.limit;
    this.windowSeconds = options.windowSeconds;
    this.retryAfter = options.retryAfter;
    this.resetTime = options.resetTime;
    this.identifierKind = options.identifierKind;
    this.headers = Object.freeze({ ...options.headers });
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromResult(
    result: DeniedResult,
    config: RateLimitConfig,
    headers: RateLimitHeaders = new RateLimitHeaders(),
  ): RateLimitExceededError {
    return new RateLimitExceededError({
      limit: result.limit,
      windowSeconds: config.windowSeconds,
      retryAfter: result.retryAfter,
      resetTime: result.resetTime,
      identifierKind: config.identifier.kind,
      headers: headers.toRecord(result),
    });
  }
}
