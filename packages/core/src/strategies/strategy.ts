import type { StrategyName } from '../config/rate-limit-config.js';
import type { RateLimitResult } from '../result/rate-limit-result.js';
import type { CounterStore } from '../stores/counter-store.js';
import type { Clock } from '../types/clock.js';

export interface StrategyContext {
  store: CounterStore;
  /** Resolved caller key. */
  key: string;
  limit: number;
  windowSeconds: number;
  now: Clock;
  /** Namespace for store keys (default `rate_limit`). */
  prefix: string;
}

export type RateLimitUsage =
  | {
      strategy: 'fixed';
      count: number;
      windowStart: number;
      windowEnd: number;
    }
  | {
      strategy: 'sliding';
      count: number;
      /** Oldest admission still inside the window. */
      oldest?: number;
      newest?: number;
    }
  | {
      strategy: 'token_bucket';
      tokens: number;
      lastRefill?: number;
      /** Seconds until the next whole token is available. */
      nextTokenIn: number;
    };

export interface RateLimitStrategy {
  readonly name: StrategyName;
  /** Records one attempt and decides it. Rejects only when the store does. */
  attempt(context: StrategyContext): Promise<RateLimitResult>;
  /** Forgets everything recorded for the key. */
  reset(context: StrategyContext): Promise<void>;
  /** Reports current usage without consuming any capacity. */
  inspect(context: StrategyContext): Promise<RateLimitUsage>;
}

/** `${prefix}:${strategy}:${windowSeconds}:${key}` */
export function counterKey(
  context: Pick<StrategyContext, 'prefix' | 'windowSeconds' | 'key'>,
  strategy: StrategyName,
): string {
  return `${context.prefix}:${strategy}:${context.windowSeconds}:${context.key}`;
}

/** Extra store lifetime past the window, so late readers still see a record. */
export const TTL_BUFFER_SECONDS = 60;

// Float arithmetic on rates can land a hair either side of a whole number.
const EPSILON = 1e-9;

export function ceilSeconds(value: number): number {
  return Math.ceil(value - EPSILON);
}

/** Rounds `value` to the nearest integer when it is within float noise of it. */
export function snapToWhole(value: number): number {
  const whole = Math.round(value);
  return Math.abs(value - whole) < EPSILON ? whole : value;
}
