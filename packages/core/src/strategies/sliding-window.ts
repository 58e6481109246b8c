import {
  allowedResult,
  deniedResult,
  type RateLimitResult,
} from '../result/rate-limit-result.js';
import { decodeRecord, SlidingWindowRecordSchema } from './counter-record.js';
import {
  ceilSeconds,
  counterKey,
  TTL_BUFFER_SECONDS,
  type RateLimitStrategy,
  type RateLimitUsage,
  type StrategyContext,
} from './strategy.js';

/**
 * Keeps the timestamp of every admission inside the trailing window. Exact,
 * at the cost of storing up to `limit` timestamps per caller.
 */
export class SlidingWindowStrategy implements RateLimitStrategy {
  readonly name: 'sliding' = 'sliding';

  async attempt(context: StrategyContext): Promise<RateLimitResult> {
    const { store, limit, windowSeconds, key } = context;
    const storeKey = counterKey(context, this.name);
    const current = context.now();
    const timestamps = await this.liveTimestamps(context, storeKey, current);

    const fields = { limit, strategy: this.name, windowSeconds, key };
    if (timestamps.length >= limit) {
      const resetTime = (timestamps[0] ?? current) + windowSeconds;
      return deniedResult({
        ...fields,
        resetTime,
        retryAfter: Math.max(1, ceilSeconds(resetTime - current)),
      });
    }

    timestamps.push(current);
    await store.put(
      storeKey,
      JSON.stringify({ timestamps }),
      windowSeconds + TTL_BUFFER_SECONDS,
    );

    return allowedResult({
      ...fields,
      remaining: limit - timestamps.length,
      resetTime: (timestamps[0] ?? current) + windowSeconds,
    });
  }

  async reset(context: StrategyContext): Promise<void> {
    await context.store.delete(counterKey(context, this.name));
  }

  async inspect(context: StrategyContext): Promise<RateLimitUsage> {
    const timestamps = await this.liveTimestamps(
      context,
      counterKey(context, this.name),
      context.now(),
    );
    return {
      strategy: this.name,
      count: timestamps.length,
      oldest: timestamps[0],
      newest: timestamps[timestamps.length - 1],
    };
  }

  /** Sorted admissions with timestamp >= now - window. */
  private async liveTimestamps(
    context: StrategyContext,
    storeKey: string,
    current: number,
  ): Promise<Array<number>> {
    const record = decodeRecord(
      SlidingWindowRecordSchema,
      await context.store.get(storeKey),
    );
    const cutoff = current - context.windowSeconds;
    return (record?.timestamps ?? [])
      .filter((timestamp) => timestamp >= cutoff)
      .sort((a, b) => a - b);
  }
}
