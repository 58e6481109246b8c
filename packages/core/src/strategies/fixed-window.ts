import {
  allowedResult,
  deniedResult,
  type RateLimitResult,
} from '../result/rate-limit-result.js';
import type { CounterStore } from '../stores/counter-store.js';
import { decodeRecord, FixedWindowRecordSchema } from './counter-record.js';
import {
  counterKey,
  TTL_BUFFER_SECONDS,
  type RateLimitStrategy,
  type RateLimitUsage,
  type StrategyContext,
} from './strategy.js';

interface WindowPosition {
  current: number;
  windowStart: number;
  resetTime: number;
  storeKey: string;
}

/**
 * Counts admissions in aligned buckets of `windowSeconds`. Cheap, but a
 * caller can spend up to twice the limit across a bucket boundary.
 */
export class FixedWindowStrategy implements RateLimitStrategy {
  readonly name: 'fixed' = 'fixed';

  async attempt(context: StrategyContext): Promise<RateLimitResult> {
    const { store, limit, windowSeconds, key } = context;
    const position = this.position(context);
    const ttlSeconds = windowSeconds + TTL_BUFFER_SECONDS;

    const count = store.increment
      ? await store.increment(position.storeKey, ttlSeconds)
      : await this.readThenWrite(store, position, ttlSeconds);

    const fields = {
      limit,
      resetTime: position.resetTime,
      strategy: this.name,
      windowSeconds,
      key,
    };
    if (count <= limit) {
      return allowedResult({ ...fields, remaining: limit - count });
    }
    return deniedResult({
      ...fields,
      retryAfter: position.resetTime - position.current,
    });
  }

  async reset(context: StrategyContext): Promise<void> {
    await context.store.delete(this.position(context).storeKey);
  }

  async inspect(
    context: StrategyContext,
  ): Promise<Extract<RateLimitUsage, { strategy: 'fixed' }>> {
    const position = this.position(context);
    const record = decodeRecord(
      FixedWindowRecordSchema,
      await context.store.get(position.storeKey),
    );
    return {
      strategy: this.name,
      count: record?.count ?? 0,
      windowStart: position.windowStart,
      windowEnd: position.resetTime,
    };
  }

  private position(context: StrategyContext): WindowPosition {
    const current = context.now();
    const bucket = Math.floor(current / context.windowSeconds);
    return {
      current,
      windowStart: bucket * context.windowSeconds,
      resetTime: (bucket + 1) * context.windowSeconds,
      storeKey: `${counterKey(context, this.name)}:${bucket}`,
    };
  }

  private async readThenWrite(
    store: CounterStore,
    position: WindowPosition,
    ttlSeconds: number,
  ): Promise<number> {
    const record = decodeRecord(
      FixedWindowRecordSchema,
      await store.get(position.storeKey),
    );
    const count = (record?.count ?? 0) + 1;
    await store.put(
      position.storeKey,
      JSON.stringify({ count, windowStart: position.windowStart }),
      ttlSeconds,
    );
    return count;
  }
}
