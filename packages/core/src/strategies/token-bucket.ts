import {
  allowedResult,
  deniedResult,
  type RateLimitResult,
} from '../result/rate-limit-result.js';
import { decodeRecord, TokenBucketRecordSchema } from './counter-record.js';
import {
  ceilSeconds,
  counterKey,
  snapToWhole,
  type RateLimitStrategy,
  type RateLimitUsage,
  type StrategyContext,
} from './strategy.js';

export interface TokenBucketOptions {
  /**
   * Tokens a caller starts with on first sight (default 0, i.e. an empty
   * bucket). Clamped to the bucket capacity.
   */
  initialTokens?: number;
}

interface BucketState {
  current: number;
  tokens: number;
  rate: number;
  lastRefill?: number;
}

/**
 * Refills `limit` tokens per window continuously; each admission spends one.
 * Allows bursts up to `limit` once the bucket has filled.
 */
export class TokenBucketStrategy implements RateLimitStrategy {
  readonly name: 'token_bucket' = 'token_bucket';
  private readonly initialTokens: number;

  constructor({ initialTokens = 0 }: TokenBucketOptions = {}) {
    this.initialTokens = Math.max(0, initialTokens);
  }

  async attempt(context: StrategyContext): Promise<RateLimitResult> {
    const { store, limit, windowSeconds, key } = context;
    const storeKey = counterKey(context, this.name);
    const state = await this.refill(context, storeKey);
    const admitted = state.tokens >= 1;
    const tokens = admitted ? state.tokens - 1 : state.tokens;

    await store.put(
      storeKey,
      JSON.stringify({ tokens, lastRefill: state.current }),
      windowSeconds * 2 + 300,
    );

    const fields = {
      limit,
      resetTime: state.current + ceilSeconds((limit - tokens) / state.rate),
      strategy: this.name,
      windowSeconds,
      key,
    };
    if (admitted) {
      return allowedResult({ ...fields, remaining: Math.floor(tokens) });
    }
    return deniedResult({
      ...fields,
      retryAfter: Math.max(1, ceilSeconds((1 - tokens) / state.rate)),
    });
  }

  async reset(context: StrategyContext): Promise<void> {
    await context.store.delete(counterKey(context, this.name));
  }

  async inspect(context: StrategyContext): Promise<RateLimitUsage> {
    const state = await this.refill(context, counterKey(context, this.name));
    return {
      strategy: this.name,
      tokens: state.tokens,
      lastRefill: state.lastRefill,
      nextTokenIn:
        state.tokens >= 1 ? 0 : ceilSeconds((1 - state.tokens) / state.rate),
    };
  }

  private async refill(
    context: StrategyContext,
    storeKey: string,
  ): Promise<BucketState> {
    const { limit, windowSeconds } = context;
    const current = context.now();
    const rate = limit / windowSeconds;
    const record = decodeRecord(
      TokenBucketRecordSchema,
      await context.store.get(storeKey),
    );

    if (!record) {
      return { current, rate, tokens: Math.min(limit, this.initialTokens) };
    }

    const elapsed = Math.max(0, current - record.lastRefill);
    return {
      current,
      rate,
      tokens: Math.min(limit, snapToWhole(record.tokens + elapsed * rate)),
      lastRefill: record.lastRefill,
    };
  }
}
