import type { StrategyName } from '../config/rate-limit-config.js';
import { FixedWindowStrategy } from './fixed-window.js';
import { SlidingWindowStrategy } from './sliding-window.js';
import type { RateLimitStrategy } from './strategy.js';
import { TokenBucketStrategy, type TokenBucketOptions } from './token-bucket.js';

export interface StrategyOptions {
  tokenBucket?: TokenBucketOptions;
}

export function createStrategy(
  name: StrategyName,
  options: StrategyOptions = {},
): RateLimitStrategy {
  switch (name) {
    case 'fixed':
      return new FixedWindowStrategy();
    case 'sliding':
      return new SlidingWindowStrategy();
    case 'token_bucket':
      return new TokenBucketStrategy(options.tokenBucket);
  }
}

export * from './counter-record.js';
export * from './fixed-window.js';
export * from './sliding-window.js';
export * from './strategy.js';
export * from './token-bucket.js';
