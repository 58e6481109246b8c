import {
  DEFAULT_KEY_PREFIX,
  resolveRateLimitPolicy,
  type IdentifierKind,
  type RateLimitConfig,
  type RateLimitLimits,
  type RateLimitPolicy,
  type StrategyName,
} from '../config/rate-limit-config.js';
import {
  createLogger,
  describeError,
  LOG_CONTEXT,
  type LoggerAdapter,
} from '../logger.js';
import { createKeyResolver, type KeyResolverOptions } from '../resolvers/index.js';
import type { KeyResolver } from '../resolvers/key-resolver.js';
import {
  allowedResult,
  type RateLimitResult,
} from '../result/rate-limit-result.js';
import type { CounterStore } from '../stores/counter-store.js';
import { createStrategy, type StrategyOptions } from '../strategies/index.js';
import type {
  RateLimitStrategy,
  RateLimitUsage,
  StrategyContext,
} from '../strategies/strategy.js';
import { systemClock, type Clock } from '../types/clock.js';
import type { RateLimitRequest } from '../types/request.js';

export interface RateLimitEngineOptions extends KeyResolverOptions {
  /** A grammar string, one limit, or several limits that all apply. */
  limits: RateLimitLimits;
  store: CounterStore;
  logger?: LoggerAdapter;
  clock?: Clock;
  /** Namespace prepended to every store key (default `rate_limit`). */
  keyPrefix?: string;
  tokenBucket?: StrategyOptions['tokenBucket'];
}

/** A result together with the limit that produced it. */
export interface RateLimitDecision {
  result: RateLimitResult;
  config: RateLimitConfig;
}

export interface RateLimitDescription {
  key: string;
  identifier: IdentifierKind;
  strategy: StrategyName;
  limit: number;
  windowSeconds: number;
  usage: RateLimitUsage;
}

interface BoundLimit {
  config: RateLimitConfig;
  resolver: KeyResolver;
  strategy: RateLimitStrategy;
}

/**
 * Decides whether a request may proceed under a route's policy.
 *
 * Every limit of the policy is charged in order; the first denial wins.
 * When all limits admit, the result with the least remaining capacity is
 * returned. A failing counter store never blocks traffic: the attempt is
 * admitted and flagged `approximate`.
 *
 * @example
 * ```typescript
 * const engine = new RateLimitEngine({
 *   limits: '100,1|1000,60,sliding,user',
 *   store: new InMemoryCounterStore(),
 * });
 * const result = await engine.attempt(request);
 * ```
 */
export class RateLimitEngine {
  public readonly policy: RateLimitPolicy;
  private readonly limits: readonly [BoundLimit, ...BoundLimit[]];
  private readonly store: CounterStore;
  private readonly logger: LoggerAdapter;
  private readonly clock: Clock;
  private readonly keyPrefix: string;

  constructor({
    limits,
    store,
    logger = createLogger({ minLevel: 'warn' }),
    clock = systemClock,
    keyPrefix = DEFAULT_KEY_PREFIX,
    tokenBucket,
    ...resolverOptions
  }: RateLimitEngineOptions) {
    this.policy = resolveRateLimitPolicy(limits);
    this.store = store;
    this.logger = logger;
    this.clock = clock;
    this.keyPrefix = keyPrefix;

    const bind = (config: RateLimitConfig): BoundLimit => ({
      config,
      resolver: createKeyResolver(config.identifier, resolverOptions),
      strategy: createStrategy(config.strategy, { tokenBucket }),
    });
    const [first, ...rest] = this.policy;
    this.limits = [bind(first), ...rest.map(bind)];
  }

  async attempt(request: RateLimitRequest): Promise<RateLimitResult> {
    return (await this.evaluate(request)).result;
  }

  /** Like {@link attempt}, but also reports which limit decided. */
  async evaluate(request: RateLimitRequest): Promise<RateLimitDecision> {
    const [first, ...rest] = this.limits;
    let decision = await this.charge(first, request);

    for (const limit of rest) {
      if (!decision.result.allowed) break;
      const next = await this.charge(limit, request);
      if (!next.result.allowed || next.result.remaining < decision.result.remaining) {
        decision = next;
      }
    }

    if (!decision.result.allowed) {
      this.logger.debug(LOG_CONTEXT.ENGINE, 'Request denied', {
        key: decision.result.key,
        strategy: decision.result.strategy,
        retryAfter: decision.result.retryAfter,
      });
    }
    return decision;
  }

  /** Clears the caller's counters under every limit of the policy. */
  async reset(request: RateLimitRequest): Promise<void> {
    for (const limit of this.limits) {
      await limit.strategy.reset(this.context(limit, request));
    }
  }

  /** Current usage per limit, without consuming anything. */
  async describe(
    request: RateLimitRequest,
  ): Promise<Array<RateLimitDescription>> {
    const descriptions: Array<RateLimitDescription> = [];
    for (const limit of this.limits) {
      const context = this.context(limit, request);
      descriptions.push({
        key: context.key,
        identifier: limit.config.identifier.kind,
        strategy: limit.config.strategy,
        limit: limit.config.limit,
        windowSeconds: limit.config.windowSeconds,
        usage: await limit.strategy.inspect(context),
      });
    }
    return descriptions;
  }

  private context(limit: BoundLimit, request: RateLimitRequest): StrategyContext {
    return {
      store: this.store,
      key: limit.resolver.resolve(request),
      limit: limit.config.limit,
      windowSeconds: limit.config.windowSeconds,
      now: this.clock,
      prefix: this.keyPrefix,
    };
  }

  private async charge(
    limit: BoundLimit,
    request: RateLimitRequest,
  ): Promise<RateLimitDecision> {
    const context = this.context(limit, request);
    try {
      return {
        config: limit.config,
        result: await limit.strategy.attempt(context),
      };
    } catch (error) {
      this.logger.warn(
        LOG_CONTEXT.ENGINE,
        'Counter store unavailable, admitting request',
        {
          key: context.key,
          strategy: limit.config.strategy,
          error: describeError(error),
        },
      );
      return {
        config: limit.config,
        result: allowedResult({
          limit: context.limit,
          remaining: context.limit - 1,
          resetTime: this.clock() + context.windowSeconds,
          strategy: limit.config.strategy,
          windowSeconds: context.windowSeconds,
          key: context.key,
          approximate: true,
        }),
      };
    }
  }
}
