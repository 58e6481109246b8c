import { z } from 'zod';
import { RateLimitConfigError } from '../errors/rate-limit-config-error.js';

export const STRATEGY_NAMES = ['fixed', 'sliding', 'token_bucket'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export const IDENTIFIER_KINDS = ['ip', 'user', 'header', 'composite'] as const;
export type IdentifierKind = (typeof IDENTIFIER_KINDS)[number];

export type SimpleIdentifierConfig =
  | { readonly kind: 'ip' }
  | { readonly kind: 'user' }
  | {
      readonly kind: 'header';
      /** Primary header to read the caller token from (default `X-API-Key`). */
      readonly header?: string;
    };

export interface CompositeIdentifierConfig {
  readonly kind: 'composite';
  readonly identifiers: ReadonlyArray<SimpleIdentifierConfig>;
}

export type IdentifierConfig =
  | SimpleIdentifierConfig
  | CompositeIdentifierConfig;

/**
 * Validated, immutable limit for one route. Build it with
 * {@link createRateLimitConfig} or {@link parseRateLimitParameters}.
 */
export interface RateLimitConfig {
  /** Maximum admissions per window. */
  readonly limit: number;
  /** Window length in seconds. */
  readonly windowSeconds: number;
  readonly strategy: StrategyName;
  readonly identifier: IdentifierConfig;
}

/** Every limit that applies to one route. Never empty. */
export type RateLimitPolicy = readonly [RateLimitConfig, ...RateLimitConfig[]];

const HEADER_NAME = /^[A-Za-z0-9!#$%&'*+.^_`|~-]+$/;

const IdentifierObjectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ip') }),
  z.object({ kind: z.literal('user') }),
  z.object({
    kind: z.literal('header'),
    header: z
      .string()
      .regex(HEADER_NAME, 'header must be a valid HTTP header name')
      .optional(),
  }),
  z.object({
    kind: z.literal('composite'),
    identifiers: z
      .array(
        z.discriminatedUnion('kind', [
          z.object({ kind: z.literal('ip') }),
          z.object({ kind: z.literal('user') }),
          z.object({
            kind: z.literal('header'),
            header: z
              .string()
              .regex(HEADER_NAME, 'header must be a valid HTTP header name')
              .optional(),
          }),
        ]),
      )
      .min(2, 'a composite identifier needs at least two parts'),
  }),
]);

function identifierFromKind(kind: IdentifierKind): IdentifierConfig {
  switch (kind) {
    case 'composite':
      return { kind, identifiers: [{ kind: 'ip' }, { kind: 'user' }] };
    case 'header':
    case 'ip':
    case 'user':
      return { kind };
  }
}

const IdentifierSchema = z.union(
  [
    z.enum(IDENTIFIER_KINDS).transform(identifierFromKind),
    IdentifierObjectSchema,
  ],
  {
    errorMap: () => ({
      message: `identifier must be one of ${IDENTIFIER_KINDS.join(', ')}`,
    }),
  },
);

export const RateLimitConfigSchema = z.object({
  limit: z
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .positive('limit must be greater than zero'),
  windowSeconds: z
    .number({ invalid_type_error: 'windowSeconds must be a number' })
    .int('windowSeconds must be an integer')
    .positive('windowSeconds must be greater than zero'),
  strategy: z
    .enum(STRATEGY_NAMES, {
      errorMap: () => ({
        message: `strategy must be one of ${STRATEGY_NAMES.join(', ')}`,
      }),
    })
    .default('fixed'),
  identifier: IdentifierSchema.default('ip'),
});

export type RateLimitConfigInput = z.input<typeof RateLimitConfigSchema>;

/** Anything {@link resolveRateLimitPolicy} accepts. */
export type RateLimitLimits =
  | string
  | RateLimitConfigInput
  | ReadonlyArray<RateLimitConfigInput>;

/** 60 requests per minute per client IP. */
export const DEFAULT_RATE_LIMIT: RateLimitConfig = freezeConfig({
  limit: 60,
  windowSeconds: 60,
  strategy: 'fixed',
  identifier: { kind: 'ip' },
});

export const DEFAULT_KEY_PREFIX = 'rate_limit';

function freezeIdentifier(identifier: IdentifierConfig): IdentifierConfig {
  if (identifier.kind === 'composite') {
    return Object.freeze({
      kind: identifier.kind,
      identifiers: Object.freeze(
        identifier.identifiers.map((child) => Object.freeze({ ...child })),
      ),
    });
  }
  return Object.freeze({ ...identifier });
}

function freezeConfig(config: RateLimitConfig): RateLimitConfig {
  return Object.freeze({
    limit: config.limit,
    windowSeconds: config.windowSeconds,
    strategy: config.strategy,
    identifier: freezeIdentifier(config.identifier),
  });
}

function parseConfig(input: unknown): RateLimitConfig {
  const parsed = RateLimitConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw RateLimitConfigError.fromZodError(parsed.error);
  }
  return freezeConfig(parsed.data);
}

/**
 * Validates and freezes a single limit.
 *
 * @throws {RateLimitConfigError} when any field is out of range.
 */
export function createRateLimitConfig(
  input: RateLimitConfigInput,
): RateLimitConfig {
  return parseConfig(input);
}

function parseInteger(text: string | undefined, field: string): number {
  if (text === undefined || !/^-?\d+$/.test(text)) {
    throw new RateLimitConfigError(
      `Invalid rate limit configuration: ${field} must be an integer, got "${text ?? ''}"`,
    );
  }
  return Number(text);
}

function parseIdentifier(text: string): unknown {
  if (text.includes('+')) {
    return {
      kind: 'composite',
      identifiers: text.split('+').map((part) => {
        const child = parseIdentifier(part.trim());
        return typeof child === 'string' ? { kind: child } : child;
      }),
    };
  }
  const separator = text.indexOf(':');
  if (separator !== -1 && text.slice(0, separator) === 'header') {
    return { kind: 'header', header: text.slice(separator + 1).trim() };
  }
  return text;
}

function parseLimit(segment: string): RateLimitConfig {
  const parts = segment.split(',').map((part) => part.trim());
  if (parts.length < 2 || parts.length > 4) {
    throw new RateLimitConfigError(
      `Invalid rate limit configuration: expected "limit,windowMinutes[,strategy[,identifier]]", got "${segment}"`,
    );
  }

  const [limitText, windowText, strategy, identifier] = parts;
  const limit = parseInteger(limitText, 'limit');
  const windowMinutes = parseInteger(windowText, 'window');

  return parseConfig({
    limit,
    windowSeconds: windowMinutes * 60,
    strategy: strategy === undefined || strategy === '' ? undefined : strategy,
    identifier:
      identifier === undefined || identifier === ''
        ? undefined
        : parseIdentifier(identifier),
  });
}

/**
 * Parses the compact route grammar:
 * `limit,windowMinutes[,strategy[,identifier]]`, with several limits joined
 * by `|`.
 *
 * @example
 * ```typescript
 * parseRateLimitParameters('100,1|1000,60,sliding,user');
 * parseRateLimitParameters('10,1,token_bucket,header:X-Api-Token');
 * parseRateLimitParameters('30,5,fixed,ip+user');
 * ```
 */
export function parseRateLimitParameters(parameters: string): RateLimitPolicy {
  const segments = parameters.split('|').map((segment) => segment.trim());
  if (segments.some((segment) => segment.length === 0)) {
    throw new RateLimitConfigError(
      `Invalid rate limit configuration: empty limit in "${parameters}"`,
    );
  }
  return toPolicy(segments.map(parseLimit));
}

function toPolicy(configs: ReadonlyArray<RateLimitConfig>): RateLimitPolicy {
  const [first, ...rest] = configs;
  if (first === undefined) {
    throw new RateLimitConfigError(
      'Invalid rate limit configuration: at least one limit is required',
    );
  }
  const policy: RateLimitPolicy = [first, ...rest];
  return Object.freeze(policy);
}

function isConfigList(
  limits: RateLimitLimits,
): limits is ReadonlyArray<RateLimitConfigInput> {
  return Array.isArray(limits);
}

/**
 * Normalises whatever a caller handed over (grammar string, one limit, or a
 * list of limits) into a validated policy.
 */
export function resolveRateLimitPolicy(limits: RateLimitLimits): RateLimitPolicy {
  if (typeof limits === 'string') {
    return parseRateLimitParameters(limits);
  }
  if (isConfigList(limits)) {
    return toPolicy(limits.map(parseConfig));
  }
  return toPolicy([parseConfig(limits)]);
}
