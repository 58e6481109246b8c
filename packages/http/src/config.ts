import type { IncomingMessage, ServerResponse } from 'http';
import {
  isLoggerAdapter,
  RateLimitConfigError,
  type Clock,
  type CounterStore,
  type LoggerAdapter,
  type RateLimitExceededError,
  type RateLimitLimits,
} from '@throttlekit/core';
import { z } from 'zod';

export const DEFAULT_SESSION_COOKIE = 'sessionid';

export type UserIdLookup = (req: IncomingMessage) => string | undefined;

export type RejectionHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  error: RateLimitExceededError,
) => void;

const isFunction = (value: unknown): boolean => typeof value === 'function';

const isCounterStore = (value: unknown): boolean =>
  value != null &&
  typeof value === 'object' &&
  ['get', 'put', 'delete'].every(
    (method) => typeof Reflect.get(value, method) === 'function',
  );

const HeaderNameSchema = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, 'must be a valid HTTP header name');

const MiddlewareOptionsSchema = z.object({
  limits: z.custom<RateLimitLimits>(
    (value) => typeof value === 'string' || (value != null && typeof value === 'object'),
    'limits must be a grammar string, a limit or an array of limits',
  ),
  store: z.custom<CounterStore>(
    isCounterStore,
    'store must implement get, put and delete',
  ),
  logger: z
    .custom<LoggerAdapter>(isLoggerAdapter, 'logger must implement debug, info, warn and error')
    .optional(),
  headers: z
    .object({
      limit: HeaderNameSchema,
      remaining: HeaderNameSchema,
      reset: HeaderNameSchema,
      retryAfter: HeaderNameSchema,
    })
    .partial()
    .optional(),
  getUserId: z
    .custom<UserIdLookup>(isFunction, 'getUserId must be a function')
    .optional(),
  sessionCookie: z.string().min(1).default(DEFAULT_SESSION_COOKIE),
  enabled: z.boolean().default(true),
  onRejected: z
    .custom<RejectionHandler>(isFunction, 'onRejected must be a function')
    .optional(),
  keyPrefix: z.string().min(1).optional(),
  clock: z.custom<Clock>(isFunction, 'clock must be a function').optional(),
  ip: z
    .object({
      proxyHeaders: z.array(HeaderNameSchema).optional(),
      ipv4SubnetBits: z.number().int().min(0).max(32).optional(),
      ipv6SubnetBits: z.number().int().min(0).max(128).optional(),
    })
    .optional(),
  fallbackHeaders: z.array(HeaderNameSchema).optional(),
});

export type RateLimitMiddlewareOptions = z.input<typeof MiddlewareOptionsSchema>;
export type ResolvedMiddlewareOptions = z.output<typeof MiddlewareOptionsSchema>;

export function validateMiddlewareOptions(
  options: RateLimitMiddlewareOptions,
): ResolvedMiddlewareOptions {
  const parsed = MiddlewareOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw RateLimitConfigError.fromZodError(parsed.error, 'middleware');
  }
  return parsed.data;
}
