import type { IncomingMessage, ServerResponse } from 'http';
import {
  createLogger,
  describeError,
  LOG_CONTEXT,
  RateLimitEngine,
  RateLimitExceededError,
  RateLimitHeaders,
} from '@throttlekit/core';
import {
  validateMiddlewareOptions,
  type RateLimitMiddlewareOptions,
} from './config.js';
import { toRateLimitRequest } from './request-adapter.js';
import { sendJson, sendTooManyRequests } from './response-helpers.js';

export type RateLimitMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void,
) => void;

/**
 * Connect-style middleware for Node `http` servers.
 *
 * Admitted requests get the rate-limit headers and continue to `next`.
 * Denied requests go to `onRejected` when given, otherwise they are answered
 * with a 429 JSON body. If the check itself fails, the request is let through.
 *
 * @example
 * ```typescript
 * const limit = createRateLimitMiddleware({
 *   limits: '10,1|100,60,sliding',
 *   store: new InMemoryCounterStore(),
 * });
 * createServer((req, res) => limit(req, res, () => handle(req, res)));
 * ```
 */
export function createRateLimitMiddleware(
  options: RateLimitMiddlewareOptions,
): RateLimitMiddleware {
  const opts = validateMiddlewareOptions(options);
  const logger = opts.logger ?? createLogger({ minLevel: 'warn' });
  const engine = new RateLimitEngine({
    limits: opts.limits,
    store: opts.store,
    logger,
    clock: opts.clock,
    keyPrefix: opts.keyPrefix,
    ip: opts.ip,
    fallbackHeaders: opts.fallbackHeaders,
  });
  const headers = new RateLimitHeaders(opts.headers);

  return (req, res, next) => {
    if (!opts.enabled) {
      next();
      return;
    }

    Promise.resolve()
      .then(() =>
        engine.evaluate(
          toRateLimitRequest(req, {
            getUserId: opts.getUserId,
            sessionCookie: opts.sessionCookie,
          }),
        ),
      )
      .then(
        ({ result, config }) => {
          if (result.allowed) {
            headers.apply(res, result);
            next();
            return;
          }

          const error = RateLimitExceededError.fromResult(result, config, headers);
          if (opts.onRejected) {
            opts.onRejected(req, res, error);
          } else {
            sendTooManyRequests(res, error);
          }
        },
        (error: unknown) => {
          logger.error(
            LOG_CONTEXT.MIDDLEWARE,
            'Rate limit check failed, passing request through',
            { error: describeError(error) },
          );
          next();
        },
      )
      .catch((error: unknown) => {
        logger.error(LOG_CONTEXT.MIDDLEWARE, 'Request handler failed', {
          error: describeError(error),
        });
        if (!res.headersSent) {
          sendJson(res, { error: 'Internal server error' }, 500);
        }
      });
  };
}
