export { createRateLimitMiddleware } from './middleware.js';
export type { RateLimitMiddleware } from './middleware.js';
export {
  DEFAULT_SESSION_COOKIE,
  validateMiddlewareOptions,
} from './config.js';
export type {
  RateLimitMiddlewareOptions,
  RejectionHandler,
  ResolvedMiddlewareOptions,
  UserIdLookup,
} from './config.js';
export { readCookie, toRateLimitRequest } from './request-adapter.js';
export type { RequestAdapterOptions } from './request-adapter.js';
export { sendJson, sendTooManyRequests } from './response-helpers.js';
