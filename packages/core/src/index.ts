export * from './config/rate-limit-config.js';
export * from './engine/rate-limit-engine.js';
export * from './errors/counter-store-error.js';
export * from './errors/rate-limit-config-error.js';
export * from './errors/rate-limit-exceeded-error.js';
export * from './logger.js';
export * from './resolvers/index.js';
export * from './result/rate-limit-headers.js';
export * from './result/rate-limit-result.js';
export * from './stores/counter-store.js';
export * from './strategies/index.js';
export * from './types/clock.js';
export * from './types/request.js';
