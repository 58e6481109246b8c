export { DynamoDBCounterStore } from './dynamodb-counter-store.js';
export type { DynamoDBCounterStoreOptions } from './dynamodb-counter-store.js';
export {
  createTable,
  DEFAULT_TABLE_NAME,
  ensureTable,
  TABLE_SCHEMA,
  TTL_ATTRIBUTE,
} from './table.js';

// Re-export the store contract from the core package for convenience
export type { CounterStore } from '@throttlekit/core';
