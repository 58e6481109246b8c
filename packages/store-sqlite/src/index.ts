export { SQLiteCounterStore } from './sqlite-counter-store.js';
export type { SQLiteCounterStoreOptions } from './sqlite-counter-store.js';
export * from './schema.js';

// Re-export the store contract from the core package for convenience
export type { CounterStore } from '@throttlekit/core';
