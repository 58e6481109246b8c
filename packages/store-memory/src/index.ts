export { InMemoryCounterStore } from './in-memory-counter-store.js';
export type {
  InMemoryCounterStoreOptions,
  InMemoryCounterStoreStats,
} from './in-memory-counter-store.js';

// Re-export the store contract from the core package for convenience
export type { CounterStore } from '@throttlekit/core';
