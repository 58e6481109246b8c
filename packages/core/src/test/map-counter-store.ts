import type { CounterStore } from '../stores/counter-store.js';

/**
 * Plain `Map` store for unit tests. TTLs are recorded but never enforced;
 * tests drive time through the injected clock instead.
 */
export class MapCounterStore implements CounterStore {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
    this.ttls.delete(key);
  }
}

/** Same as {@link MapCounterStore} plus an atomic `increment`. */
export class IncrementingMapCounterStore extends MapCounterStore {
  async increment(key: string, ttlSeconds: number): Promise<number> {
    const next = Number(this.values.get(key) ?? '0') + 1;
    if (!this.ttls.has(key)) this.ttls.set(key, ttlSeconds);
    this.values.set(key, String(next));
    return next;
  }
}

/** Rejects every call, like a store whose backend is down. */
export class FailingCounterStore implements CounterStore {
  async get(): Promise<string | undefined> {
    throw new Error('connection refused');
  }

  async put(): Promise<void> {
    throw new Error('connection refused');
  }

  async delete(): Promise<void> {
    throw new Error('connection refused');
  }
}

/** Mutable clock for synthetic time. */
export function createTestClock(start = 0): {
  now: () => number;
  set: (seconds: number) => void;
} {
  let current = start;
  return {
    now: () => current,
    set: (seconds) => {
      current = seconds;
    },
  };
}
