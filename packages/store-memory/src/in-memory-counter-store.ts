import { CounterStoreError, type CounterStore } from '@throttlekit/core';

export interface InMemoryCounterStoreOptions {
  /** How often expired counters are swept, in ms. 0 disables the sweep. */
  cleanupIntervalMs?: number;
  /** Oldest counters are evicted beyond this many entries. */
  maxEntries?: number;
}

interface CounterEntry {
  value: string;
  /** Epoch ms; 0 means the entry never expires. */
  expiresAt: number;
}

export interface InMemoryCounterStoreStats {
  totalEntries: number;
  expiredEntries: number;
  maxEntries: number;
}

/**
 * Process-local counter store. Every operation runs synchronously inside
 * the event loop, so `increment` is atomic for a single Node process.
 */
export class InMemoryCounterStore implements CounterStore {
  private readonly entries = new Map<string, CounterEntry>();
  private readonly maxEntries: number;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    cleanupIntervalMs = 60_000,
    maxEntries = 10_000,
  }: InMemoryCounterStoreOptions = {}) {
    this.maxEntries = maxEntries;

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpired();
      }, cleanupIntervalMs);
      // Don't keep the process alive just for the sweep.
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertUsable();
    return this.read(key)?.value;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    this.write(key, { value, expiresAt: this.expiryFor(ttlSeconds) });
  }

  async delete(key: string): Promise<void> {
    this.assertUsable();
    this.entries.delete(key);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    this.assertUsable();
    const existing = this.read(key);

    if (!existing) {
      this.write(key, { value: '1', expiresAt: this.expiryFor(ttlSeconds) });
      return 1;
    }

    const current = Number(existing.value);
    if (!Number.isSafeInteger(current)) {
      throw new CounterStoreError(`Counter "${key}" does not hold an integer`);
    }
    existing.value = String(current + 1);
    // Counting is a write too; keep the entry at the young end of the Map.
    this.entries.delete(key);
    this.entries.set(key, existing);
    return current + 1;
  }

  async clear(): Promise<void> {
    this.assertUsable();
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.destroy();
  }

  /** Removes every expired counter and returns how many were dropped. */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getStats(): InMemoryCounterStoreStats {
    const now = Date.now();
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry, now)) expiredEntries++;
    }
    return {
      totalEntries: this.entries.size,
      expiredEntries,
      maxEntries: this.maxEntries,
    };
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    this.entries.clear();
    this.isDestroyed = true;
  }

  private read(key: string): CounterEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.isExpired(entry, Date.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private write(key: string, entry: CounterEntry): void {
    // Re-insert so Map order tracks recency of writes.
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, entry);
  }

  private expiryFor(ttlSeconds: number): number {
    if (ttlSeconds === 0) return 0;
    // Negative TTLs produce an already-expired entry.
    return Date.now() + ttlSeconds * 1000;
  }

  private isExpired(entry: CounterEntry, now: number): boolean {
    return entry.expiresAt !== 0 && entry.expiresAt <= now;
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new CounterStoreError('Counter store has been destroyed');
    }
  }
}
