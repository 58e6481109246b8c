import {
  CounterStoreError,
  createLogger,
  describeError,
  LOG_CONTEXT,
  type CounterStore,
  type LoggerAdapter,
} from '@throttlekit/core';
import Database from 'better-sqlite3';
import { and, eq, gt, lte } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';
import { COUNTER_TABLE_DDL, counterTable } from './schema.js';

export interface SQLiteCounterStoreOptions {
  /** File path or an existing `better-sqlite3` connection (default `:memory:`). */
  database?: string | Database.Database;
  /** How often expired rows are deleted, in ms. 0 disables the sweep. */
  cleanupIntervalMs?: number;
  /** Receives sweep failures (default: console, warn and above). */
  logger?: LoggerAdapter;
}

/**
 * Counter store backed by a SQLite file. Several Node processes can share
 * one file; `increment` runs in an IMMEDIATE transaction so concurrent
 * writers serialise on the database lock.
 */
export class SQLiteCounterStore implements CounterStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database;
  /** Whether this store opened (and must close) the connection. */
  private readonly isConnectionManaged: boolean;
  private readonly incrementCounter: (key: string, ttlSeconds: number) => number;
  private cleanupInterval?: NodeJS.Timeout;
  private isDestroyed = false;

  constructor({
    database = ':memory:',
    cleanupIntervalMs = 60_000,
    logger = createLogger({ minLevel: 'warn' }),
  }: SQLiteCounterStoreOptions = {}) {
    if (typeof database === 'string') {
      this.sqlite = new Database(database);
      this.isConnectionManaged = true;
    } else {
      this.sqlite = database;
      this.isConnectionManaged = false;
    }

    this.sqlite.exec(COUNTER_TABLE_DDL);
    this.db = drizzle(this.sqlite);

    const increment = this.sqlite.transaction(
      (key: string, ttlSeconds: number): number => {
        const now = Date.now();
        const row = this.db
          .select()
          .from(counterTable)
          .where(eq(counterTable.key, key))
          .get();

        if (!row || this.isExpired(row.expiresAt, now)) {
          this.write(key, '1', this.expiryFor(ttlSeconds, now));
          return 1;
        }

        const current = Number(row.value);
        if (!Number.isSafeInteger(current)) {
          throw new CounterStoreError(`Counter "${key}" does not hold an integer`);
        }
        this.db
          .update(counterTable)
          .set({ value: String(current + 1) })
          .where(eq(counterTable.key, key))
          .run();
        return current + 1;
      },
    );
    this.incrementCounter = (key, ttlSeconds) =>
      increment.immediate(key, ttlSeconds);

    if (cleanupIntervalMs > 0) {
      this.cleanupInterval = setInterval(() => {
        try {
          this.cleanupExpired();
        } catch (error: unknown) {
          logger.warn(LOG_CONTEXT.STORE, 'Expired counter sweep failed', {
            error: describeError(error),
          });
        }
      }, cleanupIntervalMs);
      this.cleanupInterval.unref();
    }
  }

  async get(key: string): Promise<string | undefined> {
    this.assertUsable();
    const row = this.db
      .select()
      .from(counterTable)
      .where(eq(counterTable.key, key))
      .get();

    if (!row) return undefined;
    if (this.isExpired(row.expiresAt, Date.now())) {
      this.db.delete(counterTable).where(eq(counterTable.key, key)).run();
      return undefined;
    }
    return row.value;
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertUsable();
    this.write(key, value, this.expiryFor(ttlSeconds, Date.now()));
  }

  async delete(key: string): Promise<void> {
    this.assertUsable();
    this.db.delete(counterTable).where(eq(counterTable.key, key)).run();
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    this.assertUsable();
    return this.incrementCounter(key, ttlSeconds);
  }

  async clear(): Promise<void> {
    this.assertUsable();
    this.db.delete(counterTable).run();
  }

  async close(): Promise<void> {
    this.destroy();
  }

  /** Deletes expired rows and returns how many were removed. */
  cleanupExpired(): number {
    if (this.isDestroyed) return 0;
    const result = this.db
      .delete(counterTable)
      .where(
        and(gt(counterTable.expiresAt, 0), lte(counterTable.expiresAt, Date.now())),
      )
      .run();
    return result.changes;
  }

  destroy(): void {
    if (this.isDestroyed) return;
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }
    if (this.isConnectionManaged) {
      this.sqlite.close();
    }
    this.isDestroyed = true;
  }

  private write(key: string, value: string, expiresAt: number): void {
    this.db
      .insert(counterTable)
      .values({ key, value, expiresAt })
      .onConflictDoUpdate({
        target: counterTable.key,
        set: { value, expiresAt },
      })
      .run();
  }

  private expiryFor(ttlSeconds: number, now: number): number {
    if (ttlSeconds === 0) return 0;
    return now + Math.round(ttlSeconds * 1000);
  }

  private isExpired(expiresAt: number, now: number): boolean {
    return expiresAt !== 0 && expiresAt <= now;
  }

  private assertUsable(): void {
    if (this.isDestroyed) {
      throw new CounterStoreError('SQLite counter store has been destroyed');
    }
  }
}
