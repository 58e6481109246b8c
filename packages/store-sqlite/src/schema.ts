import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const counterTable = sqliteTable(
  'throttlekit_counters',
  {
    key: text('key').primaryKey(),
    value: text('value').notNull(),
    /** Epoch ms; 0 means the counter never expires. */
    expiresAt: integer('expires_at').notNull(),
  },
  (table) => ({
    expiresAtIdx: index('idx_throttlekit_counters_expires_at').on(
      table.expiresAt,
    ),
  }),
);

export type CounterRow = typeof counterTable.$inferSelect;

export const COUNTER_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS throttlekit_counters (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_throttlekit_counters_expires_at
    ON throttlekit_counters (expires_at);
`;
