import { pgTable, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

// ── Distributed Locks ────────────────────────────────────────────
// Singleton jobs such as the advanced insight refresh coordinate
// across processes through one row per lock key. A row whose
// `expires_at` has passed may be taken over by the next contender.

export const distributedLocks = pgTable('distributed_locks', {
  lockKey: text('lock_key').primaryKey().notNull(),
  holderId: text('holder_id').notNull(),
  acquiredAt: timestamp('acquired_at', { withTimezone: true }).notNull().defaultNow(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
}, (table) => [
  index('idx_distributed_locks_expires').on(table.expiresAt),
]);
