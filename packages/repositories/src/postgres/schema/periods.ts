import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';

/**
 * Periods table - the append-only ledger behind every projected status.
 *
 * A row is created open (`ended_at` null) and closed once by a later
 * transition. The partial unique index keeps one open period per kind and owner.
 */
export const periods = pgTable(
  'periods',
  {
    id: text('id').primaryKey(),
    ownerType: text('owner_type', {
      enum: ['wrestler', 'referee', 'manager', 'tag_team', 'title', 'stable'],
    }).notNull(),
    ownerId: text('owner_id').notNull(),
    kind: text('kind', {
      enum: ['employment', 'suspension', 'injury', 'retirement', 'activation'],
    }).notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    endedAt: timestamp('ended_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('periods_owner_kind_idx').on(table.ownerType, table.ownerId, table.kind),
    uniqueIndex('periods_one_open_idx')
      .on(table.ownerType, table.ownerId, table.kind)
      .where(sql`${table.endedAt} is null`),
    check('periods_start_before_end', sql`${table.endedAt} is null or ${table.startedAt} < ${table.endedAt}`),
  ]
);
