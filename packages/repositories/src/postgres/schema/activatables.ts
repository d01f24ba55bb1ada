import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';

const activationStatuses = ['unactivated', 'active', 'inactive', 'retired'] as const;

/**
 * Titles table - championships that can be activated, deactivated and retired.
 */
export const titles = pgTable(
  'titles',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    status: text('status', { enum: activationStatuses }).notNull().default('unactivated'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('titles_status_idx').on(table.status)]
);

/**
 * Stables table - groups of wrestlers and tag teams.
 */
export const stables = pgTable(
  'stables',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    status: text('status', { enum: activationStatuses }).notNull().default('unactivated'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('stables_status_idx').on(table.status)]
);
