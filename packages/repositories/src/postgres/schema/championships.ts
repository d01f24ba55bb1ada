import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { titles } from './activatables.js';

/**
 * Title championships table - one row per reign.
 *
 * The champion is a tagged reference (wrestler or tag team).
 */
export const titleChampionships = pgTable(
  'title_championships',
  {
    id: text('id').primaryKey(),
    titleId: text('title_id')
      .notNull()
      .references(() => titles.id),
    championType: text('champion_type', { enum: ['wrestler', 'tag_team'] }).notNull(),
    championId: text('champion_id').notNull(),
    wonAt: timestamp('won_at', { withTimezone: true }).notNull(),
    lostAt: timestamp('lost_at', { withTimezone: true }),
  },
  (table) => [
    index('title_championships_title_idx').on(table.titleId),
    index('title_championships_champion_idx').on(table.championType, table.championId),
    uniqueIndex('title_championships_one_open_idx')
      .on(table.titleId)
      .where(sql`${table.lostAt} is null`),
  ]
);
