import { pgTable, text, timestamp, index, primaryKey } from 'drizzle-orm/pg-core';

/**
 * Roster members table - wrestlers, referees, managers and tag teams.
 *
 * Rows are addressed by (type, id). `status` is a cached projection of the
 * member's periods and is rewritten after every transition.
 */
export const rosterMembers = pgTable(
  'roster_members',
  {
    type: text('type', { enum: ['wrestler', 'referee', 'manager', 'tag_team'] }).notNull(),
    id: text('id').notNull(),
    name: text('name'), // wrestlers and tag teams
    firstName: text('first_name'), // referees and managers
    lastName: text('last_name'),
    hometown: text('hometown'),
    signatureMove: text('signature_move'),
    status: text('status', {
      enum: [
        'unemployed',
        'future_employed',
        'employed',
        'suspended',
        'injured',
        'released',
        'retired',
      ],
    })
      .notNull()
      .default('unemployed'),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.type, table.id] }),
    index('roster_members_status_idx').on(table.type, table.status),
  ]
);
