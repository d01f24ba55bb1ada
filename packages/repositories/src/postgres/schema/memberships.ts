import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Memberships table - tag team partnerships, stable memberships and
 * management relationships, discriminated by `kind`.
 *
 * Group and member are tagged references; which types are legal depends on
 * the kind and is checked when rows are read back.
 */
export const memberships = pgTable(
  'memberships',
  {
    id: text('id').primaryKey(),
    kind: text('kind', { enum: ['tag_team_partner', 'stable_member', 'management'] }).notNull(),
    groupType: text('group_type').notNull(),
    groupId: text('group_id').notNull(),
    memberType: text('member_type').notNull(),
    memberId: text('member_id').notNull(),
    joinedAt: timestamp('joined_at', { withTimezone: true }).notNull(),
    leftAt: timestamp('left_at', { withTimezone: true }),
  },
  (table) => [
    index('memberships_group_idx').on(table.kind, table.groupType, table.groupId),
    index('memberships_member_idx').on(table.kind, table.memberType, table.memberId),
  ]
);
