// Row mappers between drizzle rows and protocol types.
//
// Tagged references are stored as (type, id) column pairs and rebuilt here
// with an explicit switch, so a row holding a type its relationship does not
// allow fails loudly instead of leaking into the runtime.

import type {
  ClientRef,
  EntityRef,
  Membership,
  Period,
  RosterMember,
  Stable,
  StableMemberRef,
  Title,
  TitleChampionship,
} from '@roster/protocol';
import type { CreateRosterMemberInput } from '../interfaces/index.js';
import type {
  memberships,
  periods,
  rosterMembers,
  stables,
  titleChampionships,
  titles,
} from './schema/index.js';

export type RosterMemberRow = typeof rosterMembers.$inferSelect;
export type TitleRow = typeof titles.$inferSelect;
export type StableRow = typeof stables.$inferSelect;
export type PeriodRow = typeof periods.$inferSelect;
export type ChampionshipRow = typeof titleChampionships.$inferSelect;
export type MembershipRow = typeof memberships.$inferSelect;

/**
 * Columns of a roster member row that come from the creation input
 */
export type RosterMemberColumns = Pick<
  typeof rosterMembers.$inferInsert,
  'type' | 'name' | 'firstName' | 'lastName' | 'hometown' | 'signatureMove'
>;

function invalidRow(table: string, id: string, detail: string): Error {
  return new Error(`Invalid ${table} row ${id}: ${detail}`);
}

export function rosterMemberColumns(input: CreateRosterMemberInput): RosterMemberColumns {
  switch (input.type) {
    case 'wrestler':
      return {
        type: input.type,
        name: input.name,
        hometown: input.hometown ?? null,
        signatureMove: input.signatureMove ?? null,
      };
    case 'tag_team':
      return { type: input.type, name: input.name, signatureMove: input.signatureMove ?? null };
    case 'referee':
    case 'manager':
      return { type: input.type, firstName: input.firstName, lastName: input.lastName };
  }
}

export function rowToRosterMember(row: RosterMemberRow): RosterMember {
  const base = {
    id: row.id,
    status: row.status,
    deletedAt: row.deletedAt?.toISOString() ?? null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };

  switch (row.type) {
    case 'wrestler':
      return {
        ...base,
        type: 'wrestler',
        name: row.name ?? '',
        hometown: row.hometown ?? undefined,
        signatureMove: row.signatureMove ?? undefined,
      };
    case 'tag_team':
      return {
        ...base,
        type: 'tag_team',
        name: row.name ?? '',
        signatureMove: row.signatureMove ?? undefined,
      };
    case 'referee':
      return { ...base, type: 'referee', firstName: row.firstName ?? '', lastName: row.lastName ?? '' };
    case 'manager':
      return { ...base, type: 'manager', firstName: row.firstName ?? '', lastName: row.lastName ?? '' };
  }
}

export function rowToTitle(row: TitleRow): Title {
  return {
    id: row.id,
    type: 'title',
    name: row.name,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function rowToStable(row: StableRow): Stable {
  return {
    id: row.id,
    type: 'stable',
    name: row.name,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function toEntityRef(type: EntityRef['type'], id: string): EntityRef {
  switch (type) {
    case 'wrestler':
    case 'referee':
    case 'manager':
    case 'tag_team':
    case 'title':
    case 'stable':
      return { type, id };
  }
}

function toClientRef(type: string, id: string, rowId: string): ClientRef | StableMemberRef {
  switch (type) {
    case 'wrestler':
    case 'tag_team':
      return { type, id };
    default:
      throw invalidRow('memberships', rowId, `member type ${type}`);
  }
}

export function rowToPeriod(row: PeriodRow): Period {
  return {
    id: row.id,
    owner: toEntityRef(row.ownerType, row.ownerId),
    kind: row.kind,
    startedAt: row.startedAt.toISOString(),
    endedAt: row.endedAt?.toISOString() ?? null,
    createdAt: row.createdAt.toISOString(),
  };
}

export function rowToChampionship(row: ChampionshipRow): TitleChampionship {
  return {
    id: row.id,
    titleId: row.titleId,
    champion: { type: row.championType, id: row.championId },
    wonAt: row.wonAt.toISOString(),
    lostAt: row.lostAt?.toISOString() ?? null,
  };
}

export function rowToMembership(row: MembershipRow): Membership {
  const base = {
    id: row.id,
    joinedAt: row.joinedAt.toISOString(),
    leftAt: row.leftAt?.toISOString() ?? null,
  };

  switch (row.kind) {
    case 'tag_team_partner':
      if (row.groupType !== 'tag_team' || row.memberType !== 'wrestler') {
        throw invalidRow('memberships', row.id, `${row.groupType} cannot partner ${row.memberType}`);
      }
      return {
        ...base,
        kind: row.kind,
        group: { type: 'tag_team', id: row.groupId },
        member: { type: 'wrestler', id: row.memberId },
      };
    case 'stable_member':
      if (row.groupType !== 'stable') {
        throw invalidRow('memberships', row.id, `group type ${row.groupType}`);
      }
      return {
        ...base,
        kind: row.kind,
        group: { type: 'stable', id: row.groupId },
        member: toClientRef(row.memberType, row.memberId, row.id),
      };
    case 'management':
      if (row.groupType !== 'manager') {
        throw invalidRow('memberships', row.id, `group type ${row.groupType}`);
      }
      return {
        ...base,
        kind: row.kind,
        group: { type: 'manager', id: row.groupId },
        member: toClientRef(row.memberType, row.memberId, row.id),
      };
  }
}
