import { describe, it, expect } from 'vitest';
import {
  rosterMemberColumns,
  rowToChampionship,
  rowToMembership,
  rowToPeriod,
  rowToRosterMember,
  type MembershipRow,
  type RosterMemberRow,
} from './mappers.js';

const created = new Date('2024-01-01T00:00:00.000Z');

function createMockRosterRow(overrides: Partial<RosterMemberRow> = {}): RosterMemberRow {
  return {
    type: 'wrestler',
    id: 'w-1',
    name: 'The Test Wrestler',
    firstName: null,
    lastName: null,
    hometown: null,
    signatureMove: null,
    status: 'employed',
    deletedAt: null,
    createdAt: created,
    updatedAt: created,
    ...overrides,
  };
}

function createMockMembershipRow(overrides: Partial<MembershipRow> = {}): MembershipRow {
  return {
    id: 'm-1',
    kind: 'stable_member',
    groupType: 'stable',
    groupId: 's-1',
    memberType: 'tag_team',
    memberId: 'tt-1',
    joinedAt: created,
    leftAt: null,
    ...overrides,
  };
}

describe('roster member mapping', () => {
  it('builds a wrestler and drops empty optional columns', () => {
    const member = rowToRosterMember(createMockRosterRow());

    expect(member).toEqual({
      type: 'wrestler',
      id: 'w-1',
      name: 'The Test Wrestler',
      hometown: undefined,
      signatureMove: undefined,
      status: 'employed',
      deletedAt: null,
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('builds a referee from name columns', () => {
    const member = rowToRosterMember(
      createMockRosterRow({ type: 'referee', name: null, firstName: 'Sam', lastName: 'Stripes' })
    );

    expect(member.type).toBe('referee');
    if (member.type === 'referee') {
      expect(member.firstName).toBe('Sam');
      expect(member.lastName).toBe('Stripes');
    }
  });

  it('carries the soft deletion timestamp', () => {
    const member = rowToRosterMember(
      createMockRosterRow({ deletedAt: new Date('2024-05-01T12:00:00.000Z') })
    );
    expect(member.deletedAt).toBe('2024-05-01T12:00:00.000Z');
  });

  it('maps creation input to columns', () => {
    expect(rosterMemberColumns({ type: 'manager', firstName: 'Pat', lastName: 'Smart' })).toEqual({
      type: 'manager',
      firstName: 'Pat',
      lastName: 'Smart',
    });
    expect(rosterMemberColumns({ type: 'wrestler', name: 'Ace', hometown: 'Springfield' })).toEqual({
      type: 'wrestler',
      name: 'Ace',
      hometown: 'Springfield',
      signatureMove: null,
    });
  });
});

describe('period mapping', () => {
  it('rebuilds the owner reference and ISO timestamps', () => {
    const period = rowToPeriod({
      id: 'p-1',
      ownerType: 'tag_team',
      ownerId: 'tt-1',
      kind: 'employment',
      startedAt: created,
      endedAt: new Date('2024-02-01T00:00:00.000Z'),
      createdAt: created,
    });

    expect(period).toEqual({
      id: 'p-1',
      owner: { type: 'tag_team', id: 'tt-1' },
      kind: 'employment',
      startedAt: '2024-01-01T00:00:00.000Z',
      endedAt: '2024-02-01T00:00:00.000Z',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
  });
});

describe('championship mapping', () => {
  it('keeps an open reign open', () => {
    const championship = rowToChampionship({
      id: 'c-1',
      titleId: 't-1',
      championType: 'wrestler',
      championId: 'w-1',
      wonAt: created,
      lostAt: null,
    });

    expect(championship.champion).toEqual({ type: 'wrestler', id: 'w-1' });
    expect(championship.lostAt).toBeNull();
  });
});

describe('membership mapping', () => {
  it('resolves a tag team stable member', () => {
    const membership = rowToMembership(createMockMembershipRow());

    expect(membership).toEqual({
      id: 'm-1',
      kind: 'stable_member',
      group: { type: 'stable', id: 's-1' },
      member: { type: 'tag_team', id: 'tt-1' },
      joinedAt: '2024-01-01T00:00:00.000Z',
      leftAt: null,
    });
  });

  it('resolves a management row', () => {
    const membership = rowToMembership(
      createMockMembershipRow({
        kind: 'management',
        groupType: 'manager',
        groupId: 'mg-1',
        memberType: 'wrestler',
        memberId: 'w-1',
      })
    );

    expect(membership.group).toEqual({ type: 'manager', id: 'mg-1' });
    expect(membership.member).toEqual({ type: 'wrestler', id: 'w-1' });
  });

  it('rejects a tag team partner that is not a wrestler', () => {
    expect(() =>
      rowToMembership(
        createMockMembershipRow({ kind: 'tag_team_partner', groupType: 'tag_team' })
      )
    ).toThrow('Invalid memberships row m-1: tag_team cannot partner tag_team');
  });

  it('rejects a stable member of an unknown type', () => {
    expect(() => rowToMembership(createMockMembershipRow({ memberType: 'referee' }))).toThrow(
      'Invalid memberships row m-1: member type referee'
    );
  });

  it('rejects a group of the wrong type', () => {
    expect(() => rowToMembership(createMockMembershipRow({ groupType: 'tag_team' }))).toThrow(
      'Invalid memberships row m-1: group type tag_team'
    );
  });
});
