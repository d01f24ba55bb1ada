// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
// - Prototyping against the runtime
//
// Data does not persist between restarts.

import type {
  EntityRef,
  Membership,
  Period,
  RosterMember,
  Stable,
  Timestamp,
  Title,
  TitleChampionship,
} from '@roster/protocol';
import { formatRef, sameRef } from '@roster/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  RosterMemberRepository,
  ActivatableRepository,
  PeriodRepository,
  ChampionshipRepository,
  MembershipRepository,
  CreateRosterMemberInput,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  /** Keyed by `type:id` */
  rosterMembers: Map<string, RosterMember>;
  titles: Map<string, Title>;
  stables: Map<string, Stable>;
  periods: Map<string, Period>;
  championships: Map<string, TitleChampionship>;
  memberships: Map<string, Membership>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function byTimestamp(a: Timestamp, b: Timestamp): number {
  return new Date(a).getTime() - new Date(b).getTime();
}

function buildRosterMember(
  input: CreateRosterMemberInput,
  id: string,
  now: Timestamp
): RosterMember {
  const base = { id, status: 'unemployed' as const, deletedAt: null, createdAt: now, updatedAt: now };
  switch (input.type) {
    case 'wrestler':
      return {
        ...base,
        type: 'wrestler',
        name: input.name,
        hometown: input.hometown,
        signatureMove: input.signatureMove,
      };
    case 'referee':
      return { ...base, type: 'referee', firstName: input.firstName, lastName: input.lastName };
    case 'manager':
      return { ...base, type: 'manager', firstName: input.firstName, lastName: input.lastName };
    case 'tag_team':
      return { ...base, type: 'tag_team', name: input.name, signatureMove: input.signatureMove };
  }
}

/** First `${prefix}-N` id, counting from the store size, that is not taken. */
function nextId(prefix: string, size: number, taken: (id: string) => boolean): string {
  let n = size + 1;
  while (taken(`${prefix}-${n}`)) n++;
  return `${prefix}-${n}`;
}

function createActivatableRepository<T extends Title | Stable>(
  store: Map<string, T>,
  build: (id: string, name: string, now: Timestamp) => T,
  prefix: string,
  label: string
): ActivatableRepository<T> {
  return {
    async create(input) {
      const id = input.id ?? nextId(prefix, store.size, (candidate) => store.has(candidate));
      if (store.has(id)) {
        throw new Error(`${label} already exists: ${id}`);
      }
      const record = build(id, input.name, new Date().toISOString());
      store.set(id, record);
      return { ...record };
    },
    async get(id) {
      const record = store.get(id);
      return record ? { ...record } : null;
    },
    async list(filter) {
      let result = Array.from(store.values());
      if (filter?.status) {
        const statuses = filter.status;
        result = result.filter((r) => statuses.includes(r.status));
      }
      const offset = filter?.offset ?? 0;
      result = result.slice(offset, filter?.limit ? offset + filter.limit : undefined);
      return result.map((r) => ({ ...r }));
    },
    async setStatus(id, status) {
      const record = store.get(id);
      if (!record) return null;
      record.status = status;
      record.updatedAt = new Date().toISOString();
      return { ...record };
    },
    async lock() {
      // Transactions are serialized; there is nothing further to hold.
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * Transactions are serialized one after another and roll back by restoring a
 * snapshot of every store when the callback throws. They are not re-entrant:
 * calling `transaction` from inside a transaction callback never resolves.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * // Use like any other repository context
 * const wrestler = await repos.rosterMembers.create({ type: 'wrestler', name: 'Test' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.periods.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const rosterMembers = new Map<string, RosterMember>();
  const titles = new Map<string, Title>();
  const stables = new Map<string, Stable>();
  const periods = new Map<string, Period>();
  const championships = new Map<string, TitleChampionship>();
  const memberships = new Map<string, Membership>();

  const data: InMemoryDataStore = {
    rosterMembers,
    titles,
    stables,
    periods,
    championships,
    memberships,
  };

  // Roster member repository
  const rosterMemberRepo: RosterMemberRepository = {
    async create(input) {
      const id =
        input.id ??
        nextId(input.type.replace('_', '-'), rosterMembers.size, (candidate) =>
          rosterMembers.has(formatRef({ type: input.type, id: candidate }))
        );
      const key = formatRef({ type: input.type, id });
      if (rosterMembers.has(key)) {
        throw new Error(`Roster member already exists: ${key}`);
      }
      const member = buildRosterMember(input, id, new Date().toISOString());
      rosterMembers.set(key, member);
      return { ...member };
    },
    async get(ref, options) {
      const member = rosterMembers.get(formatRef(ref));
      if (!member) return null;
      if (member.deletedAt !== null && !options?.includeDeleted) return null;
      return { ...member };
    },
    async list(filter) {
      let result = Array.from(rosterMembers.values());
      if (filter?.type) {
        result = result.filter((m) => m.type === filter.type);
      }
      if (filter?.status) {
        const statuses = filter.status;
        result = result.filter((m) => statuses.includes(m.status));
      }
      if (!filter?.includeDeleted) {
        result = result.filter((m) => m.deletedAt === null);
      }
      const offset = filter?.offset ?? 0;
      result = result.slice(offset, filter?.limit ? offset + filter.limit : undefined);
      return result.map((m) => ({ ...m }));
    },
    async setStatus(ref, status) {
      const member = rosterMembers.get(formatRef(ref));
      if (!member) return null;
      member.status = status;
      member.updatedAt = new Date().toISOString();
      return { ...member };
    },
    async softDelete(ref, deletedAt) {
      const member = rosterMembers.get(formatRef(ref));
      if (!member) return null;
      member.deletedAt = deletedAt;
      member.updatedAt = new Date().toISOString();
      return { ...member };
    },
    async restore(ref) {
      const member = rosterMembers.get(formatRef(ref));
      if (!member) return null;
      member.deletedAt = null;
      member.updatedAt = new Date().toISOString();
      return { ...member };
    },
    async lock() {
      // Transactions are serialized; there is nothing further to hold.
    },
  };

  // Title and stable repositories
  const titleRepo = createActivatableRepository<Title>(
    titles,
    (id, name, now) => ({ id, type: 'title', name, status: 'unactivated', createdAt: now, updatedAt: now }),
    'title',
    'Title'
  );
  const stableRepo = createActivatableRepository<Stable>(
    stables,
    (id, name, now) => ({ id, type: 'stable', name, status: 'unactivated', createdAt: now, updatedAt: now }),
    'stable',
    'Stable'
  );

  // Period ledger
  const findOpenPeriod = (owner: EntityRef, kind: Period['kind']): Period | undefined =>
    Array.from(periods.values()).find(
      (p) => p.kind === kind && p.endedAt === null && sameRef(p.owner, owner)
    );

  const periodRepo: PeriodRepository = {
    async create(input) {
      if (findOpenPeriod(input.owner, input.kind)) {
        throw new Error(
          `Open ${input.kind} period already exists for ${formatRef(input.owner)}`
        );
      }
      const id = input.id ?? `period-${periods.size + 1}`;
      const period: Period = {
        id,
        owner: { ...input.owner },
        kind: input.kind,
        startedAt: input.startedAt,
        endedAt: null,
        createdAt: new Date().toISOString(),
      };
      periods.set(id, period);
      return { ...period };
    },
    async endOpen(owner, kind, endedAt) {
      const period = findOpenPeriod(owner, kind);
      if (!period) return null;
      period.endedAt = endedAt;
      return { ...period };
    },
    async current(owner, kind) {
      const period = findOpenPeriod(owner, kind);
      return period ? { ...period } : null;
    },
    async previous(owner, kind) {
      return Array.from(periods.values())
        .filter((p) => p.kind === kind && p.endedAt !== null && sameRef(p.owner, owner))
        .sort((a, b) => byTimestamp(b.startedAt, a.startedAt))
        .map((p) => ({ ...p }));
    },
    async list(owner, kind) {
      return Array.from(periods.values())
        .filter((p) => sameRef(p.owner, owner) && (kind === undefined || p.kind === kind))
        .sort((a, b) => byTimestamp(a.startedAt, b.startedAt))
        .map((p) => ({ ...p }));
    },
    async reschedule(periodId, startedAt) {
      const period = periods.get(periodId);
      if (!period) return null;
      period.startedAt = startedAt;
      return { ...period };
    },
  };

  // Championship repository
  const findOpenChampionship = (titleId: string): TitleChampionship | undefined =>
    Array.from(championships.values()).find((c) => c.titleId === titleId && c.lostAt === null);

  const championshipRepo: ChampionshipRepository = {
    async create(input) {
      if (findOpenChampionship(input.titleId)) {
        throw new Error(`Title already has an open championship: ${input.titleId}`);
      }
      const id = input.id ?? `championship-${championships.size + 1}`;
      const championship: TitleChampionship = {
        id,
        titleId: input.titleId,
        champion: { ...input.champion },
        wonAt: input.wonAt,
        lostAt: null,
      };
      championships.set(id, championship);
      return { ...championship };
    },
    async endOpen(titleId, lostAt) {
      const championship = findOpenChampionship(titleId);
      if (!championship) return null;
      championship.lostAt = lostAt;
      return { ...championship };
    },
    async current(titleId) {
      const championship = findOpenChampionship(titleId);
      return championship ? { ...championship } : null;
    },
    async currentForChampion(champion) {
      return Array.from(championships.values())
        .filter((c) => c.lostAt === null && sameRef(c.champion, champion))
        .map((c) => ({ ...c }));
    },
    async listForTitle(titleId) {
      return Array.from(championships.values())
        .filter((c) => c.titleId === titleId)
        .sort((a, b) => byTimestamp(a.wonAt, b.wonAt))
        .map((c) => ({ ...c }));
    },
    async listForChampion(champion) {
      return Array.from(championships.values())
        .filter((c) => sameRef(c.champion, champion))
        .sort((a, b) => byTimestamp(a.wonAt, b.wonAt))
        .map((c) => ({ ...c }));
    },
  };

  // Membership repository
  const membershipRepo: MembershipRepository = {
    async attach(input) {
      const id = input.id ?? `membership-${memberships.size + 1}`;
      const membership: Membership = { ...input, id, leftAt: null };
      memberships.set(id, membership);
      return { ...membership };
    },
    async detachOpen(kind, group, member, leftAt) {
      const membership = Array.from(memberships.values()).find(
        (m) =>
          m.kind === kind &&
          m.leftAt === null &&
          sameRef(m.group, group) &&
          sameRef(m.member, member)
      );
      if (!membership) return null;
      membership.leftAt = leftAt;
      return { ...membership };
    },
    async currentMembers(kind, group) {
      return Array.from(memberships.values())
        .filter((m) => m.kind === kind && m.leftAt === null && sameRef(m.group, group))
        .sort((a, b) => byTimestamp(a.joinedAt, b.joinedAt))
        .map((m) => ({ ...m }));
    },
    async currentGroups(kind, member) {
      return Array.from(memberships.values())
        .filter((m) => m.kind === kind && m.leftAt === null && sameRef(m.member, member))
        .sort((a, b) => byTimestamp(a.joinedAt, b.joinedAt))
        .map((m) => ({ ...m }));
    },
    async listForGroup(kind, group) {
      return Array.from(memberships.values())
        .filter((m) => m.kind === kind && sameRef(m.group, group))
        .sort((a, b) => byTimestamp(a.joinedAt, b.joinedAt))
        .map((m) => ({ ...m }));
    },
    async listForMember(kind, member) {
      return Array.from(memberships.values())
        .filter((m) => m.kind === kind && sameRef(m.member, member))
        .sort((a, b) => byTimestamp(a.joinedAt, b.joinedAt))
        .map((m) => ({ ...m }));
    },
  };

  // Build context
  const context: RepositoryContext = {
    rosterMembers: rosterMemberRepo,
    titles: titleRepo,
    stables: stableRepo,
    periods: periodRepo,
    championships: championshipRepo,
    memberships: membershipRepo,
  };

  const refill = <V>(target: Map<string, V>, source: Map<string, V>) => {
    target.clear();
    for (const [id, value] of source) {
      target.set(id, value);
    }
  };

  const restore = (snapshot: InMemoryDataStore) => {
    refill(rosterMembers, snapshot.rosterMembers);
    refill(titles, snapshot.titles);
    refill(stables, snapshot.stables);
    refill(periods, snapshot.periods);
    refill(championships, snapshot.championships);
    refill(memberships, snapshot.memberships);
  };

  // Tail of the transaction queue; each transaction waits for the previous one
  let tail: Promise<void> = Promise.resolve();

  return {
    ...context,
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      const run = tail.then(async () => {
        const snapshot = structuredClone(data);
        try {
          return await fn(context);
        } catch (error) {
          restore(snapshot);
          throw error;
        }
      });
      // The caller sees the outcome through `run`; the queue only needs to advance.
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    },
    _data: data,
    clear() {
      rosterMembers.clear();
      titles.clear();
      stables.clear();
      periods.clear();
      championships.clear();
      memberships.clear();
    },
  };
}
