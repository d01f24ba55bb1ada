// Roster lifecycle: the public surface of the runtime
//
// One callable per transition and entity family, plus registration,
// championships, memberships and bookability. Every mutating call is one
// unit of work: validated, serialised per entity, and applied atomically.

import type {
  ActivationTransition,
  ChampionRef,
  ClientRef,
  EmploymentTransition,
  EntityRef,
  Id,
  Manager,
  Membership,
  Period,
  Referee,
  RosterMember,
  RosterMemberRef,
  RosterMemberType,
  Stable,
  StableMemberRef,
  TagTeam,
  Title,
  TitleChampionship,
  Wrestler,
} from '@roster/protocol';
import { formatRef, reignLengthInDays } from '@roster/protocol';
import type {
  ActivatableRepository,
  CreateActivatableInput,
  RepositoryContext,
} from '@roster/repositories';
import {
  resolveContext,
  runUnitOfWork,
  type LifecycleContext,
  type RosterLifecycleOptions,
} from './context.js';
import {
  isMemberOfType,
  rosterMemberRef,
  stableTarget,
  titleTarget,
  type ActivatableTarget,
} from './entities.js';
import { DuplicateEntityError, EntityNotFoundError } from './errors.js';
import {
  createActivatableSchema,
  parseChampionRef,
  parseEffectiveDate,
  parseEntityId,
  parseInput,
  parseRosterMemberRef,
  type EffectiveDate,
} from './input.js';
import { transitionActivatable, transitionRosterMember } from './transitions/index.js';
import { awardTitle, vacateTitle } from './championships/index.js';
import {
  addStableMember,
  addTagTeamPartner,
  assignClient,
  removeClient,
  removeStableMember,
  removeTagTeamPartner,
} from './memberships/index.js';
import {
  deleteRosterMember,
  isBookable,
  listAvailable,
  refreshStatus,
  registerRosterMember,
  registerRosterMemberSchema,
  restoreRosterMember,
  type RegisterRosterMemberInput,
} from './roster/index.js';

/**
 * A transition callable: `(entityId, effectiveDate?)`, defaulting the date to now.
 */
export type TransitionFn<T> = (entityId: Id, effectiveDate?: EffectiveDate) => Promise<T>;

export type EmploymentActions<T extends RosterMember> = {
  [K in EmploymentTransition]: TransitionFn<T>;
} & {
  get(entityId: Id): Promise<T | null>;
};

export type ActivationActions<T extends Title | Stable> = {
  [K in ActivationTransition]: TransitionFn<T>;
} & {
  create(input: CreateActivatableInput): Promise<T>;
  get(entityId: Id): Promise<T | null>;
};

export type RosterLifecycle = {
  wrestlers: EmploymentActions<Wrestler>;
  referees: EmploymentActions<Referee>;
  managers: EmploymentActions<Manager>;
  tagTeams: EmploymentActions<TagTeam>;
  titles: ActivationActions<Title>;
  stables: ActivationActions<Stable>;

  // Registration and soft deletion
  register(
    input: RegisterRosterMemberInput,
    options?: { employedAt?: EffectiveDate }
  ): Promise<RosterMember>;
  deleteRosterMember(ref: RosterMemberRef, at?: EffectiveDate): Promise<RosterMember>;
  restoreRosterMember(ref: RosterMemberRef): Promise<RosterMember>;
  refreshStatus(ref: RosterMemberRef): Promise<RosterMember>;
  getRosterMember(ref: RosterMemberRef): Promise<RosterMember | null>;
  periods(ref: EntityRef): Promise<Period[]>;

  // Championships
  awardTitle(titleId: Id, champion: ChampionRef, wonAt?: EffectiveDate): Promise<TitleChampionship>;
  vacateTitle(titleId: Id, at?: EffectiveDate): Promise<TitleChampionship | null>;
  currentChampionship(titleId: Id): Promise<TitleChampionship | null>;
  reignLength(championship: Pick<TitleChampionship, 'wonAt' | 'lostAt'>): number;

  // Memberships
  addTagTeamPartner(tagTeamId: Id, wrestlerId: Id, joinedAt?: EffectiveDate): Promise<Membership>;
  removeTagTeamPartner(tagTeamId: Id, wrestlerId: Id, leftAt?: EffectiveDate): Promise<Membership>;
  addStableMember(stableId: Id, member: StableMemberRef, joinedAt?: EffectiveDate): Promise<Membership>;
  removeStableMember(stableId: Id, member: StableMemberRef, leftAt?: EffectiveDate): Promise<Membership>;
  assignClient(managerId: Id, client: ClientRef, at?: EffectiveDate): Promise<Membership>;
  removeClient(managerId: Id, client: ClientRef, at?: EffectiveDate): Promise<Membership>;

  // Bookability
  isBookable(ref: RosterMemberRef): Promise<boolean>;
  listAvailable(type: RosterMemberType): Promise<RosterMember[]>;
};

function employmentActions<T extends RosterMemberType>(
  ctx: LifecycleContext,
  type: T
): EmploymentActions<Extract<RosterMember, { type: T }>> {
  const run =
    (transition: EmploymentTransition): TransitionFn<Extract<RosterMember, { type: T }>> =>
    (entityId, effectiveDate) =>
      runUnitOfWork(ctx, transition, `${type}:${String(entityId)}`, async (uow) => {
        const ref = rosterMemberRef(type, parseEntityId(entityId));
        const at = parseEffectiveDate(effectiveDate, uow.now);
        const member = await transitionRosterMember(uow, ref, transition, at);
        if (!isMemberOfType(member, type)) {
          throw new EntityNotFoundError(ref);
        }
        return member;
      });

  return {
    employ: run('employ'),
    release: run('release'),
    suspend: run('suspend'),
    reinstate: run('reinstate'),
    injure: run('injure'),
    clearInjury: run('clearInjury'),
    retire: run('retire'),
    unretire: run('unretire'),
    async get(entityId) {
      const member = await ctx.repos.rosterMembers.get(rosterMemberRef(type, parseEntityId(entityId)));
      return member && isMemberOfType(member, type) ? member : null;
    },
  };
}

function activationActions<T extends Title | Stable>(
  ctx: LifecycleContext,
  type: 'title' | 'stable',
  target: (id: Id) => ActivatableTarget<T>,
  repository: (repos: RepositoryContext) => ActivatableRepository<T>
): ActivationActions<T> {
  const run =
    (transition: ActivationTransition): TransitionFn<T> =>
    (entityId, effectiveDate) =>
      runUnitOfWork(ctx, transition, `${type}:${String(entityId)}`, async (uow) => {
        const at = parseEffectiveDate(effectiveDate, uow.now);
        return transitionActivatable(uow, target(parseEntityId(entityId)), transition, at);
      });

  return {
    activate: run('activate'),
    deactivate: run('deactivate'),
    retire: run('retire'),
    unretire: run('unretire'),
    create(input) {
      return runUnitOfWork(ctx, 'create', `${type}:${input.id ?? 'new'}`, async (uow) => {
        const parsed = parseInput(createActivatableSchema, input);
        if (parsed.id !== undefined && (await repository(uow.repos).get(parsed.id))) {
          throw new DuplicateEntityError({ type, id: parsed.id });
        }
        const record = await repository(uow.repos).create(parsed);
        uow.pending.push({ message: `${type === 'title' ? 'Title' : 'Stable'} created`, data: { id: record.id } });
        return record;
      });
    },
    async get(entityId) {
      return repository(ctx.repos).get(parseEntityId(entityId));
    },
  };
}

/**
 * Create the roster lifecycle over a transactional repository context.
 *
 * @example
 * ```ts
 * const lifecycle = createRosterLifecycle({
 *   repos: createInMemoryRepositoryContext(),
 *   clock: createFixedClock('2024-06-01'),
 * });
 *
 * await lifecycle.register({ type: 'wrestler', id: 'w-1', name: 'Ace' });
 * await lifecycle.wrestlers.employ('w-1', '2024-01-01');
 * await lifecycle.wrestlers.suspend('w-1', '2024-02-01');
 * ```
 */
export function createRosterLifecycle(options: RosterLifecycleOptions): RosterLifecycle {
  const ctx = resolveContext(options);
  const now = () => ctx.clock.now().toISOString();

  return {
    wrestlers: employmentActions(ctx, 'wrestler'),
    referees: employmentActions(ctx, 'referee'),
    managers: employmentActions(ctx, 'manager'),
    tagTeams: employmentActions(ctx, 'tag_team'),
    titles: activationActions(ctx, 'title', titleTarget, (repos) => repos.titles),
    stables: activationActions(ctx, 'stable', stableTarget, (repos) => repos.stables),

    register(input, registerOptions) {
      return runUnitOfWork(ctx, 'register', `${String(input.type)}:${input.id ?? 'new'}`, async (uow) => {
        const parsed = parseInput(registerRosterMemberSchema, input);
        const employedAt =
          registerOptions?.employedAt === undefined
            ? undefined
            : parseEffectiveDate(registerOptions.employedAt, uow.now, 'employedAt');
        return registerRosterMember(uow, parsed, employedAt);
      });
    },

    deleteRosterMember(ref, at) {
      return runUnitOfWork(ctx, 'delete', formatRef(ref), (uow) =>
        deleteRosterMember(uow, parseRosterMemberRef(ref), parseEffectiveDate(at, uow.now, 'at'))
      );
    },

    restoreRosterMember(ref) {
      return runUnitOfWork(ctx, 'restore', formatRef(ref), (uow) =>
        restoreRosterMember(uow, parseRosterMemberRef(ref))
      );
    },

    refreshStatus(ref) {
      return runUnitOfWork(ctx, 'refreshStatus', formatRef(ref), (uow) =>
        refreshStatus(uow, parseRosterMemberRef(ref))
      );
    },

    async getRosterMember(ref) {
      return ctx.repos.rosterMembers.get(parseRosterMemberRef(ref));
    },

    async periods(ref) {
      return ctx.repos.periods.list(ref);
    },

    awardTitle(titleId, champion, wonAt) {
      return runUnitOfWork(ctx, 'awardTitle', `title:${String(titleId)}`, (uow) =>
        awardTitle(
          uow,
          parseEntityId(titleId, 'titleId'),
          parseChampionRef(champion, 'champion'),
          parseEffectiveDate(wonAt, uow.now, 'wonAt')
        )
      );
    },

    vacateTitle(titleId, at) {
      return runUnitOfWork(ctx, 'vacateTitle', `title:${String(titleId)}`, (uow) =>
        vacateTitle(uow, parseEntityId(titleId, 'titleId'), parseEffectiveDate(at, uow.now, 'at'))
      );
    },

    async currentChampionship(titleId) {
      return ctx.repos.championships.current(parseEntityId(titleId, 'titleId'));
    },

    reignLength(championship) {
      return reignLengthInDays(championship, now());
    },

    addTagTeamPartner(tagTeamId, wrestlerId, joinedAt) {
      return runUnitOfWork(ctx, 'addTagTeamPartner', `tag_team:${String(tagTeamId)}`, (uow) =>
        addTagTeamPartner(
          uow,
          { type: 'tag_team', id: parseEntityId(tagTeamId, 'tagTeamId') },
          { type: 'wrestler', id: parseEntityId(wrestlerId, 'wrestlerId') },
          parseEffectiveDate(joinedAt, uow.now, 'joinedAt')
        )
      );
    },

    removeTagTeamPartner(tagTeamId, wrestlerId, leftAt) {
      return runUnitOfWork(ctx, 'removeTagTeamPartner', `tag_team:${String(tagTeamId)}`, (uow) =>
        removeTagTeamPartner(
          uow,
          { type: 'tag_team', id: parseEntityId(tagTeamId, 'tagTeamId') },
          { type: 'wrestler', id: parseEntityId(wrestlerId, 'wrestlerId') },
          parseEffectiveDate(leftAt, uow.now, 'leftAt')
        )
      );
    },

    addStableMember(stableId, member, joinedAt) {
      return runUnitOfWork(ctx, 'addStableMember', `stable:${String(stableId)}`, (uow) =>
        addStableMember(
          uow,
          { type: 'stable', id: parseEntityId(stableId, 'stableId') },
          parseChampionRef(member, 'member'),
          parseEffectiveDate(joinedAt, uow.now, 'joinedAt')
        )
      );
    },

    removeStableMember(stableId, member, leftAt) {
      return runUnitOfWork(ctx, 'removeStableMember', `stable:${String(stableId)}`, (uow) =>
        removeStableMember(
          uow,
          { type: 'stable', id: parseEntityId(stableId, 'stableId') },
          parseChampionRef(member, 'member'),
          parseEffectiveDate(leftAt, uow.now, 'leftAt')
        )
      );
    },

    assignClient(managerId, client, at) {
      return runUnitOfWork(ctx, 'assignClient', `manager:${String(managerId)}`, (uow) =>
        assignClient(
          uow,
          { type: 'manager', id: parseEntityId(managerId, 'managerId') },
          parseChampionRef(client, 'client'),
          parseEffectiveDate(at, uow.now, 'at')
        )
      );
    },

    removeClient(managerId, client, at) {
      return runUnitOfWork(ctx, 'removeClient', `manager:${String(managerId)}`, (uow) =>
        removeClient(
          uow,
          { type: 'manager', id: parseEntityId(managerId, 'managerId') },
          parseChampionRef(client, 'client'),
          parseEffectiveDate(at, uow.now, 'at')
        )
      );
    },

    async isBookable(ref) {
      return isBookable(ctx.repos, parseRosterMemberRef(ref), now(), ctx.requiredTagTeamPartners);
    },

    async listAvailable(type) {
      return listAvailable(ctx.repos, type, now(), ctx.requiredTagTeamPartners);
    },
  };
}
