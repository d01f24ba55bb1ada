// Entity lookups shared by transitions, cascades and memberships

import type {
  ActivatableRef,
  Id,
  RosterMember,
  RosterMemberRef,
  RosterMemberType,
  Stable,
  Title,
} from '@roster/protocol';
import type { ActivatableRepository, RepositoryContext } from '@roster/repositories';
import { EntityNotFoundError } from './errors.js';

export function rosterMemberRef(type: RosterMemberType, id: Id): RosterMemberRef {
  switch (type) {
    case 'wrestler':
    case 'referee':
    case 'manager':
    case 'tag_team':
      return { type, id };
  }
}

export function refOf(member: RosterMember): RosterMemberRef {
  return rosterMemberRef(member.type, member.id);
}

export function isMemberOfType<T extends RosterMemberType>(
  member: RosterMember,
  type: T
): member is Extract<RosterMember, { type: T }> {
  return member.type === type;
}

/**
 * Load a live (not soft-deleted) roster member.
 * @throws EntityNotFoundError
 */
export async function requireRosterMember(
  repos: RepositoryContext,
  ref: RosterMemberRef
): Promise<RosterMember> {
  const member = await repos.rosterMembers.get(ref);
  if (!member) {
    throw new EntityNotFoundError(ref);
  }
  return member;
}

/**
 * A title or stable together with the repository that stores it.
 */
export type ActivatableTarget<T extends Title | Stable> = {
  ref: ActivatableRef;
  repository(repos: RepositoryContext): ActivatableRepository<T>;
};

export function titleTarget(id: Id): ActivatableTarget<Title> {
  return { ref: { type: 'title', id }, repository: (repos) => repos.titles };
}

export function stableTarget(id: Id): ActivatableTarget<Stable> {
  return { ref: { type: 'stable', id }, repository: (repos) => repos.stables };
}

/**
 * @throws EntityNotFoundError
 */
export async function requireActivatable<T extends Title | Stable>(
  repos: RepositoryContext,
  target: ActivatableTarget<T>
): Promise<T> {
  const record = await target.repository(repos).get(target.ref.id);
  if (!record) {
    throw new EntityNotFoundError(target.ref);
  }
  return record;
}
