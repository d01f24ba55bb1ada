// Cached status resynchronisation

import type {
  ActivatableRef,
  ActivationStatus,
  EmploymentStatus,
  RosterMember,
  RosterMemberRef,
  Stable,
  Timestamp,
  Title,
} from '@roster/protocol';
import type { RepositoryContext } from '@roster/repositories';
import { loadActivationHistory, loadEmploymentHistory } from '../ledger/index.js';
import type { ActivatableTarget } from '../entities.js';
import { EntityNotFoundError } from '../errors.js';
import { projectActivationStatus, projectEmploymentStatus } from './projector.js';

export async function currentEmploymentStatus(
  repos: RepositoryContext,
  ref: RosterMemberRef,
  now: Timestamp
): Promise<EmploymentStatus> {
  return projectEmploymentStatus(await loadEmploymentHistory(repos.periods, ref), now);
}

export async function currentActivationStatus(
  repos: RepositoryContext,
  ref: ActivatableRef
): Promise<ActivationStatus> {
  return projectActivationStatus(await loadActivationHistory(repos.periods, ref));
}

/**
 * Re-project a roster member's status and store it.
 */
export async function syncEmploymentStatus(
  repos: RepositoryContext,
  ref: RosterMemberRef,
  now: Timestamp
): Promise<RosterMember> {
  const status = await currentEmploymentStatus(repos, ref, now);
  const updated = await repos.rosterMembers.setStatus(ref, status);
  if (!updated) {
    throw new EntityNotFoundError(ref);
  }
  return updated;
}

/**
 * Re-project a title's or stable's status and store it.
 */
export async function syncActivationStatus<T extends Title | Stable>(
  repos: RepositoryContext,
  target: ActivatableTarget<T>
): Promise<T> {
  const status = await currentActivationStatus(repos, target.ref);
  const updated = await target.repository(repos).setStatus(target.ref.id, status);
  if (!updated) {
    throw new EntityNotFoundError(target.ref);
  }
  return updated;
}
