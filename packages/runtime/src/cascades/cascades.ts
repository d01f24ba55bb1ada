// Cascade Engine
//
// Consequences of a committed transition for related entities. Runs inside
// the same unit of work, after the ledger write and status resync it depends
// on. Injury and suspension never cascade.

import type {
  ChampionRef,
  EntityRef,
  Id,
  Membership,
  MembershipKind,
  RosterMemberRef,
  StableRef,
  Timestamp,
  TitleChampionship,
} from '@roster/protocol';
import { formatRef, isChampionRef } from '@roster/protocol';
import type { UnitOfWork } from '../context.js';
import { isAfter, isBefore } from '../clock.js';
import { InvalidEffectiveDateError } from '../errors.js';

/**
 * End the open reign of a title at `at`.
 * @returns The closed reign, or null when the title was vacant
 * @throws InvalidEffectiveDateError unless `at` falls after the reign began
 */
export async function endReign(
  uow: UnitOfWork,
  titleId: Id,
  at: Timestamp
): Promise<TitleChampionship | null> {
  const reign = await uow.repos.championships.current(titleId);
  if (!reign) return null;

  if (!isAfter(at, reign.wonAt)) {
    throw new InvalidEffectiveDateError(at, reign.wonAt, 'must fall after the start of the reign');
  }

  const closed = await uow.repos.championships.endOpen(titleId, at);
  uow.logger.debug('Title vacated', {
    titleId,
    champion: formatRef(reign.champion),
    lostAt: at,
  });
  return closed;
}

/**
 * End one open membership row at `at`.
 * @throws InvalidEffectiveDateError when `at` precedes the membership
 */
export async function closeMembership(
  uow: UnitOfWork,
  membership: Membership,
  at: Timestamp
): Promise<Membership | null> {
  if (isBefore(at, membership.joinedAt)) {
    throw new InvalidEffectiveDateError(
      at,
      membership.joinedAt,
      `must not precede the start of ${membership.kind} membership ${membership.id}`
    );
  }

  const closed = await uow.repos.memberships.detachOpen(
    membership.kind,
    membership.group,
    membership.member,
    at
  );
  uow.logger.debug('Membership ended', {
    kind: membership.kind,
    group: formatRef(membership.group),
    member: formatRef(membership.member),
    leftAt: at,
  });
  return closed;
}

async function vacateTitlesHeldBy(uow: UnitOfWork, champion: ChampionRef, at: Timestamp) {
  const reigns = await uow.repos.championships.currentForChampion(champion);
  for (const reign of reigns) {
    await uow.repos.titles.lock(reign.titleId);
    await endReign(uow, reign.titleId, at);
  }
}

async function leaveGroups(
  uow: UnitOfWork,
  kind: MembershipKind,
  member: EntityRef,
  at: Timestamp
) {
  for (const membership of await uow.repos.memberships.currentGroups(kind, member)) {
    await closeMembership(uow, membership, at);
  }
}

async function dismissMembers(
  uow: UnitOfWork,
  kind: MembershipKind,
  group: EntityRef,
  at: Timestamp
) {
  for (const membership of await uow.repos.memberships.currentMembers(kind, group)) {
    await closeMembership(uow, membership, at);
  }
}

/**
 * Release or retirement of a roster member: vacate its titles and end every
 * relationship it takes part in.
 */
export async function cascadeEmploymentEnded(
  uow: UnitOfWork,
  ref: RosterMemberRef,
  at: Timestamp
): Promise<void> {
  if (isChampionRef(ref)) {
    await vacateTitlesHeldBy(uow, ref, at);
  }

  switch (ref.type) {
    case 'wrestler':
      await leaveGroups(uow, 'tag_team_partner', ref, at);
      await leaveGroups(uow, 'stable_member', ref, at);
      await leaveGroups(uow, 'management', ref, at);
      break;
    case 'tag_team':
      await dismissMembers(uow, 'tag_team_partner', ref, at);
      await leaveGroups(uow, 'stable_member', ref, at);
      await leaveGroups(uow, 'management', ref, at);
      break;
    case 'manager':
      await dismissMembers(uow, 'management', ref, at);
      break;
    case 'referee':
      break;
  }
}

/**
 * Retirement of a title ends its current reign. The champion's own status is
 * left alone.
 */
export async function cascadeTitleRetired(
  uow: UnitOfWork,
  titleId: Id,
  at: Timestamp
): Promise<void> {
  await endReign(uow, titleId, at);
}

/**
 * Deactivation or retirement of a stable ends every current membership.
 */
export async function cascadeStableClosed(
  uow: UnitOfWork,
  stable: StableRef,
  at: Timestamp
): Promise<void> {
  await dismissMembers(uow, 'stable_member', stable, at);
}
