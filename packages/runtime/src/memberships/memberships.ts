// Tag team partners, stable members and manager clients
//
// A member is in at most one tag team and one stable at a time, a team holds
// at most the required number of partners, retired entities cannot join, and a
// new membership may not start before the previous one of the same kind ended.

import type {
  ClientRef,
  EntityRef,
  ManagerRef,
  Membership,
  MembershipKind,
  RosterMemberRef,
  StableMemberRef,
  StableRef,
  TagTeamRef,
  Timestamp,
  WrestlerRef,
} from '@roster/protocol';
import { formatRef, sameRef } from '@roster/protocol';
import type { AttachMembershipInput } from '@roster/repositories';
import type { UnitOfWork } from '../context.js';
import { isAfter } from '../clock.js';
import { requireActivatable, requireRosterMember, stableTarget } from '../entities.js';
import { EntityNotFoundError, MembershipConflictError } from '../errors.js';
import { closeMembership } from '../cascades/index.js';
import { currentActivationStatus, currentEmploymentStatus } from '../status/index.js';
import { currentPartners } from '../transitions/index.js';

async function assertActiveRosterMember(
  uow: UnitOfWork,
  group: EntityRef,
  member: EntityRef,
  ref: RosterMemberRef
): Promise<void> {
  await requireRosterMember(uow.repos, ref);
  if ((await currentEmploymentStatus(uow.repos, ref, uow.now)) === 'retired') {
    throw new MembershipConflictError(group, member, `${formatRef(ref)} is retired`);
  }
}

/**
 * The member's last membership of this kind (optionally within one group)
 * must have ended by `at`.
 */
async function assertJoinsAfterPrevious(
  uow: UnitOfWork,
  kind: MembershipKind,
  group: EntityRef,
  member: EntityRef,
  at: Timestamp,
  sameGroupOnly: boolean
): Promise<void> {
  const rows = await uow.repos.memberships.listForMember(kind, member);
  for (const row of rows) {
    if (sameGroupOnly && !sameRef(row.group, group)) continue;
    if (row.leftAt !== null && isAfter(row.leftAt, at)) {
      throw new MembershipConflictError(
        group,
        member,
        `joins at ${at}, before its previous ${kind} membership ended at ${row.leftAt}`
      );
    }
  }
}

async function join(uow: UnitOfWork, input: AttachMembershipInput): Promise<Membership> {
  const membership = await uow.repos.memberships.attach(input);
  uow.pending.push({
    message: 'Membership started',
    data: {
      kind: input.kind,
      group: formatRef(input.group),
      member: formatRef(input.member),
      joinedAt: input.joinedAt,
    },
  });
  return membership;
}

async function leave(
  uow: UnitOfWork,
  kind: MembershipKind,
  group: EntityRef,
  member: EntityRef,
  at: Timestamp
): Promise<Membership> {
  const rows = await uow.repos.memberships.currentMembers(kind, group);
  const row = rows.find((m) => sameRef(m.member, member));
  if (!row) {
    throw new EntityNotFoundError(`${kind} membership of ${formatRef(member)} in ${formatRef(group)}`);
  }

  const closed = await closeMembership(uow, row, at);
  if (!closed) {
    throw new EntityNotFoundError(`${kind} membership ${row.id}`);
  }
  uow.pending.push({
    message: 'Membership ended',
    data: { kind, group: formatRef(group), member: formatRef(member), leftAt: at },
  });
  return closed;
}

// --- Tag teams ---

export async function addTagTeamPartner(
  uow: UnitOfWork,
  team: TagTeamRef,
  wrestler: WrestlerRef,
  at: Timestamp
): Promise<Membership> {
  await uow.repos.rosterMembers.lock(team);
  await uow.repos.rosterMembers.lock(wrestler);
  await assertActiveRosterMember(uow, team, wrestler, team);
  await assertActiveRosterMember(uow, team, wrestler, wrestler);

  const [currentTeam] = await uow.repos.memberships.currentGroups('tag_team_partner', wrestler);
  if (currentTeam) {
    throw new MembershipConflictError(
      team,
      wrestler,
      sameRef(currentTeam.group, team)
        ? 'already a partner of this tag team'
        : `already a partner in ${formatRef(currentTeam.group)}`
    );
  }

  const partners = await currentPartners(uow.repos, team);
  if (partners.length >= uow.requiredTagTeamPartners) {
    throw new MembershipConflictError(
      team,
      wrestler,
      `tag team already has ${partners.length} partners`
    );
  }

  await assertJoinsAfterPrevious(uow, 'tag_team_partner', team, wrestler, at, false);
  return join(uow, { kind: 'tag_team_partner', group: team, member: wrestler, joinedAt: at });
}

export async function removeTagTeamPartner(
  uow: UnitOfWork,
  team: TagTeamRef,
  wrestler: WrestlerRef,
  at: Timestamp
): Promise<Membership> {
  await uow.repos.rosterMembers.lock(team);
  await uow.repos.rosterMembers.lock(wrestler);
  return leave(uow, 'tag_team_partner', team, wrestler, at);
}

// --- Stables ---

export async function addStableMember(
  uow: UnitOfWork,
  stable: StableRef,
  member: StableMemberRef,
  at: Timestamp
): Promise<Membership> {
  const target = stableTarget(stable.id);
  await uow.repos.stables.lock(stable.id);
  await uow.repos.rosterMembers.lock(member);
  await requireActivatable(uow.repos, target);

  if ((await currentActivationStatus(uow.repos, stable)) === 'retired') {
    throw new MembershipConflictError(stable, member, `${formatRef(stable)} is retired`);
  }
  await assertActiveRosterMember(uow, stable, member, member);

  const [currentStable] = await uow.repos.memberships.currentGroups('stable_member', member);
  if (currentStable) {
    throw new MembershipConflictError(
      stable,
      member,
      `already a member of ${formatRef(currentStable.group)}`
    );
  }

  await assertJoinsAfterPrevious(uow, 'stable_member', stable, member, at, false);
  return join(uow, { kind: 'stable_member', group: stable, member, joinedAt: at });
}

export async function removeStableMember(
  uow: UnitOfWork,
  stable: StableRef,
  member: StableMemberRef,
  at: Timestamp
): Promise<Membership> {
  await uow.repos.stables.lock(stable.id);
  await uow.repos.rosterMembers.lock(member);
  return leave(uow, 'stable_member', stable, member, at);
}

// --- Managers ---

export async function assignClient(
  uow: UnitOfWork,
  manager: ManagerRef,
  client: ClientRef,
  at: Timestamp
): Promise<Membership> {
  await uow.repos.rosterMembers.lock(manager);
  await uow.repos.rosterMembers.lock(client);
  await assertActiveRosterMember(uow, manager, client, manager);
  await assertActiveRosterMember(uow, manager, client, client);

  const current = await uow.repos.memberships.currentGroups('management', client);
  if (current.some((row) => sameRef(row.group, manager))) {
    throw new MembershipConflictError(manager, client, 'already managed by this manager');
  }

  await assertJoinsAfterPrevious(uow, 'management', manager, client, at, true);
  return join(uow, { kind: 'management', group: manager, member: client, joinedAt: at });
}

export async function removeClient(
  uow: UnitOfWork,
  manager: ManagerRef,
  client: ClientRef,
  at: Timestamp
): Promise<Membership> {
  await uow.repos.rosterMembers.lock(manager);
  await uow.repos.rosterMembers.lock(client);
  return leave(uow, 'management', manager, client, at);
}
