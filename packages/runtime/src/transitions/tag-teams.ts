// Tag team specifics: partners, and the extra checks a team transition needs

import type {
  EmploymentStatus,
  EmploymentTransition,
  TagTeamRef,
  WrestlerRef,
} from '@roster/protocol';
import { formatRef, isTagTeamPartnership } from '@roster/protocol';
import type { RepositoryContext } from '@roster/repositories';
import type { UnitOfWork } from '../context.js';
import { CannotTransitionError } from '../errors.js';
import { currentEmploymentStatus } from '../status/index.js';

/**
 * Partners that follow a team transition, keyed by transition, with the
 * statuses a partner must be in to follow.
 */
export const PARTNER_TRANSITIONS: Partial<Record<EmploymentTransition, readonly EmploymentStatus[]>> = {
  employ: ['unemployed', 'released', 'future_employed'],
  suspend: ['employed'],
  reinstate: ['suspended'],
};

export async function currentPartners(
  repos: RepositoryContext,
  team: TagTeamRef
): Promise<WrestlerRef[]> {
  const rows = await repos.memberships.currentMembers('tag_team_partner', team);
  return rows.filter(isTagTeamPartnership).map((row) => row.member);
}

/**
 * A team can only be suspended while it has partners and none is injured.
 * @throws CannotTransitionError
 */
export async function checkTagTeamTransition(
  uow: UnitOfWork,
  team: TagTeamRef,
  transition: EmploymentTransition,
  current: EmploymentStatus
): Promise<void> {
  if (transition !== 'suspend') return;

  const partners = await currentPartners(uow.repos, team);
  if (partners.length === 0) {
    throw new CannotTransitionError(transition, team, current, 'tag team has no current partners');
  }

  for (const partner of partners) {
    if ((await currentEmploymentStatus(uow.repos, partner, uow.now)) === 'injured') {
      throw new CannotTransitionError(
        transition,
        team,
        current,
        `partner ${formatRef(partner)} is injured`
      );
    }
  }
}
