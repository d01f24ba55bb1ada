// Transition Actions for wrestlers, referees, managers and tag teams

import type {
  ClientRef,
  EmploymentStatus,
  EmploymentTransition,
  RosterMember,
  RosterMemberRef,
  TagTeamRef,
  Timestamp,
} from '@roster/protocol';
import { familyOf, formatRef, isManagement } from '@roster/protocol';
import type { UnitOfWork } from '../context.js';
import { isBefore } from '../clock.js';
import { InvalidEffectiveDateError } from '../errors.js';
import { requireRosterMember } from '../entities.js';
import {
  applyLedgerPlan,
  checkLedgerPlan,
  loadEmploymentHistory,
  rescheduleOpenPeriod,
} from '../ledger/index.js';
import {
  careerStartedAt,
  currentEmploymentStatus,
  projectEmploymentStatus,
  syncEmploymentStatus,
} from '../status/index.js';
import { cascadeEmploymentEnded } from '../cascades/index.js';
import { assertAllowed, employmentRule } from './rules.js';
import { PARTNER_TRANSITIONS, checkTagTeamTransition, currentPartners } from './tag-teams.js';

/**
 * Run one employment transition on a roster member.
 *
 * Order: lock, project, validate, write periods, resync status, cascade.
 * Must run inside a unit of work; any failure rolls every write back.
 *
 * @throws EntityNotFoundError, CannotTransitionError, InvalidEffectiveDateError
 */
export async function transitionRosterMember(
  uow: UnitOfWork,
  ref: RosterMemberRef,
  transition: EmploymentTransition,
  at: Timestamp
): Promise<RosterMember> {
  const { repos } = uow;

  await repos.rosterMembers.lock(ref);
  await requireRosterMember(repos, ref);

  const history = await loadEmploymentHistory(repos.periods, ref);
  const from = projectEmploymentStatus(history, uow.now);
  const rule = employmentRule(familyOf(ref), transition);
  assertAllowed(rule, transition, ref, from);
  if (ref.type === 'tag_team') {
    await checkTagTeamTransition(uow, ref, transition, from);
  }
  await checkLedgerPlan(repos.periods, ref, rule, at);
  if (transition === 'suspend' || transition === 'injure') {
    const employment = await repos.periods.current(ref, 'employment');
    if (employment && isBefore(at, employment.startedAt)) {
      throw new InvalidEffectiveDateError(at, employment.startedAt, 'must not precede the start of the current employment');
    }
  }
  if (transition === 'employ') {
    const unretiredAt = careerStartedAt(history.retirement);
    if (unretiredAt && isBefore(at, unretiredAt)) {
      throw new InvalidEffectiveDateError(at, unretiredAt, 'must not precede the end of the last retirement');
    }
  }

  if (transition === 'employ' && from === 'future_employed') {
    // Pending employment moves instead of opening a second one
    await rescheduleOpenPeriod(repos.periods, ref, 'employment', at);
  } else {
    await applyLedgerPlan(repos.periods, ref, rule, at);
  }

  const updated = await syncEmploymentStatus(repos, ref, uow.now);
  uow.pending.push({
    message: 'Transition committed',
    data: { transition, entity: formatRef(ref), from, to: updated.status, effectiveAt: at },
  });

  if (transition === 'release' || transition === 'retire') {
    await cascadeEmploymentEnded(uow, ref, at);
  }
  if (ref.type === 'tag_team') {
    await propagateToPartners(uow, ref, transition, at);
  }
  if (transition === 'employ' && (ref.type === 'wrestler' || ref.type === 'tag_team')) {
    await employManagers(uow, ref, at);
  }

  return updated;
}

/** Statuses a manager must be in to be employed along with a client. */
const MANAGER_EMPLOYABLE: readonly EmploymentStatus[] = ['unemployed', 'released', 'future_employed'];

/**
 * Employ the current managers of a newly employed client that are not
 * employed yet.
 */
async function employManagers(uow: UnitOfWork, client: ClientRef, at: Timestamp): Promise<void> {
  const rows = await uow.repos.memberships.currentGroups('management', client);
  for (const row of rows.filter(isManagement)) {
    const status = await currentEmploymentStatus(uow.repos, row.group, uow.now);
    if (!MANAGER_EMPLOYABLE.includes(status)) continue;

    uow.logger.debug('Manager follows client', {
      client: formatRef(client),
      manager: formatRef(row.group),
    });
    await transitionRosterMember(uow, row.group, 'employ', at);
  }
}

/**
 * Carry a team's employ, suspend or reinstate over to the partners it applies to.
 */
async function propagateToPartners(
  uow: UnitOfWork,
  team: TagTeamRef,
  transition: EmploymentTransition,
  at: Timestamp
): Promise<void> {
  const eligible = PARTNER_TRANSITIONS[transition];
  if (!eligible) return;

  for (const partner of await currentPartners(uow.repos, team)) {
    const status = await currentEmploymentStatus(uow.repos, partner, uow.now);
    if (!eligible.includes(status)) continue;

    uow.logger.debug('Partner follows tag team', {
      transition,
      team: formatRef(team),
      partner: formatRef(partner),
    });
    await transitionRosterMember(uow, partner, transition, at);
  }
}
