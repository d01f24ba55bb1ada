// Championships: awarding and vacating titles

import type { ChampionRef, Id, Timestamp, TitleChampionship } from '@roster/protocol';
import { formatRef, sameRef } from '@roster/protocol';
import type { UnitOfWork } from '../context.js';
import { isAfter, isBefore } from '../clock.js';
import { requireActivatable, requireRosterMember, titleTarget } from '../entities.js';
import { ChampionshipError, InvalidEffectiveDateError } from '../errors.js';
import { endReign } from '../cascades/index.js';
import { isBookable } from '../roster/bookability.js';
import { currentActivationStatus } from '../status/index.js';

/**
 * Crown a new champion, ending the current reign at the same instant.
 *
 * @throws ChampionshipError when the title is not active, the champion is not
 * bookable, or already holds the title
 * @throws InvalidEffectiveDateError when `wonAt` does not follow the previous reign
 */
export async function awardTitle(
  uow: UnitOfWork,
  titleId: Id,
  champion: ChampionRef,
  wonAt: Timestamp
): Promise<TitleChampionship> {
  const { repos } = uow;
  const target = titleTarget(titleId);

  await repos.rosterMembers.lock(champion);
  await repos.titles.lock(titleId);
  await requireActivatable(repos, target);
  await requireRosterMember(repos, champion);

  const titleStatus = await currentActivationStatus(repos, target.ref);
  if (titleStatus !== 'active') {
    throw new ChampionshipError(titleId, `title is ${titleStatus}`);
  }

  if (!(await isBookable(repos, champion, uow.now, uow.requiredTagTeamPartners))) {
    throw new ChampionshipError(titleId, `${formatRef(champion)} is not bookable`);
  }

  const current = await repos.championships.current(titleId);
  if (current) {
    if (sameRef(current.champion, champion)) {
      throw new ChampionshipError(titleId, `${formatRef(champion)} already holds the title`);
    }
    if (!isAfter(wonAt, current.wonAt)) {
      throw new InvalidEffectiveDateError(wonAt, current.wonAt, 'must fall after the start of the current reign');
    }
    await endReign(uow, titleId, wonAt);
  } else {
    const history = await repos.championships.listForTitle(titleId);
    const last = history[history.length - 1];
    if (last?.lostAt && isBefore(wonAt, last.lostAt)) {
      throw new InvalidEffectiveDateError(wonAt, last.lostAt, 'must not precede the end of the previous reign');
    }
  }

  const reign = await repos.championships.create({ titleId, champion, wonAt });
  uow.pending.push({
    message: 'Title awarded',
    data: { titleId, champion: formatRef(champion), wonAt },
  });
  return reign;
}

/**
 * End the current reign, leaving the title vacant.
 * @returns The closed reign, or null when the title was already vacant
 */
export async function vacateTitle(
  uow: UnitOfWork,
  titleId: Id,
  at: Timestamp
): Promise<TitleChampionship | null> {
  await uow.repos.titles.lock(titleId);
  await requireActivatable(uow.repos, titleTarget(titleId));

  const closed = await endReign(uow, titleId, at);
  if (closed) {
    uow.pending.push({ message: 'Title vacated', data: { titleId, lostAt: at } });
  }
  return closed;
}
