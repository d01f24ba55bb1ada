// Transition Actions for titles and stables

import type { ActivationTransition, Stable, Timestamp, Title } from '@roster/protocol';
import { familyOf, formatRef } from '@roster/protocol';
import type { UnitOfWork } from '../context.js';
import { requireActivatable, type ActivatableTarget } from '../entities.js';
import { applyLedgerPlan, checkLedgerPlan } from '../ledger/index.js';
import { currentActivationStatus, syncActivationStatus } from '../status/index.js';
import { cascadeStableClosed, cascadeTitleRetired } from '../cascades/index.js';
import { activationRule, assertAllowed } from './rules.js';

/**
 * Run one activation transition on a title or stable.
 *
 * @throws EntityNotFoundError, CannotTransitionError, InvalidEffectiveDateError
 */
export async function transitionActivatable<T extends Title | Stable>(
  uow: UnitOfWork,
  target: ActivatableTarget<T>,
  transition: ActivationTransition,
  at: Timestamp
): Promise<T> {
  const { repos } = uow;
  const { ref } = target;

  await target.repository(repos).lock(ref.id);
  await requireActivatable(repos, target);

  const from = await currentActivationStatus(repos, ref);
  const rule = activationRule(familyOf(ref), transition);
  assertAllowed(rule, transition, ref, from);
  await checkLedgerPlan(repos.periods, ref, rule, at);
  await applyLedgerPlan(repos.periods, ref, rule, at);

  const updated = await syncActivationStatus(repos, target);
  uow.pending.push({
    message: 'Transition committed',
    data: { transition, entity: formatRef(ref), from, to: updated.status, effectiveAt: at },
  });

  switch (ref.type) {
    case 'title':
      if (transition === 'retire') {
        await cascadeTitleRetired(uow, ref.id, at);
      }
      break;
    case 'stable':
      if (transition === 'deactivate' || transition === 'retire') {
        await cascadeStableClosed(uow, ref, at);
      }
      break;
  }

  return updated;
}
