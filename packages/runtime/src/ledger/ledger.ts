// Period Ledger
//
// The only code that writes periods. Every write checks the invariants
// (one open period per kind and owner, start strictly before end, no overlap
// with an earlier period of the same kind) and fails with
// LedgerInvariantError instead of repairing data.

import type {
  ActivatableRef,
  ActivationHistory,
  EmploymentHistory,
  EntityRef,
  Period,
  PeriodKind,
  RosterMemberRef,
  Timestamp,
} from '@roster/protocol';
import { formatRef } from '@roster/protocol';
import type { PeriodRepository } from '@roster/repositories';
import { isBefore } from '../clock.js';
import { InvalidEffectiveDateError, LedgerInvariantError } from '../errors.js';

/**
 * The period writes a transition performs: close these kinds (in order),
 * then open these.
 */
export type LedgerPlan = {
  closes: readonly PeriodKind[];
  opens: readonly PeriodKind[];
  /** Kinds whose last closed period must have ended by the effective date */
  follows?: readonly PeriodKind[];
};

function ofKind(periods: Period[], kind: PeriodKind): Period[] {
  return periods.filter((p) => p.kind === kind);
}

export async function loadEmploymentHistory(
  periods: PeriodRepository,
  owner: RosterMemberRef
): Promise<EmploymentHistory> {
  const all = await periods.list(owner);
  return {
    employment: ofKind(all, 'employment'),
    suspension: ofKind(all, 'suspension'),
    injury: ofKind(all, 'injury'),
    retirement: ofKind(all, 'retirement'),
  };
}

export async function loadActivationHistory(
  periods: PeriodRepository,
  owner: ActivatableRef
): Promise<ActivationHistory> {
  const all = await periods.list(owner);
  return {
    activation: ofKind(all, 'activation'),
    retirement: ofKind(all, 'retirement'),
  };
}

/**
 * Open a period of `kind` for `owner` starting at `startedAt`.
 * @throws LedgerInvariantError when one is already open or the start overlaps the last one
 */
export async function openPeriod(
  periods: PeriodRepository,
  owner: EntityRef,
  kind: PeriodKind,
  startedAt: Timestamp
): Promise<Period> {
  const open = await periods.current(owner, kind);
  if (open) {
    throw new LedgerInvariantError(`${formatRef(owner)} already has an open ${kind} period`, {
      owner: formatRef(owner),
      kind,
      periodId: open.id,
    });
  }

  await assertNoOverlap(periods, owner, kind, startedAt);
  return periods.create({ owner, kind, startedAt });
}

/**
 * Close the open period of `kind`, if there is one. Closing when nothing is
 * open is a no-op.
 * @throws LedgerInvariantError when `endedAt` does not fall after the start
 */
export async function closePeriod(
  periods: PeriodRepository,
  owner: EntityRef,
  kind: PeriodKind,
  endedAt: Timestamp
): Promise<Period | null> {
  const open = await periods.current(owner, kind);
  if (!open) return null;

  if (!isBefore(open.startedAt, endedAt)) {
    throw new LedgerInvariantError(
      `${kind} period ${open.id} of ${formatRef(owner)} cannot end at ${endedAt}`,
      { owner: formatRef(owner), kind, periodId: open.id, startedAt: open.startedAt, endedAt }
    );
  }

  return periods.endOpen(owner, kind, endedAt);
}

/**
 * Move the start of the open period of `kind`.
 * @throws LedgerInvariantError when nothing is open or the new start overlaps
 */
export async function rescheduleOpenPeriod(
  periods: PeriodRepository,
  owner: EntityRef,
  kind: PeriodKind,
  startedAt: Timestamp
): Promise<Period> {
  const open = await periods.current(owner, kind);
  if (!open) {
    throw new LedgerInvariantError(`${formatRef(owner)} has no open ${kind} period to move`, {
      owner: formatRef(owner),
      kind,
    });
  }

  await assertNoOverlap(periods, owner, kind, startedAt);
  const moved = await periods.reschedule(open.id, startedAt);
  if (!moved) {
    throw new LedgerInvariantError(`Period ${open.id} disappeared while being moved`, {
      periodId: open.id,
    });
  }
  return moved;
}

async function assertNoOverlap(
  periods: PeriodRepository,
  owner: EntityRef,
  kind: PeriodKind,
  startedAt: Timestamp
): Promise<void> {
  const [last] = await periods.previous(owner, kind);
  if (last?.endedAt && isBefore(startedAt, last.endedAt)) {
    throw new LedgerInvariantError(
      `${kind} period for ${formatRef(owner)} starting ${startedAt} overlaps period ${last.id}`,
      { owner: formatRef(owner), kind, periodId: last.id, endedAt: last.endedAt, startedAt }
    );
  }
}

/**
 * Check an effective date against every period a plan would touch, before
 * anything is written.
 * @throws InvalidEffectiveDateError
 */
export async function checkLedgerPlan(
  periods: PeriodRepository,
  owner: EntityRef,
  plan: LedgerPlan,
  at: Timestamp
): Promise<void> {
  for (const kind of plan.closes) {
    const open = await periods.current(owner, kind);
    if (open && !isBefore(open.startedAt, at)) {
      throw new InvalidEffectiveDateError(
        at,
        open.startedAt,
        `must fall after the start of the open ${kind} period`
      );
    }
  }

  for (const kind of plan.opens) {
    const [last] = await periods.previous(owner, kind);
    if (last?.endedAt && isBefore(at, last.endedAt)) {
      throw new InvalidEffectiveDateError(
        at,
        last.endedAt,
        `must not precede the end of the previous ${kind} period`
      );
    }
  }

  for (const kind of plan.follows ?? []) {
    const [last] = await periods.previous(owner, kind);
    if (last?.endedAt && isBefore(at, last.endedAt)) {
      throw new InvalidEffectiveDateError(at, last.endedAt, `must not precede the end of the last ${kind} period`);
    }
  }
}

/**
 * Perform a plan's writes: closes first, in the order given, then opens.
 */
export async function applyLedgerPlan(
  periods: PeriodRepository,
  owner: EntityRef,
  plan: LedgerPlan,
  at: Timestamp
): Promise<void> {
  for (const kind of plan.closes) {
    await closePeriod(periods, owner, kind, at);
  }
  for (const kind of plan.opens) {
    await openPeriod(periods, owner, kind, at);
  }
}
