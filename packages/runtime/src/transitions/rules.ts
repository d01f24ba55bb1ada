// Transition Validators
//
// One rule per (family, transition) pair: the statuses it may start from and
// the ledger writes it performs. Dispatch is a table lookup.

import type {
  ActivationStatus,
  ActivationTransition,
  EmploymentStatus,
  EmploymentTransition,
  EntityRef,
  Transition,
  TransitionFamily,
} from '@roster/protocol';
import type { LedgerPlan } from '../ledger/index.js';
import { CannotTransitionError } from '../errors.js';

export type TransitionRule<S extends EmploymentStatus | ActivationStatus> = LedgerPlan & {
  /** Statuses the transition is legal from */
  from: readonly S[];
  /** Set when the family never allows the transition */
  unavailable?: string;
};

export type EmploymentFamily = Extract<TransitionFamily, 'individual' | 'tag_team'>;
export type ActivationFamily = Extract<TransitionFamily, 'title' | 'stable'>;

const EMPLOYMENT_RULES: Record<EmploymentTransition, TransitionRule<EmploymentStatus>> = {
  employ: {
    from: ['unemployed', 'released', 'future_employed'],
    closes: [],
    opens: ['employment'],
  },
  release: {
    from: ['employed', 'suspended'],
    closes: ['suspension', 'employment'],
    opens: [],
  },
  suspend: { from: ['employed'], closes: [], opens: ['suspension'] },
  reinstate: { from: ['suspended'], closes: ['suspension'], opens: [] },
  injure: { from: ['employed'], closes: [], opens: ['injury'] },
  clearInjury: { from: ['injured'], closes: ['injury'], opens: [] },
  retire: {
    from: ['employed', 'suspended', 'released'],
    closes: ['suspension', 'employment'],
    opens: ['retirement'],
    follows: ['employment'],
  },
  unretire: { from: ['retired'], closes: ['retirement'], opens: [] },
};

const TAG_TEAM_RULES: Record<EmploymentTransition, TransitionRule<EmploymentStatus>> = {
  ...EMPLOYMENT_RULES,
  injure: { ...EMPLOYMENT_RULES.injure, from: [], unavailable: 'tag teams cannot be injured' },
  clearInjury: {
    ...EMPLOYMENT_RULES.clearInjury,
    from: [],
    unavailable: 'tag teams cannot be injured',
  },
};

const ACTIVATION_RULES: Record<ActivationTransition, TransitionRule<ActivationStatus>> = {
  activate: { from: ['unactivated', 'inactive'], closes: [], opens: ['activation'] },
  deactivate: { from: ['active'], closes: ['activation'], opens: [] },
  retire: {
    from: ['active', 'inactive'],
    closes: ['activation'],
    opens: ['retirement'],
    follows: ['activation'],
  },
  unretire: { from: ['retired'], closes: ['retirement'], opens: [] },
};

const EMPLOYMENT_TABLE: Record<
  EmploymentFamily,
  Record<EmploymentTransition, TransitionRule<EmploymentStatus>>
> = {
  individual: EMPLOYMENT_RULES,
  tag_team: TAG_TEAM_RULES,
};

const ACTIVATION_TABLE: Record<
  ActivationFamily,
  Record<ActivationTransition, TransitionRule<ActivationStatus>>
> = {
  title: ACTIVATION_RULES,
  stable: ACTIVATION_RULES,
};

export function employmentRule(
  family: EmploymentFamily,
  transition: EmploymentTransition
): TransitionRule<EmploymentStatus> {
  return EMPLOYMENT_TABLE[family][transition];
}

export function activationRule(
  family: ActivationFamily,
  transition: ActivationTransition
): TransitionRule<ActivationStatus> {
  return ACTIVATION_TABLE[family][transition];
}

/**
 * Whether the rule allows the transition from `current`.
 */
export function isAllowed<S extends EmploymentStatus | ActivationStatus>(
  rule: TransitionRule<S>,
  current: S
): boolean {
  return rule.unavailable === undefined && rule.from.includes(current);
}

/**
 * @throws CannotTransitionError naming the transition and current status
 */
export function assertAllowed<S extends EmploymentStatus | ActivationStatus>(
  rule: TransitionRule<S>,
  transition: Transition,
  entity: EntityRef,
  current: S
): void {
  if (!isAllowed(rule, current)) {
    throw new CannotTransitionError(transition, entity, current, rule.unavailable);
  }
}
