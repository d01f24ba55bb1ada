// Status and period vocabularies

/**
 * Projected status of an employable roster member.
 *
 * Always derived from the member's period history, never set on its own.
 */
export type EmploymentStatus =
  | 'unemployed'
  | 'future_employed'
  | 'employed'
  | 'suspended'
  | 'injured'
  | 'released'
  | 'retired';

/**
 * Projected status of a title or stable.
 */
export type ActivationStatus = 'unactivated' | 'active' | 'inactive' | 'retired';

/**
 * Kinds of time-bounded periods kept in the ledger.
 */
export type PeriodKind = 'employment' | 'suspension' | 'injury' | 'retirement' | 'activation';

export const EMPLOYMENT_STATUSES: readonly EmploymentStatus[] = [
  'unemployed',
  'future_employed',
  'employed',
  'suspended',
  'injured',
  'released',
  'retired',
];
