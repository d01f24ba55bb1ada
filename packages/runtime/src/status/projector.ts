// Status Projector
//
// Derives the one current status of an entity from its period history.
// Pure: the same history and "now" always give the same status.

import type {
  ActivationHistory,
  ActivationStatus,
  EmploymentHistory,
  EmploymentStatus,
  Period,
  Timestamp,
} from '@roster/protocol';
import { compareTimestamps, isAfter } from '../clock.js';

const isOpen = (period: Period): boolean => period.endedAt === null;

function latest(periods: Period[]): Period | undefined {
  return periods.reduce<Period | undefined>(
    (found, period) =>
      found === undefined || compareTimestamps(period.startedAt, found.startedAt) >= 0
        ? period
        : found,
    undefined
  );
}

/**
 * When the entity most recently came out of retirement, if ever. Employment
 * that starts earlier belongs to a previous career.
 */
export function careerStartedAt(retirements: Period[]): Timestamp | undefined {
  let result: Timestamp | undefined;
  for (const period of retirements) {
    if (period.endedAt !== null && (result === undefined || isAfter(period.endedAt, result))) {
      result = period.endedAt;
    }
  }
  return result;
}

/**
 * Project the employment status of a wrestler, referee, manager or tag team.
 *
 * First match wins:
 * 1. open retirement: retired
 * 2. no employment in the current career: unemployed
 * 3. latest employment starts after `now`: future_employed
 * 4. latest employment closed: released
 * 5. open injury: injured; open suspension: suspended; otherwise employed
 *
 * A career starts at the end of the most recent retirement, so employment that
 * predates an unretirement never counts again.
 */
export function projectEmploymentStatus(
  history: EmploymentHistory,
  now: Timestamp
): EmploymentStatus {
  if (history.retirement.some(isOpen)) return 'retired';

  const careerStart = careerStartedAt(history.retirement);
  const employment = latest(
    careerStart === undefined
      ? history.employment
      : history.employment.filter((p) => !isAfter(careerStart, p.startedAt))
  );

  if (!employment) return 'unemployed';
  if (isAfter(employment.startedAt, now)) return 'future_employed';
  if (employment.endedAt !== null) return 'released';
  if (history.injury.some(isOpen)) return 'injured';
  if (history.suspension.some(isOpen)) return 'suspended';
  return 'employed';
}

/**
 * Project the activation status of a title or stable.
 *
 * An open retirement wins; otherwise the latest activation decides: none is
 * unactivated, open is active, closed is inactive.
 */
export function projectActivationStatus(history: ActivationHistory): ActivationStatus {
  if (history.retirement.some(isOpen)) return 'retired';

  const activation = latest(history.activation);
  if (!activation) return 'unactivated';
  return activation.endedAt === null ? 'active' : 'inactive';
}
