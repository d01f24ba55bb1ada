// Period ledger records

import type { Id, Timestamp } from './common.js';
import type { EntityRef } from './refs.js';
import type { PeriodKind } from './statuses.js';

/**
 * A time-bounded interval during which an entity held one status.
 *
 * `endedAt === null` means the period is open: it describes the present.
 */
export type Period = {
  id: Id;
  owner: EntityRef;
  kind: PeriodKind;
  startedAt: Timestamp;
  endedAt: Timestamp | null;
  createdAt: Timestamp;
};

/**
 * Full history of the periods that drive an employable member's status,
 * each list ordered by `startedAt` ascending.
 */
export type EmploymentHistory = {
  employment: Period[];
  suspension: Period[];
  injury: Period[];
  retirement: Period[];
};

/**
 * Full history of the periods that drive a title's or stable's status.
 */
export type ActivationHistory = {
  activation: Period[];
  retirement: Period[];
};
