import type { Id, Timestamp, EntityRef, Period, PeriodKind } from '@roster/protocol';

/**
 * Input for opening a period
 */
export type CreatePeriodInput = {
  id?: Id;
  owner: EntityRef;
  kind: PeriodKind;
  startedAt: Timestamp;
};

/**
 * Repository interface for the period ledger.
 *
 * Rows are append-only: a period is created open and later closed by setting
 * `endedAt`. Implementations must refuse a second open period of the same
 * kind for the same owner.
 */
export interface PeriodRepository {
  /**
   * Open a new period
   */
  create(input: CreatePeriodInput): Promise<Period>;

  /**
   * Close the owner's open period of this kind.
   * @returns The closed period, or null when none was open
   */
  endOpen(owner: EntityRef, kind: PeriodKind, endedAt: Timestamp): Promise<Period | null>;

  /**
   * The owner's open period of this kind, if any
   */
  current(owner: EntityRef, kind: PeriodKind): Promise<Period | null>;

  /**
   * Closed periods of this kind, most recently started first
   */
  previous(owner: EntityRef, kind: PeriodKind): Promise<Period[]>;

  /**
   * Every period the owner has, optionally of one kind, by `startedAt` ascending
   */
  list(owner: EntityRef, kind?: PeriodKind): Promise<Period[]>;

  /**
   * Move the start of a period (used for future-dated employment only)
   */
  reschedule(periodId: Id, startedAt: Timestamp): Promise<Period | null>;
}
