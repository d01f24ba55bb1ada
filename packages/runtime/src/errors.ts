// Runtime error types

import type {
  ActivationStatus,
  EmploymentStatus,
  EntityRef,
  Id,
  Timestamp,
  Transition,
} from '@roster/protocol';
import { formatRef } from '@roster/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when an effective date would produce an empty or inverted interval,
 * or would overlap an interval that already ended.
 */
export class InvalidEffectiveDateError extends RuntimeError {
  readonly effectiveAt: Timestamp;
  readonly boundary: Timestamp;

  constructor(effectiveAt: Timestamp, boundary: Timestamp, reason: string) {
    super('INVALID_EFFECTIVE_DATE', `Invalid effective date ${effectiveAt}: ${reason} (${boundary})`);
    this.name = 'InvalidEffectiveDateError';
    this.effectiveAt = effectiveAt;
    this.boundary = boundary;
  }
}

/**
 * Error when a referenced entity does not exist or has been soft-deleted.
 */
export class EntityNotFoundError extends RuntimeError {
  readonly entity: string;

  constructor(entity: EntityRef | string) {
    const label = typeof entity === 'string' ? entity : formatRef(entity);
    super('ENTITY_NOT_FOUND', `Entity not found: ${label}`);
    this.name = 'EntityNotFoundError';
    this.entity = label;
  }
}

/**
 * Error when a transition is not legal from the entity's current status.
 */
export class CannotTransitionError extends RuntimeError {
  readonly transition: Transition;
  readonly entity: EntityRef;
  readonly currentStatus: EmploymentStatus | ActivationStatus;
  readonly reason?: string;

  constructor(
    transition: Transition,
    entity: EntityRef,
    currentStatus: EmploymentStatus | ActivationStatus,
    reason?: string
  ) {
    super(
      'CANNOT_TRANSITION',
      `Cannot ${transition} ${formatRef(entity)}: current status is "${currentStatus}"` +
        (reason ? ` (${reason})` : '')
    );
    this.name = 'CannotTransitionError';
    this.transition = transition;
    this.entity = entity;
    this.currentStatus = currentStatus;
    this.reason = reason;
  }
}

/**
 * Error when a ledger write would break a period invariant.
 * Validators run first, so this signals a bug rather than bad input.
 */
export class LedgerInvariantError extends RuntimeError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super('LEDGER_INVARIANT_VIOLATION', message);
    this.name = 'LedgerInvariantError';
    this.details = details;
  }
}

/**
 * Error when a membership would collide with an existing one.
 */
export class MembershipConflictError extends RuntimeError {
  readonly group: EntityRef;
  readonly member: EntityRef;

  constructor(group: EntityRef, member: EntityRef, reason: string) {
    super(
      'MEMBERSHIP_CONFLICT',
      `Cannot add ${formatRef(member)} to ${formatRef(group)}: ${reason}`
    );
    this.name = 'MembershipConflictError';
    this.group = group;
    this.member = member;
  }
}

/**
 * Error when a title cannot change hands.
 */
export class ChampionshipError extends RuntimeError {
  readonly titleId: Id;

  constructor(titleId: Id, reason: string) {
    super('CHAMPIONSHIP_ERROR', `Championship change for title ${titleId} rejected: ${reason}`);
    this.name = 'ChampionshipError';
    this.titleId = titleId;
  }
}

/**
 * Error when restoring an entity that is not deleted.
 */
export class CannotBeRestoredError extends RuntimeError {
  readonly entity: EntityRef;

  constructor(entity: EntityRef) {
    super('CANNOT_BE_RESTORED', `Cannot restore ${formatRef(entity)}: it is not deleted`);
    this.name = 'CannotBeRestoredError';
    this.entity = entity;
  }
}

/**
 * Error when an entity is created under an id that is already taken.
 */
export class DuplicateEntityError extends RuntimeError {
  readonly entity: string;

  constructor(entity: EntityRef) {
    super('DUPLICATE_ENTITY', `Entity already exists: ${formatRef(entity)}`);
    this.name = 'DuplicateEntityError';
    this.entity = formatRef(entity);
  }
}
