// @roster/runtime
// Employment and activation lifecycle for a wrestling promotion's roster

// Lifecycle facade
export {
  createRosterLifecycle,
  type RosterLifecycle,
  type EmploymentActions,
  type ActivationActions,
  type TransitionFn,
} from './lifecycle.js';

export type { RosterLifecycleOptions, UnitOfWork } from './context.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  InvalidEffectiveDateError,
  EntityNotFoundError,
  CannotTransitionError,
  LedgerInvariantError,
  MembershipConflictError,
  ChampionshipError,
  CannotBeRestoredError,
  DuplicateEntityError,
} from './errors.js';

// Clock and logging
export {
  systemClock,
  createFixedClock,
  isBefore,
  isAfter,
  compareTimestamps,
  type Clock,
} from './clock.js';

export {
  consoleLogger,
  createConsoleLogger,
  silentLogger,
  createCapturingLogger,
  bindOperation,
  formatLogLine,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogFields,
  type OperationFields,
} from './logger.js';

// Input
export type { EffectiveDate } from './input.js';
export type { RegisterRosterMemberInput } from './roster/index.js';

// Status projection
export { projectEmploymentStatus, projectActivationStatus } from './status/index.js';

// Transition rules
export { employmentRule, activationRule, isAllowed, type TransitionRule } from './transitions/index.js';
