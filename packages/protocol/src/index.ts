// @roster/protocol
// Shared vocabulary for the roster lifecycle: entities, periods, memberships,
// championships, statuses and transitions.

export * from './types/index.js';

export {
  sameRef,
  formatRef,
  isChampionRef,
  familyOf,
} from './validation/refs.js';

export { daysBetween, reignLengthInDays } from './validation/championships.js';

export { isTagTeamPartnership, isManagement } from './validation/memberships.js';
