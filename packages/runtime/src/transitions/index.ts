export { transitionRosterMember } from './employment.js';
export { transitionActivatable } from './activation.js';
export {
  employmentRule,
  activationRule,
  isAllowed,
  assertAllowed,
  type TransitionRule,
  type EmploymentFamily,
  type ActivationFamily,
} from './rules.js';
export { currentPartners, PARTNER_TRANSITIONS } from './tag-teams.js';
