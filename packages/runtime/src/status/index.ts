export { projectEmploymentStatus, projectActivationStatus, careerStartedAt } from './projector.js';
export {
  currentEmploymentStatus,
  currentActivationStatus,
  syncEmploymentStatus,
  syncActivationStatus,
} from './sync.js';
