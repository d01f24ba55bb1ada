export {
  cascadeEmploymentEnded,
  cascadeTitleRetired,
  cascadeStableClosed,
  closeMembership,
  endReign,
} from './cascades.js';
