export { isBookable, listAvailable } from './bookability.js';
export {
  registerRosterMember,
  deleteRosterMember,
  restoreRosterMember,
  refreshStatus,
  registerRosterMemberSchema,
  type RegisterRosterMemberInput,
} from './registration.js';
