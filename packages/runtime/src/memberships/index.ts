export {
  addTagTeamPartner,
  removeTagTeamPartner,
  addStableMember,
  removeStableMember,
  assignClient,
  removeClient,
} from './memberships.js';
