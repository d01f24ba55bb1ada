// Membership guards

import type { Management, Membership, TagTeamPartnership } from '../types/memberships.js';

export function isTagTeamPartnership(m: Membership): m is TagTeamPartnership {
  return m.kind === 'tag_team_partner';
}

export function isManagement(m: Membership): m is Management {
  return m.kind === 'management';
}
