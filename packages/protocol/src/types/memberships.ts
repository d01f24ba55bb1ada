// Membership rows joining roster members into groups

import type { Id, Timestamp } from './common.js';
import type { ClientRef, ManagerRef, StableMemberRef, StableRef, TagTeamRef, WrestlerRef } from './refs.js';

/**
 * Which relationship a membership row records.
 *
 * - tag_team_partner: a wrestler partnered in a tag team
 * - stable_member: a wrestler or tag team in a stable
 * - management: a wrestler or tag team represented by a manager
 */
export type MembershipKind = 'tag_team_partner' | 'stable_member' | 'management';

type MembershipBase = {
  id: Id;
  joinedAt: Timestamp;
  leftAt: Timestamp | null;
};

export type TagTeamPartnership = MembershipBase & {
  kind: 'tag_team_partner';
  group: TagTeamRef;
  member: WrestlerRef;
};

export type StableMembership = MembershipBase & {
  kind: 'stable_member';
  group: StableRef;
  member: StableMemberRef;
};

export type Management = MembershipBase & {
  kind: 'management';
  group: ManagerRef;
  member: ClientRef;
};

export type Membership = TagTeamPartnership | StableMembership | Management;

/**
 * Narrow a membership union by its kind.
 */
export type MembershipOf<K extends MembershipKind> = Extract<Membership, { kind: K }>;
