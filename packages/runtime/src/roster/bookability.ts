// Bookability: who can be put on a card right now
//
// Derived at read time, never stored. Suspended and injured members are not
// bookable; neither is a tag team without its full set of employed partners.

import type {
  RosterMember,
  RosterMemberRef,
  RosterMemberType,
  Timestamp,
} from '@roster/protocol';
import type { RepositoryContext } from '@roster/repositories';
import { refOf } from '../entities.js';
import { currentEmploymentStatus } from '../status/index.js';
import { currentPartners } from '../transitions/index.js';

export async function isBookable(
  repos: RepositoryContext,
  ref: RosterMemberRef,
  now: Timestamp,
  requiredPartners: number
): Promise<boolean> {
  if (!(await repos.rosterMembers.get(ref))) return false;
  if ((await currentEmploymentStatus(repos, ref, now)) !== 'employed') return false;
  if (ref.type !== 'tag_team') return true;

  const partners = await currentPartners(repos, ref);
  if (partners.length !== requiredPartners) return false;

  for (const partner of partners) {
    if ((await currentEmploymentStatus(repos, partner, now)) !== 'employed') return false;
  }
  return true;
}

/**
 * Live roster members of one type that are bookable, in creation order.
 */
export async function listAvailable(
  repos: RepositoryContext,
  type: RosterMemberType,
  now: Timestamp,
  requiredPartners: number
): Promise<RosterMember[]> {
  const available: RosterMember[] = [];
  for (const member of await repos.rosterMembers.list({ type })) {
    if (await isBookable(repos, refOf(member), now, requiredPartners)) {
      available.push(member);
    }
  }
  return available;
}
