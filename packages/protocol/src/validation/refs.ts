// Reference helpers
//
// Tagged references are compared and printed in many places (cascades,
// membership lookups, error messages), so the rules live here once.

import type { ActivatableRef, ChampionRef, EntityRef, RosterMemberRef } from '../types/refs.js';
import type { TransitionFamily } from '../types/transitions.js';

/**
 * Two references point at the same entity.
 */
export function sameRef(a: EntityRef, b: EntityRef): boolean {
  return a.type === b.type && a.id === b.id;
}

/**
 * Render a reference as `type:id`, e.g. `wrestler:abc`.
 */
export function formatRef(ref: EntityRef): string {
  return `${ref.type}:${ref.id}`;
}

export function isChampionRef(ref: EntityRef): ref is ChampionRef {
  return ref.type === 'wrestler' || ref.type === 'tag_team';
}

/**
 * The validator family whose rules govern an entity.
 */
export function familyOf(ref: RosterMemberRef): Extract<TransitionFamily, 'individual' | 'tag_team'>;
export function familyOf(ref: ActivatableRef): Extract<TransitionFamily, 'title' | 'stable'>;
export function familyOf(ref: EntityRef): TransitionFamily;
export function familyOf(ref: EntityRef): TransitionFamily {
  switch (ref.type) {
    case 'wrestler':
    case 'referee':
    case 'manager':
      return 'individual';
    case 'tag_team':
      return 'tag_team';
    case 'title':
      return 'title';
    case 'stable':
      return 'stable';
  }
}
