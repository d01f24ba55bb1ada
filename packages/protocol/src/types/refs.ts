// Entity references
//
// Relationships that may point at more than one kind of entity (a champion,
// a stable member, a manager's client) carry a tagged reference rather than a
// bare id, and are resolved with an explicit switch on `type`.

import type { Id } from './common.js';

/**
 * Individual roster members that hold a personal employment history.
 */
export type IndividualType = 'wrestler' | 'referee' | 'manager';

/**
 * Every employable roster member type.
 */
export type RosterMemberType = IndividualType | 'tag_team';

/**
 * Entities whose lifecycle is driven by activation rather than employment.
 */
export type ActivatableType = 'title' | 'stable';

/**
 * Every entity type that owns periods.
 */
export type EntityType = RosterMemberType | ActivatableType;

export type WrestlerRef = { type: 'wrestler'; id: Id };
export type RefereeRef = { type: 'referee'; id: Id };
export type ManagerRef = { type: 'manager'; id: Id };
export type TagTeamRef = { type: 'tag_team'; id: Id };
export type TitleRef = { type: 'title'; id: Id };
export type StableRef = { type: 'stable'; id: Id };

export type IndividualRef = WrestlerRef | RefereeRef | ManagerRef;
export type RosterMemberRef = IndividualRef | TagTeamRef;
export type ActivatableRef = TitleRef | StableRef;
export type EntityRef = RosterMemberRef | ActivatableRef;

/**
 * Holder of a title: a singles wrestler or a tag team.
 */
export type ChampionRef = WrestlerRef | TagTeamRef;

/**
 * Member of a stable.
 */
export type StableMemberRef = WrestlerRef | TagTeamRef;

/**
 * Talent a manager can represent.
 */
export type ClientRef = WrestlerRef | TagTeamRef;
