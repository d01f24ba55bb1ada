// Roster member types

import type { Audited, Id, Timestamp } from './common.js';
import type { EmploymentStatus } from './statuses.js';

type RosterMemberBase = Audited & {
  id: Id;
  /**
   * Cached projection of the member's periods.
   * Written only by transition actions.
   */
  status: EmploymentStatus;
  /**
   * Soft-deletion marker; deleted members are invisible to transitions.
   */
  deletedAt: Timestamp | null;
};

export type Wrestler = RosterMemberBase & {
  type: 'wrestler';
  name: string;
  hometown?: string;
  signatureMove?: string;
};

export type Referee = RosterMemberBase & {
  type: 'referee';
  firstName: string;
  lastName: string;
};

export type Manager = RosterMemberBase & {
  type: 'manager';
  firstName: string;
  lastName: string;
};

export type TagTeam = RosterMemberBase & {
  type: 'tag_team';
  name: string;
  signatureMove?: string;
};

export type RosterMember = Wrestler | Referee | Manager | TagTeam;
