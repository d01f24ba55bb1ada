import type {
  Id,
  Timestamp,
  EmploymentStatus,
  RosterMember,
  RosterMemberRef,
  RosterMemberType,
} from '@roster/protocol';

/**
 * Input for creating a roster member. New members always start `unemployed`.
 */
export type CreateRosterMemberInput =
  | { type: 'wrestler'; id?: Id; name: string; hometown?: string; signatureMove?: string }
  | { type: 'referee'; id?: Id; firstName: string; lastName: string }
  | { type: 'manager'; id?: Id; firstName: string; lastName: string }
  | { type: 'tag_team'; id?: Id; name: string; signatureMove?: string };

/**
 * Filter for listing roster members
 */
export type RosterMemberFilter = {
  type?: RosterMemberType;
  status?: EmploymentStatus[];
  includeDeleted?: boolean;
  limit?: number;
  offset?: number;
};

export type GetRosterMemberOptions = {
  /** Return soft-deleted members too. Defaults to false. */
  includeDeleted?: boolean;
};

/**
 * Repository interface for wrestlers, referees, managers and tag teams.
 *
 * The cached `status` column is written through `setStatus` only, and only by
 * the runtime after it has re-projected the member's periods.
 */
export interface RosterMemberRepository {
  /**
   * Create a new roster member
   */
  create(input: CreateRosterMemberInput): Promise<RosterMember>;

  /**
   * Get a roster member by reference
   * @returns The member, or null if missing (or soft-deleted, unless requested)
   */
  get(ref: RosterMemberRef, options?: GetRosterMemberOptions): Promise<RosterMember | null>;

  /**
   * List roster members, ordered by creation
   */
  list(filter?: RosterMemberFilter): Promise<RosterMember[]>;

  /**
   * Store the projected status
   */
  setStatus(ref: RosterMemberRef, status: EmploymentStatus): Promise<RosterMember | null>;

  /**
   * Mark a member deleted without removing its rows
   */
  softDelete(ref: RosterMemberRef, deletedAt: Timestamp): Promise<RosterMember | null>;

  /**
   * Clear the soft-deletion marker
   */
  restore(ref: RosterMemberRef): Promise<RosterMember | null>;

  /**
   * Take the per-entity serialization point for the current unit of work.
   * Must be called inside a transaction; held until it commits or rolls back.
   */
  lock(ref: RosterMemberRef): Promise<void>;
}
