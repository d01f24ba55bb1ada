import type {
  Id,
  Timestamp,
  ClientRef,
  EntityRef,
  ManagerRef,
  Membership,
  MembershipKind,
  StableMemberRef,
  StableRef,
  TagTeamRef,
  WrestlerRef,
} from '@roster/protocol';

/**
 * Input for attaching a member to a group
 */
export type AttachMembershipInput =
  | { id?: Id; kind: 'tag_team_partner'; group: TagTeamRef; member: WrestlerRef; joinedAt: Timestamp }
  | { id?: Id; kind: 'stable_member'; group: StableRef; member: StableMemberRef; joinedAt: Timestamp }
  | { id?: Id; kind: 'management'; group: ManagerRef; member: ClientRef; joinedAt: Timestamp };

/**
 * Repository interface for tag team partnerships, stable memberships and
 * management relationships.
 */
export interface MembershipRepository {
  /**
   * Open a membership row
   */
  attach(input: AttachMembershipInput): Promise<Membership>;

  /**
   * Close the open membership of `member` in `group`.
   * @returns The closed row, or null when none was open
   */
  detachOpen(
    kind: MembershipKind,
    group: EntityRef,
    member: EntityRef,
    leftAt: Timestamp
  ): Promise<Membership | null>;

  /**
   * Open rows of a group, by `joinedAt` ascending
   */
  currentMembers(kind: MembershipKind, group: EntityRef): Promise<Membership[]>;

  /**
   * Open rows in which `member` takes part
   */
  currentGroups(kind: MembershipKind, member: EntityRef): Promise<Membership[]>;

  /**
   * Every row of a group, by `joinedAt` ascending
   */
  listForGroup(kind: MembershipKind, group: EntityRef): Promise<Membership[]>;

  /**
   * Every row in which `member` takes part, by `joinedAt` ascending
   */
  listForMember(kind: MembershipKind, member: EntityRef): Promise<Membership[]>;
}
