import { and, asc, eq, isNull } from 'drizzle-orm';
import type { Database } from '../db.js';
import { memberships } from '../schema/index.js';
import { rowToMembership } from '../mappers.js';
import type {
  MembershipRepository,
  AttachMembershipInput,
} from '../../interfaces/index.js';
import type { EntityRef, Membership, MembershipKind, Timestamp } from '@roster/protocol';

export class PgMembershipRepository implements MembershipRepository {
  constructor(private db: Database) {}

  async attach(input: AttachMembershipInput): Promise<Membership> {
    const [row] = await this.db
      .insert(memberships)
      .values({
        id: input.id ?? crypto.randomUUID(),
        kind: input.kind,
        groupType: input.group.type,
        groupId: input.group.id,
        memberType: input.member.type,
        memberId: input.member.id,
        joinedAt: new Date(input.joinedAt),
      })
      .returning();
    return rowToMembership(row);
  }

  async detachOpen(
    kind: MembershipKind,
    group: EntityRef,
    member: EntityRef,
    leftAt: Timestamp
  ): Promise<Membership | null> {
    const [row] = await this.db
      .update(memberships)
      .set({ leftAt: new Date(leftAt) })
      .where(
        and(this.inGroup(kind, group), this.forMember(kind, member), isNull(memberships.leftAt))
      )
      .returning();
    return row ? rowToMembership(row) : null;
  }

  async currentMembers(kind: MembershipKind, group: EntityRef): Promise<Membership[]> {
    const rows = await this.db
      .select()
      .from(memberships)
      .where(and(this.inGroup(kind, group), isNull(memberships.leftAt)))
      .orderBy(asc(memberships.joinedAt));
    return rows.map(rowToMembership);
  }

  async currentGroups(kind: MembershipKind, member: EntityRef): Promise<Membership[]> {
    const rows = await this.db
      .select()
      .from(memberships)
      .where(and(this.forMember(kind, member), isNull(memberships.leftAt)))
      .orderBy(asc(memberships.joinedAt));
    return rows.map(rowToMembership);
  }

  async listForGroup(kind: MembershipKind, group: EntityRef): Promise<Membership[]> {
    const rows = await this.db
      .select()
      .from(memberships)
      .where(this.inGroup(kind, group))
      .orderBy(asc(memberships.joinedAt));
    return rows.map(rowToMembership);
  }

  async listForMember(kind: MembershipKind, member: EntityRef): Promise<Membership[]> {
    const rows = await this.db
      .select()
      .from(memberships)
      .where(this.forMember(kind, member))
      .orderBy(asc(memberships.joinedAt));
    return rows.map(rowToMembership);
  }

  private inGroup(kind: MembershipKind, group: EntityRef) {
    return and(
      eq(memberships.kind, kind),
      eq(memberships.groupType, group.type),
      eq(memberships.groupId, group.id)
    );
  }

  private forMember(kind: MembershipKind, member: EntityRef) {
    return and(
      eq(memberships.kind, kind),
      eq(memberships.memberType, member.type),
      eq(memberships.memberId, member.id)
    );
  }
}
