import { and, asc, eq, inArray, isNull } from 'drizzle-orm';
import type { Database } from '../db.js';
import { rosterMembers } from '../schema/index.js';
import { rosterMemberColumns, rowToRosterMember } from '../mappers.js';
import type {
  RosterMemberRepository,
  CreateRosterMemberInput,
  RosterMemberFilter,
  GetRosterMemberOptions,
} from '../../interfaces/index.js';
import type { EmploymentStatus, RosterMember, RosterMemberRef, Timestamp } from '@roster/protocol';

export class PgRosterMemberRepository implements RosterMemberRepository {
  constructor(private db: Database) {}

  async create(input: CreateRosterMemberInput): Promise<RosterMember> {
    const id = input.id ?? crypto.randomUUID();
    const now = new Date();

    const [row] = await this.db
      .insert(rosterMembers)
      .values({
        ...rosterMemberColumns(input),
        id,
        status: 'unemployed',
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return rowToRosterMember(row);
  }

  async get(ref: RosterMemberRef, options?: GetRosterMemberOptions): Promise<RosterMember | null> {
    const [row] = await this.db
      .select()
      .from(rosterMembers)
      .where(
        and(
          this.matches(ref),
          options?.includeDeleted ? undefined : isNull(rosterMembers.deletedAt)
        )
      );
    return row ? rowToRosterMember(row) : null;
  }

  async list(filter?: RosterMemberFilter): Promise<RosterMember[]> {
    const conditions = [];

    if (filter?.type) {
      conditions.push(eq(rosterMembers.type, filter.type));
    }

    if (filter?.status) {
      conditions.push(inArray(rosterMembers.status, filter.status));
    }

    if (!filter?.includeDeleted) {
      conditions.push(isNull(rosterMembers.deletedAt));
    }

    let query = this.db
      .select()
      .from(rosterMembers)
      .where(and(...conditions))
      .orderBy(asc(rosterMembers.createdAt))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToRosterMember);
  }

  async setStatus(ref: RosterMemberRef, status: EmploymentStatus): Promise<RosterMember | null> {
    const [row] = await this.db
      .update(rosterMembers)
      .set({ status, updatedAt: new Date() })
      .where(this.matches(ref))
      .returning();
    return row ? rowToRosterMember(row) : null;
  }

  async softDelete(ref: RosterMemberRef, deletedAt: Timestamp): Promise<RosterMember | null> {
    const [row] = await this.db
      .update(rosterMembers)
      .set({ deletedAt: new Date(deletedAt), updatedAt: new Date() })
      .where(this.matches(ref))
      .returning();
    return row ? rowToRosterMember(row) : null;
  }

  async restore(ref: RosterMemberRef): Promise<RosterMember | null> {
    const [row] = await this.db
      .update(rosterMembers)
      .set({ deletedAt: null, updatedAt: new Date() })
      .where(this.matches(ref))
      .returning();
    return row ? rowToRosterMember(row) : null;
  }

  async lock(ref: RosterMemberRef): Promise<void> {
    await this.db
      .select({ id: rosterMembers.id })
      .from(rosterMembers)
      .where(this.matches(ref))
      .for('update');
  }

  private matches(ref: RosterMemberRef) {
    return and(eq(rosterMembers.type, ref.type), eq(rosterMembers.id, ref.id));
  }
}
