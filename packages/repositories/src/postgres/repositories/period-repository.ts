import { and, asc, desc, eq, isNotNull, isNull } from 'drizzle-orm';
import type { Database } from '../db.js';
import { periods } from '../schema/index.js';
import { rowToPeriod } from '../mappers.js';
import type { PeriodRepository, CreatePeriodInput } from '../../interfaces/index.js';
import type { EntityRef, Id, Period, PeriodKind, Timestamp } from '@roster/protocol';

export class PgPeriodRepository implements PeriodRepository {
  constructor(private db: Database) {}

  async create(input: CreatePeriodInput): Promise<Period> {
    const [row] = await this.db
      .insert(periods)
      .values({
        id: input.id ?? crypto.randomUUID(),
        ownerType: input.owner.type,
        ownerId: input.owner.id,
        kind: input.kind,
        startedAt: new Date(input.startedAt),
        createdAt: new Date(),
      })
      .returning();
    return rowToPeriod(row);
  }

  async endOpen(owner: EntityRef, kind: PeriodKind, endedAt: Timestamp): Promise<Period | null> {
    const [row] = await this.db
      .update(periods)
      .set({ endedAt: new Date(endedAt) })
      .where(and(this.ownedBy(owner, kind), isNull(periods.endedAt)))
      .returning();
    return row ? rowToPeriod(row) : null;
  }

  async current(owner: EntityRef, kind: PeriodKind): Promise<Period | null> {
    const [row] = await this.db
      .select()
      .from(periods)
      .where(and(this.ownedBy(owner, kind), isNull(periods.endedAt)));
    return row ? rowToPeriod(row) : null;
  }

  async previous(owner: EntityRef, kind: PeriodKind): Promise<Period[]> {
    const rows = await this.db
      .select()
      .from(periods)
      .where(and(this.ownedBy(owner, kind), isNotNull(periods.endedAt)))
      .orderBy(desc(periods.startedAt));
    return rows.map(rowToPeriod);
  }

  async list(owner: EntityRef, kind?: PeriodKind): Promise<Period[]> {
    const rows = await this.db
      .select()
      .from(periods)
      .where(
        and(
          eq(periods.ownerType, owner.type),
          eq(periods.ownerId, owner.id),
          kind ? eq(periods.kind, kind) : undefined
        )
      )
      .orderBy(asc(periods.startedAt));
    return rows.map(rowToPeriod);
  }

  async reschedule(periodId: Id, startedAt: Timestamp): Promise<Period | null> {
    const [row] = await this.db
      .update(periods)
      .set({ startedAt: new Date(startedAt) })
      .where(eq(periods.id, periodId))
      .returning();
    return row ? rowToPeriod(row) : null;
  }

  private ownedBy(owner: EntityRef, kind: PeriodKind) {
    return and(
      eq(periods.ownerType, owner.type),
      eq(periods.ownerId, owner.id),
      eq(periods.kind, kind)
    );
  }
}
