import { asc, eq, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { stables, titles } from '../schema/index.js';
import { rowToStable, rowToTitle } from '../mappers.js';
import type {
  ActivatableFilter,
  CreateActivatableInput,
  StableRepository,
  TitleRepository,
} from '../../interfaces/index.js';
import type { ActivationStatus, Id, Stable, Title } from '@roster/protocol';

export class PgTitleRepository implements TitleRepository {
  constructor(private db: Database) {}

  async create(input: CreateActivatableInput): Promise<Title> {
    const now = new Date();
    const [row] = await this.db
      .insert(titles)
      .values({
        id: input.id ?? crypto.randomUUID(),
        name: input.name,
        status: 'unactivated',
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return rowToTitle(row);
  }

  async get(id: Id): Promise<Title | null> {
    const [row] = await this.db.select().from(titles).where(eq(titles.id, id));
    return row ? rowToTitle(row) : null;
  }

  async list(filter?: ActivatableFilter): Promise<Title[]> {
    let query = this.db
      .select()
      .from(titles)
      .where(filter?.status ? inArray(titles.status, filter.status) : undefined)
      .orderBy(asc(titles.createdAt))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToTitle);
  }

  async setStatus(id: Id, status: ActivationStatus): Promise<Title | null> {
    const [row] = await this.db
      .update(titles)
      .set({ status, updatedAt: new Date() })
      .where(eq(titles.id, id))
      .returning();
    return row ? rowToTitle(row) : null;
  }

  async lock(id: Id): Promise<void> {
    await this.db.select({ id: titles.id }).from(titles).where(eq(titles.id, id)).for('update');
  }
}

export class PgStableRepository implements StableRepository {
  constructor(private db: Database) {}

  async create(input: CreateActivatableInput): Promise<Stable> {
    const now = new Date();
    const [row] = await this.db
      .insert(stables)
      .values({
        id: input.id ?? crypto.randomUUID(),
        name: input.name,
        status: 'unactivated',
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return rowToStable(row);
  }

  async get(id: Id): Promise<Stable | null> {
    const [row] = await this.db.select().from(stables).where(eq(stables.id, id));
    return row ? rowToStable(row) : null;
  }

  async list(filter?: ActivatableFilter): Promise<Stable[]> {
    let query = this.db
      .select()
      .from(stables)
      .where(filter?.status ? inArray(stables.status, filter.status) : undefined)
      .orderBy(asc(stables.createdAt))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToStable);
  }

  async setStatus(id: Id, status: ActivationStatus): Promise<Stable | null> {
    const [row] = await this.db
      .update(stables)
      .set({ status, updatedAt: new Date() })
      .where(eq(stables.id, id))
      .returning();
    return row ? rowToStable(row) : null;
  }

  async lock(id: Id): Promise<void> {
    await this.db.select({ id: stables.id }).from(stables).where(eq(stables.id, id)).for('update');
  }
}
