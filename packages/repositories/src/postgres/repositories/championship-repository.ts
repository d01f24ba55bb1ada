import { and, asc, eq, isNull } from 'drizzle-orm';
import type { Database } from '../db.js';
import { titleChampionships } from '../schema/index.js';
import { rowToChampionship } from '../mappers.js';
import type {
  ChampionshipRepository,
  CreateChampionshipInput,
} from '../../interfaces/index.js';
import type { ChampionRef, Id, Timestamp, TitleChampionship } from '@roster/protocol';

export class PgChampionshipRepository implements ChampionshipRepository {
  constructor(private db: Database) {}

  async create(input: CreateChampionshipInput): Promise<TitleChampionship> {
    const [row] = await this.db
      .insert(titleChampionships)
      .values({
        id: input.id ?? crypto.randomUUID(),
        titleId: input.titleId,
        championType: input.champion.type,
        championId: input.champion.id,
        wonAt: new Date(input.wonAt),
      })
      .returning();
    return rowToChampionship(row);
  }

  async endOpen(titleId: Id, lostAt: Timestamp): Promise<TitleChampionship | null> {
    const [row] = await this.db
      .update(titleChampionships)
      .set({ lostAt: new Date(lostAt) })
      .where(and(eq(titleChampionships.titleId, titleId), isNull(titleChampionships.lostAt)))
      .returning();
    return row ? rowToChampionship(row) : null;
  }

  async current(titleId: Id): Promise<TitleChampionship | null> {
    const [row] = await this.db
      .select()
      .from(titleChampionships)
      .where(and(eq(titleChampionships.titleId, titleId), isNull(titleChampionships.lostAt)));
    return row ? rowToChampionship(row) : null;
  }

  async currentForChampion(champion: ChampionRef): Promise<TitleChampionship[]> {
    const rows = await this.db
      .select()
      .from(titleChampionships)
      .where(and(this.heldBy(champion), isNull(titleChampionships.lostAt)))
      .orderBy(asc(titleChampionships.wonAt));
    return rows.map(rowToChampionship);
  }

  async listForTitle(titleId: Id): Promise<TitleChampionship[]> {
    const rows = await this.db
      .select()
      .from(titleChampionships)
      .where(eq(titleChampionships.titleId, titleId))
      .orderBy(asc(titleChampionships.wonAt));
    return rows.map(rowToChampionship);
  }

  async listForChampion(champion: ChampionRef): Promise<TitleChampionship[]> {
    const rows = await this.db
      .select()
      .from(titleChampionships)
      .where(this.heldBy(champion))
      .orderBy(asc(titleChampionships.wonAt));
    return rows.map(rowToChampionship);
  }

  private heldBy(champion: ChampionRef) {
    return and(
      eq(titleChampionships.championType, champion.type),
      eq(titleChampionships.championId, champion.id)
    );
  }
}
