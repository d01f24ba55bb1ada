import type { Id, Timestamp, ChampionRef, TitleChampionship } from '@roster/protocol';

/**
 * Input for starting a reign
 */
export type CreateChampionshipInput = {
  id?: Id;
  titleId: Id;
  champion: ChampionRef;
  wonAt: Timestamp;
};

/**
 * Repository interface for title championships.
 *
 * Implementations must refuse a second open reign for the same title.
 */
export interface ChampionshipRepository {
  create(input: CreateChampionshipInput): Promise<TitleChampionship>;

  /**
   * Close the title's open reign.
   * @returns The closed reign, or null when the title was vacant
   */
  endOpen(titleId: Id, lostAt: Timestamp): Promise<TitleChampionship | null>;

  /**
   * The title's open reign, if any
   */
  current(titleId: Id): Promise<TitleChampionship | null>;

  /**
   * Open reigns held by a champion (one per title)
   */
  currentForChampion(champion: ChampionRef): Promise<TitleChampionship[]>;

  /**
   * All reigns of a title, by `wonAt` ascending
   */
  listForTitle(titleId: Id): Promise<TitleChampionship[]>;

  /**
   * All reigns of a champion, by `wonAt` ascending
   */
  listForChampion(champion: ChampionRef): Promise<TitleChampionship[]>;
}
