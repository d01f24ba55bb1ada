import type { Id, ActivationStatus, Stable, Title } from '@roster/protocol';

/**
 * Input for creating a title or stable. New records start `unactivated`.
 */
export type CreateActivatableInput = {
  id?: Id;
  name: string;
};

/**
 * Filter for listing titles or stables
 */
export type ActivatableFilter = {
  status?: ActivationStatus[];
  limit?: number;
  offset?: number;
};

/**
 * Repository interface shared by titles and stables, whose lifecycles run on
 * activation periods instead of employment.
 */
export interface ActivatableRepository<T extends Title | Stable> {
  create(input: CreateActivatableInput): Promise<T>;

  get(id: Id): Promise<T | null>;

  list(filter?: ActivatableFilter): Promise<T[]>;

  /**
   * Store the projected status
   */
  setStatus(id: Id, status: ActivationStatus): Promise<T | null>;

  /**
   * Take the per-entity serialization point for the current unit of work.
   */
  lock(id: Id): Promise<void>;
}

export type TitleRepository = ActivatableRepository<Title>;
export type StableRepository = ActivatableRepository<Stable>;
