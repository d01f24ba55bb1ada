import type { RosterMemberRepository } from './roster-member-repository.js';
import type { TitleRepository, StableRepository } from './activatable-repository.js';
import type { PeriodRepository } from './period-repository.js';
import type { ChampionshipRepository } from './championship-repository.js';
import type { MembershipRepository } from './membership-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory, etc.)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createTransactionalPgRepositoryContext(db);
 * const lifecycle = createRosterLifecycle({ repos });
 * await lifecycle.wrestlers.employ('wrestler-1', '2024-01-01');
 * ```
 */
export interface RepositoryContext {
  readonly rosterMembers: RosterMemberRepository;
  readonly titles: TitleRepository;
  readonly stables: StableRepository;
  readonly periods: PeriodRepository;
  readonly championships: ChampionshipRepository;
  readonly memberships: MembershipRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 *
 * Every transition runs inside one transaction, so a failure at any step
 * leaves the stored state exactly as it was before the call.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function will be atomic.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
