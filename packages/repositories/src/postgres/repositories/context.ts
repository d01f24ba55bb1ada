import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgRosterMemberRepository } from './roster-member-repository.js';
import { PgTitleRepository, PgStableRepository } from './activatable-repository.js';
import { PgPeriodRepository } from './period-repository.js';
import { PgChampionshipRepository } from './championship-repository.js';
import { PgMembershipRepository } from './membership-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * const repos = createPgRepositoryContext(db);
 *
 * const wrestler = await repos.rosterMembers.get({ type: 'wrestler', id: 'w-1' });
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    rosterMembers: new PgRosterMemberRepository(db),
    titles: new PgTitleRepository(db),
    stables: new PgStableRepository(db),
    periods: new PgPeriodRepository(db),
    championships: new PgChampionshipRepository(db),
    memberships: new PgMembershipRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This is what the runtime needs: every transition runs inside
 * `transaction()`, and `lock()` calls inside it take row locks
 * (`SELECT ... FOR UPDATE`) that are held until commit or rollback.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * const repos = createTransactionalPgRepositoryContext(db);
 * const lifecycle = createRosterLifecycle({ repos });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly rosterMembers: PgRosterMemberRepository;
  readonly titles: PgTitleRepository;
  readonly stables: PgStableRepository;
  readonly periods: PgPeriodRepository;
  readonly championships: PgChampionshipRepository;
  readonly memberships: PgMembershipRepository;

  constructor(private db: Database) {
    this.rosterMembers = new PgRosterMemberRepository(db);
    this.titles = new PgTitleRepository(db);
    this.stables = new PgStableRepository(db);
    this.periods = new PgPeriodRepository(db);
    this.championships = new PgChampionshipRepository(db);
    this.memberships = new PgMembershipRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      // Drizzle's transaction handle exposes the same query surface as the database
      const txDb = tx as unknown as Database;
      return fn(createPgRepositoryContext(txDb));
    });
  }
}
