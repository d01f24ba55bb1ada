// Postgres repository implementations
export { PgRosterMemberRepository } from './roster-member-repository.js';
export { PgTitleRepository, PgStableRepository } from './activatable-repository.js';
export { PgPeriodRepository } from './period-repository.js';
export { PgChampionshipRepository } from './championship-repository.js';
export { PgMembershipRepository } from './membership-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
