// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  RosterMemberRepository,
  CreateRosterMemberInput,
  RosterMemberFilter,
  GetRosterMemberOptions,
} from './roster-member-repository.js';

export type {
  ActivatableRepository,
  TitleRepository,
  StableRepository,
  CreateActivatableInput,
  ActivatableFilter,
} from './activatable-repository.js';

export type { PeriodRepository, CreatePeriodInput } from './period-repository.js';

export type {
  ChampionshipRepository,
  CreateChampionshipInput,
} from './championship-repository.js';

export type {
  MembershipRepository,
  AttachMembershipInput,
} from './membership-repository.js';

export type {
  RepositoryContext,
  RepositoryContextFactory,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
