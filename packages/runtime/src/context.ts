// Lifecycle context and the unit of work every operation runs in

import { z } from 'zod';
import type { Timestamp } from '@roster/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
} from '@roster/repositories';
import { systemClock, type Clock } from './clock.js';
import { bindOperation, silentLogger, type Logger } from './logger.js';
import { RuntimeError, ValidationError } from './errors.js';

/**
 * Options for creating a roster lifecycle.
 */
export type RosterLifecycleOptions = {
  /** Repository context; every operation runs inside one of its transactions */
  repos: TransactionalRepositoryContext;

  /** Source of "now" for defaulted effective dates. Defaults to the system clock. */
  clock?: Clock;

  /** Defaults to a silent logger */
  logger?: Logger;

  /** Partners a tag team needs to be bookable. Defaults to 2. */
  requiredTagTeamPartners?: number;
};

export type LifecycleContext = {
  repos: TransactionalRepositoryContext;
  clock: Clock;
  logger: Logger;
  requiredTagTeamPartners: number;
};

/**
 * A log line held back until the unit of work commits.
 */
export type PendingLog = {
  message: string;
  data: Record<string, unknown>;
};

/**
 * Everything an operation sees while its transaction is open.
 */
export type UnitOfWork = {
  /** Transaction-scoped repositories */
  repos: RepositoryContext;
  /** "Now", read once when the transaction started */
  now: Timestamp;
  logger: Logger;
  requiredTagTeamPartners: number;
  /** Info lines emitted after commit, in order */
  pending: PendingLog[];
};

const requiredPartnersSchema = z
  .number()
  .int('requiredTagTeamPartners must be an integer')
  .min(1, 'requiredTagTeamPartners must be at least 1');

export function resolveContext(options: RosterLifecycleOptions): LifecycleContext {
  const partners = requiredPartnersSchema.safeParse(options.requiredTagTeamPartners ?? 2);
  if (!partners.success) {
    throw new ValidationError(partners.error.issues[0]?.message ?? 'Invalid option', {
      field: 'requiredTagTeamPartners',
    });
  }

  return {
    repos: options.repos,
    clock: options.clock ?? systemClock,
    logger: options.logger ?? silentLogger,
    requiredTagTeamPartners: partners.data,
  };
}

/**
 * Run one operation as a single all-or-nothing transaction.
 *
 * Every line it writes carries `operation` and `subject`. Rejections (any
 * RuntimeError) are logged at warn with their code, anything else at error;
 * both are rethrown unchanged. Held-back info lines are only written once the
 * transaction has committed.
 */
export async function runUnitOfWork<T>(
  ctx: LifecycleContext,
  operation: string,
  subject: string,
  work: (uow: UnitOfWork) => Promise<T>
): Promise<T> {
  const pending: PendingLog[] = [];
  const logger = bindOperation(ctx.logger, { operation, subject });

  try {
    const result = await ctx.repos.transaction((repos) =>
      work({
        repos,
        now: ctx.clock.now().toISOString(),
        logger,
        requiredTagTeamPartners: ctx.requiredTagTeamPartners,
        pending,
      })
    );

    for (const entry of pending) {
      logger.info(entry.message, entry.data);
    }

    return result;
  } catch (error) {
    if (error instanceof RuntimeError) {
      logger.warn('Operation rejected', {
        code: error.code,
        message: error.message,
      });
    } else {
      logger.error('Operation failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    throw error;
  }
}
