// Tests for the roster lifecycle facade

import { describe, it, expect, beforeEach } from 'vitest';
import { formatRef } from '@roster/protocol';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from '@roster/repositories';
import { createFixedClock } from './clock.js';
import { createCapturingLogger, type LogEntry } from './logger.js';
import { refOf } from './entities.js';
import {
  CannotBeRestoredError,
  CannotTransitionError,
  DuplicateEntityError,
  EntityNotFoundError,
  InvalidEffectiveDateError,
  ValidationError,
} from './errors.js';
import { currentEmploymentStatus } from './status/index.js';
import { createRosterLifecycle, type RosterLifecycle } from './lifecycle.js';

// --- Test Fixtures ---

const NOW = '2024-06-01T00:00:00.000Z';
const W1 = { type: 'wrestler', id: 'w-1' } as const;

function createMockLifecycle() {
  const repos = createInMemoryRepositoryContext();
  const clock = createFixedClock(NOW);
  const logger = createCapturingLogger(clock);
  const lifecycle = createRosterLifecycle({ repos, clock, logger });
  return { repos, clock, logger, lifecycle };
}

async function periodsOf(lifecycle: RosterLifecycle, ref: Parameters<RosterLifecycle['periods']>[0]) {
  return (await lifecycle.periods(ref)).map((p) => [p.kind, p.startedAt, p.endedAt]);
}

/**
 * Every cached status matches its projection, and no owner has two open
 * periods of one kind.
 */
async function expectConsistent(repos: InMemoryRepositoryContext, now = NOW) {
  const open = Array.from(repos._data.periods.values())
    .filter((p) => p.endedAt === null)
    .map((p) => `${formatRef(p.owner)}/${p.kind}`);
  expect(new Set(open).size).toBe(open.length);

  for (const member of repos._data.rosterMembers.values()) {
    expect(await currentEmploymentStatus(repos, refOf(member), now)).toBe(member.status);
  }
}

const infoMessages = (entries: LogEntry[]) =>
  entries.filter((e) => e.level === 'info').map((e) => e.message);

describe('roster lifecycle', () => {
  let repos: InMemoryRepositoryContext;
  let clock: ReturnType<typeof createFixedClock>;
  let logger: ReturnType<typeof createCapturingLogger>;
  let lifecycle: RosterLifecycle;

  beforeEach(async () => {
    ({ repos, clock, logger, lifecycle } = createMockLifecycle());
    await lifecycle.register({ type: 'wrestler', id: 'w-1', name: 'Ace' });
  });

  // --- Employment transitions ---

  describe('employment', () => {
    it('walks a wrestler from employment through suspension into retirement', async () => {
      const employed = await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      expect(employed.status).toBe('employed');
      expect(await periodsOf(lifecycle, W1)).toEqual([
        ['employment', '2024-01-01T00:00:00.000Z', null],
      ]);

      const suspended = await lifecycle.wrestlers.suspend('w-1', '2024-02-01');
      expect(suspended.status).toBe('suspended');

      const retired = await lifecycle.wrestlers.retire('w-1', '2024-03-01');
      expect(retired.status).toBe('retired');
      expect(await periodsOf(lifecycle, W1)).toEqual([
        ['employment', '2024-01-01T00:00:00.000Z', '2024-03-01T00:00:00.000Z'],
        ['suspension', '2024-02-01T00:00:00.000Z', '2024-03-01T00:00:00.000Z'],
        ['retirement', '2024-03-01T00:00:00.000Z', null],
      ]);
      await expectConsistent(repos);
    });

    it('returns to unemployed after retiring and unretiring', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.retire('w-1', '2024-03-01');

      const unretired = await lifecycle.wrestlers.unretire('w-1', '2024-04-01');

      expect(unretired.status).toBe('unemployed');
      expect(await repos.periods.current(W1, 'employment')).toBeNull();
      expect(await repos.periods.list(W1, 'employment')).toHaveLength(1);
      await expectConsistent(repos);
    });

    it('employs again after unretiring, but not inside the old career', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.retire('w-1', '2024-03-01');
      await lifecycle.wrestlers.unretire('w-1', '2024-04-01');

      await expect(lifecycle.wrestlers.employ('w-1', '2024-03-15')).rejects.toThrow(
        'Invalid effective date 2024-03-15T00:00:00.000Z: must not precede the end of the last retirement (2024-04-01T00:00:00.000Z)'
      );

      const employed = await lifecycle.wrestlers.employ('w-1', '2024-05-01');
      expect(employed.status).toBe('employed');
      expect(await repos.periods.list(W1, 'employment')).toHaveLength(2);
    });

    it('ends both suspension and employment when releasing a suspended wrestler', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.suspend('w-1', '2024-02-01');

      const released = await lifecycle.wrestlers.release('w-1', '2024-03-01');

      expect(released.status).toBe('released');
      expect(await repos.periods.current(W1, 'suspension')).toBeNull();
      expect(await repos.periods.current(W1, 'employment')).toBeNull();
      await expectConsistent(repos);
    });

    it('rejects a retirement dated before the release it follows', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.release('w-1', '2024-03-01');

      await expect(lifecycle.wrestlers.retire('w-1', '2024-02-01')).rejects.toThrow(
        'Invalid effective date 2024-02-01T00:00:00.000Z: must not precede the end of the last employment period (2024-03-01T00:00:00.000Z)'
      );
      expect((await lifecycle.wrestlers.get('w-1'))?.status).toBe('released');

      const retired = await lifecycle.wrestlers.retire('w-1', '2024-03-01');
      expect(retired.status).toBe('retired');
      await expectConsistent(repos);
    });

    it('reinstates and clears injuries back to employed', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.suspend('w-1', '2024-02-01');
      expect((await lifecycle.wrestlers.reinstate('w-1', '2024-02-10')).status).toBe('employed');

      await lifecycle.wrestlers.injure('w-1', '2024-03-01');
      expect((await lifecycle.wrestlers.get('w-1'))?.status).toBe('injured');
      expect((await lifecycle.wrestlers.clearInjury('w-1', '2024-04-01')).status).toBe('employed');
      await expectConsistent(repos);
    });

    it('rejects suspending an injured wrestler', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.wrestlers.injure('w-1', '2024-02-01');

      const attempt = lifecycle.wrestlers.suspend('w-1', '2024-03-01');
      await expect(attempt).rejects.toBeInstanceOf(CannotTransitionError);
      await expect(attempt).rejects.toThrow('Cannot suspend wrestler:w-1: current status is "injured"');
    });

    it('rejects employing an employed wrestler', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');

      await expect(lifecycle.wrestlers.employ('w-1', '2024-02-01')).rejects.toThrow(
        'Cannot employ wrestler:w-1: current status is "employed"'
      );
      expect(await repos.periods.list(W1, 'employment')).toHaveLength(1);
    });

    it('rejects a suspension that starts before the employment', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-02-01');

      await expect(lifecycle.wrestlers.suspend('w-1', '2024-01-01')).rejects.toBeInstanceOf(
        InvalidEffectiveDateError
      );
    });

    it('rejects a release on the day employment started', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');

      await expect(lifecycle.wrestlers.release('w-1', '2024-01-01')).rejects.toThrow(
        'must fall after the start of the open employment period'
      );
    });

    it('defaults the effective date to the clock', async () => {
      await lifecycle.wrestlers.employ('w-1');

      expect(await periodsOf(lifecycle, W1)).toEqual([['employment', NOW, null]]);
    });

    it('works the same for referees and managers', async () => {
      await lifecycle.register({ type: 'referee', id: 'r-1', firstName: 'Sam', lastName: 'Stripes' });
      await lifecycle.register({ type: 'manager', id: 'm-1', firstName: 'Lou', lastName: 'Money' });

      expect((await lifecycle.referees.employ('r-1', '2024-01-01')).status).toBe('employed');
      expect((await lifecycle.managers.employ('m-1', '2024-01-01')).status).toBe('employed');
      expect((await lifecycle.referees.injure('r-1', '2024-02-01')).status).toBe('injured');
      expect((await lifecycle.managers.retire('m-1', '2024-02-01')).status).toBe('retired');
    });

    it('does not find a wrestler through another family', async () => {
      await expect(lifecycle.referees.employ('w-1', '2024-01-01')).rejects.toThrow(
        'Entity not found: referee:w-1'
      );
      expect(await lifecycle.referees.get('w-1')).toBeNull();
    });
  });

  // --- Future employment ---

  describe('future employment', () => {
    it('projects future employment and moves it on a second employ', async () => {
      expect((await lifecycle.wrestlers.employ('w-1', '2024-09-01')).status).toBe('future_employed');

      const moved = await lifecycle.wrestlers.employ('w-1', '2024-08-01');

      expect(moved.status).toBe('future_employed');
      expect(await periodsOf(lifecycle, W1)).toEqual([
        ['employment', '2024-08-01T00:00:00.000Z', null],
      ]);
    });

    it('brings a future employment forward to today', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-09-01');

      expect((await lifecycle.wrestlers.employ('w-1', '2024-05-01')).status).toBe('employed');
    });

    it('refreshes the cached status once the start date passes', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-08-01');
      clock.set('2024-08-15T00:00:00.000Z');

      expect((await lifecycle.getRosterMember(W1))?.status).toBe('future_employed');
      expect((await lifecycle.refreshStatus(W1)).status).toBe('employed');
      await expectConsistent(repos, '2024-08-15T00:00:00.000Z');
    });
  });

  // --- Atomicity and serialization ---

  describe('atomicity', () => {
    it('rolls the whole action back when a cascade fails', async () => {
      await lifecycle.titles.create({ id: 't-1', name: 'World' });
      await lifecycle.titles.activate('t-1', '2023-12-01');
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      await lifecycle.awardTitle('t-1', W1, '2024-03-01');

      // The reign started after the release date, so vacating it fails
      await expect(lifecycle.wrestlers.release('w-1', '2024-02-01')).rejects.toThrow(
        'must fall after the start of the reign'
      );

      expect((await lifecycle.wrestlers.get('w-1'))?.status).toBe('employed');
      expect(await repos.periods.current(W1, 'employment')).not.toBeNull();
      expect((await lifecycle.currentChampionship('t-1'))?.champion).toEqual(W1);
      await expectConsistent(repos);
    });

    it('lets only one of two simultaneous employs through', async () => {
      const results = await Promise.allSettled([
        lifecycle.wrestlers.employ('w-1', '2024-01-01'),
        lifecycle.wrestlers.employ('w-1', '2024-01-02'),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(await repos.periods.list(W1, 'employment')).toHaveLength(1);
      await expectConsistent(repos);
    });
  });

  // --- Logging ---

  describe('logging', () => {
    it('logs committed transitions', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');

      expect(logger.entries.at(-1)).toMatchObject({
        level: 'info',
        message: 'Transition committed',
        data: {
          transition: 'employ',
          entity: 'wrestler:w-1',
          from: 'unemployed',
          to: 'employed',
          effectiveAt: '2024-01-01T00:00:00.000Z',
        },
      });
    });

    it('logs rejections at warn without a committed line', async () => {
      logger.entries.length = 0;

      await expect(lifecycle.wrestlers.release('w-1', '2024-01-01')).rejects.toThrow(CannotTransitionError);

      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0]).toMatchObject({
        level: 'warn',
        message: 'Operation rejected',
        data: { operation: 'release', subject: 'wrestler:w-1', code: 'CANNOT_TRANSITION' },
      });
    });

    it('rejects malformed effective dates as validation errors', async () => {
      await expect(lifecycle.wrestlers.employ('w-1', 'soon')).rejects.toBeInstanceOf(ValidationError);
      expect(logger.entries.at(-1)?.data).toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  // --- Registration ---

  describe('registration', () => {
    it('registers members unemployed, or employed when a date is given', async () => {
      const referee = await lifecycle.register({
        type: 'referee',
        firstName: 'Sam',
        lastName: 'Stripes',
      });
      const team = await lifecycle.register(
        { type: 'tag_team', id: 'tt-1', name: 'The Aces' },
        { employedAt: '2024-01-01' }
      );

      expect(referee).toMatchObject({ type: 'referee', id: 'referee-2', status: 'unemployed' });
      expect(team.status).toBe('employed');
      expect(infoMessages(logger.entries).slice(-2)).toEqual([
        'Roster member registered',
        'Transition committed',
      ]);
    });

    it('rejects a blank name', async () => {
      await expect(lifecycle.register({ type: 'wrestler', name: '  ' })).rejects.toThrow('Name is required');
      expect(repos._data.rosterMembers.size).toBe(1);
    });

    it('hides deleted members from transitions until restored', async () => {
      await lifecycle.wrestlers.employ('w-1', '2024-01-01');
      const deleted = await lifecycle.deleteRosterMember(W1, '2024-02-01');

      expect(deleted.deletedAt).toBe('2024-02-01T00:00:00.000Z');
      await expect(lifecycle.wrestlers.release('w-1', '2024-03-01')).rejects.toBeInstanceOf(
        EntityNotFoundError
      );

      const restored = await lifecycle.restoreRosterMember(W1);
      expect(restored.deletedAt).toBeNull();
      expect(restored.status).toBe('employed');
    });

    it('refuses an id that is already registered, deleted or not', async () => {
      await expect(lifecycle.register({ type: 'wrestler', id: 'w-1', name: 'Other' })).rejects.toThrow(
        'Entity already exists: wrestler:w-1'
      );

      await lifecycle.deleteRosterMember(W1, '2024-02-01');
      await expect(
        lifecycle.register({ type: 'wrestler', id: 'w-1', name: 'Other' })
      ).rejects.toBeInstanceOf(DuplicateEntityError);
      expect(repos._data.rosterMembers.get('wrestler:w-1')).toMatchObject({ name: 'Ace' });
    });

    it('refuses to restore a member that is not deleted', async () => {
      await expect(lifecycle.restoreRosterMember(W1)).rejects.toBeInstanceOf(CannotBeRestoredError);
      await expect(lifecycle.restoreRosterMember(W1)).rejects.toThrow(
        'Cannot restore wrestler:w-1: it is not deleted'
      );
    });
  });

  // --- Titles and stables ---

  describe('activatable creation', () => {
    it('never replaces an existing title', async () => {
      await lifecycle.titles.create({ id: 'title-2', name: 'World' });
      await lifecycle.titles.activate('title-2', '2024-01-01');

      const next = await lifecycle.titles.create({ name: 'Intercontinental' });
      expect(next.id).toBe('title-3');

      await expect(lifecycle.titles.create({ id: 'title-2', name: 'Tag' })).rejects.toThrow(
        'Entity already exists: title:title-2'
      );
      expect(await lifecycle.titles.get('title-2')).toMatchObject({ name: 'World', status: 'active' });
    });

    it('rejects a title retirement dated before its deactivation', async () => {
      await lifecycle.titles.create({ id: 't-1', name: 'World' });
      await lifecycle.titles.activate('t-1', '2024-01-01');
      await lifecycle.titles.deactivate('t-1', '2024-03-01');

      await expect(lifecycle.titles.retire('t-1', '2024-02-01')).rejects.toThrow(
        'Invalid effective date 2024-02-01T00:00:00.000Z: must not precede the end of the last activation period (2024-03-01T00:00:00.000Z)'
      );
      expect(await lifecycle.titles.get('t-1')).toMatchObject({ status: 'inactive' });
    });

    it('never replaces an existing stable', async () => {
      await lifecycle.stables.create({ id: 'stable-1', name: 'The Faction' });
      await lifecycle.stables.activate('stable-1', '2024-01-01');

      await expect(
        lifecycle.stables.create({ id: 'stable-1', name: 'The Other Faction' })
      ).rejects.toBeInstanceOf(DuplicateEntityError);
      expect(await lifecycle.stables.get('stable-1')).toMatchObject({
        name: 'The Faction',
        status: 'active',
      });
    });
  });
});
