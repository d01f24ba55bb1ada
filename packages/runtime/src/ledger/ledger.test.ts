// Tests for the period ledger

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from '@roster/repositories';
import { InvalidEffectiveDateError, LedgerInvariantError } from '../errors.js';
import {
  applyLedgerPlan,
  checkLedgerPlan,
  closePeriod,
  loadEmploymentHistory,
  openPeriod,
  rescheduleOpenPeriod,
} from './ledger.js';

const wrestler = { type: 'wrestler', id: 'w-1' } as const;

describe('period ledger', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('openPeriod', () => {
    it('refuses a second open period of the same kind', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');

      await expect(
        openPeriod(repos.periods, wrestler, 'employment', '2024-02-01T00:00:00.000Z')
      ).rejects.toThrow('wrestler:w-1 already has an open employment period');
    });

    it('refuses a start inside the previous period', async () => {
      await openPeriod(repos.periods, wrestler, 'injury', '2024-01-01T00:00:00.000Z');
      await closePeriod(repos.periods, wrestler, 'injury', '2024-02-01T00:00:00.000Z');

      await expect(
        openPeriod(repos.periods, wrestler, 'injury', '2024-01-15T00:00:00.000Z')
      ).rejects.toBeInstanceOf(LedgerInvariantError);
    });

    it('allows a start on the day the previous period ended', async () => {
      await openPeriod(repos.periods, wrestler, 'injury', '2024-01-01T00:00:00.000Z');
      await closePeriod(repos.periods, wrestler, 'injury', '2024-02-01T00:00:00.000Z');

      const period = await openPeriod(repos.periods, wrestler, 'injury', '2024-02-01T00:00:00.000Z');
      expect(period.endedAt).toBeNull();
    });
  });

  describe('closePeriod', () => {
    it('is a no-op when nothing is open', async () => {
      expect(await closePeriod(repos.periods, wrestler, 'suspension', '2024-01-01T00:00:00.000Z')).toBeNull();
    });

    it('refuses an end that does not follow the start', async () => {
      await openPeriod(repos.periods, wrestler, 'suspension', '2024-01-01T00:00:00.000Z');

      await expect(
        closePeriod(repos.periods, wrestler, 'suspension', '2024-01-01T00:00:00.000Z')
      ).rejects.toThrow(
        'suspension period period-1 of wrestler:w-1 cannot end at 2024-01-01T00:00:00.000Z'
      );
    });
  });

  describe('rescheduleOpenPeriod', () => {
    it('moves the open period', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2025-01-01T00:00:00.000Z');

      const moved = await rescheduleOpenPeriod(repos.periods, wrestler, 'employment', '2024-09-01T00:00:00.000Z');
      expect(moved.startedAt).toBe('2024-09-01T00:00:00.000Z');
      expect(repos._data.periods.size).toBe(1);
    });

    it('fails without an open period', async () => {
      await expect(
        rescheduleOpenPeriod(repos.periods, wrestler, 'employment', '2024-09-01T00:00:00.000Z')
      ).rejects.toThrow('wrestler:w-1 has no open employment period to move');
    });
  });

  describe('checkLedgerPlan', () => {
    const release = { closes: ['suspension', 'employment'], opens: [] } as const;

    it('rejects a close at or before the open period start', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');

      const check = checkLedgerPlan(repos.periods, wrestler, release, '2024-01-01T00:00:00.000Z');
      await expect(check).rejects.toBeInstanceOf(InvalidEffectiveDateError);
      await expect(check).rejects.toThrow(
        'Invalid effective date 2024-01-01T00:00:00.000Z: must fall after the start of the open employment period (2024-01-01T00:00:00.000Z)'
      );
    });

    it('rejects an open before the previous period ended', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');
      await closePeriod(repos.periods, wrestler, 'employment', '2024-03-01T00:00:00.000Z');

      await expect(
        checkLedgerPlan(
          repos.periods,
          wrestler,
          { closes: [], opens: ['employment'] },
          '2024-02-01T00:00:00.000Z'
        )
      ).rejects.toThrow('must not precede the end of the previous employment period');
    });

    it('rejects a retirement that starts before the last employment ended', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');
      await closePeriod(repos.periods, wrestler, 'employment', '2024-03-01T00:00:00.000Z');

      await expect(
        checkLedgerPlan(
          repos.periods,
          wrestler,
          { closes: ['employment'], opens: ['retirement'], follows: ['employment'] },
          '2024-02-01T00:00:00.000Z'
        )
      ).rejects.toThrow(
        'Invalid effective date 2024-02-01T00:00:00.000Z: must not precede the end of the last employment period (2024-03-01T00:00:00.000Z)'
      );
    });

    it('writes nothing', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');
      await checkLedgerPlan(repos.periods, wrestler, release, '2024-02-01T00:00:00.000Z');

      expect(await repos.periods.current(wrestler, 'employment')).not.toBeNull();
    });
  });

  describe('applyLedgerPlan', () => {
    it('closes the suspension and employment, then opens the retirement', async () => {
      await openPeriod(repos.periods, wrestler, 'employment', '2024-01-01T00:00:00.000Z');
      await openPeriod(repos.periods, wrestler, 'suspension', '2024-02-01T00:00:00.000Z');

      await applyLedgerPlan(
        repos.periods,
        wrestler,
        { closes: ['suspension', 'employment'], opens: ['retirement'] },
        '2024-03-01T00:00:00.000Z'
      );

      const history = await loadEmploymentHistory(repos.periods, wrestler);
      expect(history.suspension.map((p) => p.endedAt)).toEqual(['2024-03-01T00:00:00.000Z']);
      expect(history.employment.map((p) => p.endedAt)).toEqual(['2024-03-01T00:00:00.000Z']);
      expect(history.retirement.map((p) => [p.startedAt, p.endedAt])).toEqual([
        ['2024-03-01T00:00:00.000Z', null],
      ]);
      expect(history.injury).toEqual([]);
    });
  });
});
