// Tests for bookability

import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositoryContext } from '@roster/repositories';
import { createFixedClock } from '../clock.js';
import { createRosterLifecycle, type RosterLifecycle } from '../lifecycle.js';

describe('bookability', () => {
  let lifecycle: RosterLifecycle;

  beforeEach(async () => {
    lifecycle = createRosterLifecycle({
      repos: createInMemoryRepositoryContext(),
      clock: createFixedClock('2024-06-01T00:00:00.000Z'),
      requiredTagTeamPartners: 3,
    });
    for (const [id, name] of [
      ['w-1', 'Ace'],
      ['w-2', 'Blaze'],
      ['w-3', 'Cruz'],
      ['w-4', 'Dash'],
    ]) {
      await lifecycle.register({ type: 'wrestler', id, name }, { employedAt: '2024-01-01' });
    }
  });

  it('lists only employed members of the requested type', async () => {
    await lifecycle.wrestlers.suspend('w-2', '2024-02-01');
    await lifecycle.wrestlers.injure('w-3', '2024-02-01');
    await lifecycle.register({ type: 'wrestler', id: 'w-5', name: 'Echo' }, { employedAt: '2024-09-01' });

    const available = await lifecycle.listAvailable('wrestler');

    expect(available.map((m) => m.id)).toEqual(['w-1', 'w-4']);
    expect(await lifecycle.listAvailable('referee')).toEqual([]);
  });

  it('is false for unknown and deleted members', async () => {
    await lifecycle.deleteRosterMember({ type: 'wrestler', id: 'w-4' }, '2024-03-01');

    expect(await lifecycle.isBookable({ type: 'wrestler', id: 'w-4' })).toBe(false);
    expect(await lifecycle.isBookable({ type: 'wrestler', id: 'nobody' })).toBe(false);
  });

  it('needs the configured number of employed partners for a tag team', async () => {
    const team = { type: 'tag_team', id: 'tt-1' } as const;
    await lifecycle.register({ type: 'tag_team', id: 'tt-1', name: 'Trio' }, { employedAt: '2024-01-01' });
    await lifecycle.addTagTeamPartner('tt-1', 'w-1', '2024-01-01');
    await lifecycle.addTagTeamPartner('tt-1', 'w-2', '2024-01-01');

    expect(await lifecycle.isBookable(team)).toBe(false);

    await lifecycle.addTagTeamPartner('tt-1', 'w-3', '2024-01-01');
    expect(await lifecycle.isBookable(team)).toBe(true);
    expect((await lifecycle.listAvailable('tag_team')).map((m) => m.id)).toEqual(['tt-1']);
  });
});
