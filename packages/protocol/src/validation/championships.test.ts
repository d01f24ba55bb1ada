// Tests for championship helpers

import { describe, it, expect } from 'vitest';
import { daysBetween, reignLengthInDays } from './championships.js';

describe('daysBetween', () => {
  it('counts whole days', () => {
    expect(daysBetween('2024-01-01T00:00:00.000Z', '2024-01-31T00:00:00.000Z')).toBe(30);
  });

  it('floors partial days', () => {
    expect(daysBetween('2024-01-01T00:00:00.000Z', '2024-01-02T23:59:59.000Z')).toBe(1);
  });

  it('never goes negative', () => {
    expect(daysBetween('2024-02-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z')).toBe(0);
  });
});

describe('reignLengthInDays', () => {
  it('measures a finished reign to lostAt', () => {
    expect(
      reignLengthInDays(
        { wonAt: '2024-01-01T00:00:00.000Z', lostAt: '2024-03-01T00:00:00.000Z' },
        '2025-01-01T00:00:00.000Z'
      )
    ).toBe(60);
  });

  it('measures a running reign to now', () => {
    expect(
      reignLengthInDays(
        { wonAt: '2024-01-01T00:00:00.000Z', lostAt: null },
        '2024-01-11T12:00:00.000Z'
      )
    ).toBe(10);
  });
});
