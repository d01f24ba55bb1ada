// Championship helpers

import type { Timestamp } from '../types/common.js';
import type { TitleChampionship } from '../types/titles.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days between two instants, never negative.
 */
export function daysBetween(start: Timestamp, end: Timestamp): number {
  const diff = new Date(end).getTime() - new Date(start).getTime();
  return diff <= 0 ? 0 : Math.floor(diff / MS_PER_DAY);
}

/**
 * Length of a reign in whole days, measured to `lostAt` or, while the
 * championship is still held, to `now`.
 */
export function reignLengthInDays(
  championship: Pick<TitleChampionship, 'wonAt' | 'lostAt'>,
  now: Timestamp
): number {
  return daysBetween(championship.wonAt, championship.lostAt ?? now);
}
