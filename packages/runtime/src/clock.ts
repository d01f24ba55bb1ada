// Time source and timestamp comparisons

import type { Timestamp } from '@roster/protocol';

/**
 * Source of "now". Injected so that defaulted effective dates and status
 * projection are deterministic under test.
 */
export type Clock = {
  now(): Date;
};

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock that stays where it is put.
 */
export function createFixedClock(at: Date | string): Clock & { set(at: Date | string): void } {
  let current = new Date(at);
  return {
    now: () => new Date(current),
    set(next) {
      current = new Date(next);
    },
  };
}

function toMillis(value: Timestamp): number {
  return new Date(value).getTime();
}

export function isBefore(a: Timestamp, b: Timestamp): boolean {
  return toMillis(a) < toMillis(b);
}

export function isAfter(a: Timestamp, b: Timestamp): boolean {
  return toMillis(a) > toMillis(b);
}

export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return toMillis(a) - toMillis(b);
}
