// Input parsing for public operations

import { z } from 'zod';
import type {
  ChampionRef,
  Id,
  RosterMemberRef,
  Timestamp,
} from '@roster/protocol';
import { rosterMemberRef } from './entities.js';
import { ValidationError } from './errors.js';

/**
 * An effective date as callers may pass it: a Date or anything `Date` parses.
 */
export type EffectiveDate = Date | string;

export const entityIdSchema = z.string().trim().min(1, 'Entity id is required');

export const effectiveDateSchema = z.union([
  z.date(),
  z.string().min(1, 'Effective date must not be empty'),
]);

const timestampSchema = effectiveDateSchema.transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Effective date is not a valid date' });
    return z.NEVER;
  }
  return date.toISOString();
});

export const createActivatableSchema = z.object({
  id: entityIdSchema.optional(),
  name: z.string().trim().min(1, 'Name is required'),
});

const rosterMemberTypeSchema = z.enum(['wrestler', 'referee', 'manager', 'tag_team']);
const wrestlerOrTeamSchema = z.enum(['wrestler', 'tag_team']);

function fail(error: z.ZodError, field: string, value: unknown): never {
  throw new ValidationError(error.issues[0]?.message ?? 'Invalid input', {
    field,
    details: { value: String(value), issues: error.issues },
  });
}

/**
 * Parse a whole input object, reporting the first issue and its path.
 * @throws ValidationError
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid input', {
      field: issue?.path.join('.'),
      details: { issues: result.error.issues },
    });
  }
  return result.data;
}

/**
 * Validate and trim an entity id.
 * @throws ValidationError
 */
export function parseEntityId(value: unknown, field = 'entityId'): Id {
  const result = entityIdSchema.safeParse(value);
  return result.success ? result.data : fail(result.error, field, value);
}

/**
 * Normalise an effective date to an ISO timestamp, defaulting to `now`.
 * @throws ValidationError
 */
export function parseEffectiveDate(
  value: EffectiveDate | undefined,
  now: Timestamp,
  field = 'effectiveDate'
): Timestamp {
  if (value === undefined) return now;
  const result = timestampSchema.safeParse(value);
  return result.success ? result.data : fail(result.error, field, value);
}

/**
 * @throws ValidationError
 */
export function parseRosterMemberRef(ref: RosterMemberRef, field = 'entity'): RosterMemberRef {
  const type = rosterMemberTypeSchema.safeParse(ref.type);
  if (!type.success) fail(type.error, `${field}.type`, ref.type);
  return rosterMemberRef(type.data, parseEntityId(ref.id, `${field}.id`));
}

/**
 * Parse a reference to a wrestler or a tag team: a champion, a stable member
 * or a manager's client.
 * @throws ValidationError
 */
export function parseChampionRef(ref: ChampionRef, field = 'entity'): ChampionRef {
  const type = wrestlerOrTeamSchema.safeParse(ref.type);
  if (!type.success) fail(type.error, `${field}.type`, ref.type);
  const id = parseEntityId(ref.id, `${field}.id`);
  return type.data === 'wrestler' ? { type: 'wrestler', id } : { type: 'tag_team', id };
}
