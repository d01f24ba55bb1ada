// Registration, soft deletion and status resynchronisation

import { z } from 'zod';
import type { RosterMember, RosterMemberRef, Timestamp } from '@roster/protocol';
import { formatRef } from '@roster/protocol';
import type { CreateRosterMemberInput } from '@roster/repositories';
import type { UnitOfWork } from '../context.js';
import { refOf, requireRosterMember } from '../entities.js';
import { CannotBeRestoredError, DuplicateEntityError, EntityNotFoundError } from '../errors.js';
import { entityIdSchema } from '../input.js';
import { syncEmploymentStatus } from '../status/index.js';
import { transitionRosterMember } from '../transitions/index.js';

const nameSchema = z.string().trim().min(1, 'Name is required');
const optionalText = z.string().trim().min(1).optional();

export const registerRosterMemberSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('wrestler'),
    id: entityIdSchema.optional(),
    name: nameSchema,
    hometown: optionalText,
    signatureMove: optionalText,
  }),
  z.object({
    type: z.literal('referee'),
    id: entityIdSchema.optional(),
    firstName: nameSchema,
    lastName: nameSchema,
  }),
  z.object({
    type: z.literal('manager'),
    id: entityIdSchema.optional(),
    firstName: nameSchema,
    lastName: nameSchema,
  }),
  z.object({
    type: z.literal('tag_team'),
    id: entityIdSchema.optional(),
    name: nameSchema,
    signatureMove: optionalText,
  }),
]);

export type RegisterRosterMemberInput = z.input<typeof registerRosterMemberSchema>;

/**
 * Create an unemployed roster member, employing it at `employedAt` when given.
 */
export async function registerRosterMember(
  uow: UnitOfWork,
  input: CreateRosterMemberInput,
  employedAt?: Timestamp
): Promise<RosterMember> {
  if (input.id !== undefined) {
    const ref: RosterMemberRef = { type: input.type, id: input.id };
    if (await uow.repos.rosterMembers.get(ref, { includeDeleted: true })) {
      throw new DuplicateEntityError(ref);
    }
  }
  const member = await uow.repos.rosterMembers.create(input);
  uow.pending.push({
    message: 'Roster member registered',
    data: { entity: formatRef(refOf(member)) },
  });

  if (employedAt === undefined) return member;
  return transitionRosterMember(uow, refOf(member), 'employ', employedAt);
}

export async function deleteRosterMember(
  uow: UnitOfWork,
  ref: RosterMemberRef,
  at: Timestamp
): Promise<RosterMember> {
  await uow.repos.rosterMembers.lock(ref);
  await requireRosterMember(uow.repos, ref);

  const deleted = await uow.repos.rosterMembers.softDelete(ref, at);
  if (!deleted) {
    throw new EntityNotFoundError(ref);
  }
  uow.pending.push({ message: 'Roster member deleted', data: { entity: formatRef(ref), at } });
  return deleted;
}

/**
 * Bring back a soft-deleted member and resync its cached status.
 * @throws CannotBeRestoredError when the member is not deleted
 */
export async function restoreRosterMember(
  uow: UnitOfWork,
  ref: RosterMemberRef
): Promise<RosterMember> {
  await uow.repos.rosterMembers.lock(ref);
  const member = await uow.repos.rosterMembers.get(ref, { includeDeleted: true });
  if (!member) {
    throw new EntityNotFoundError(ref);
  }
  if (member.deletedAt === null) {
    throw new CannotBeRestoredError(ref);
  }

  await uow.repos.rosterMembers.restore(ref);
  uow.pending.push({ message: 'Roster member restored', data: { entity: formatRef(ref) } });
  return syncEmploymentStatus(uow.repos, ref, uow.now);
}

/**
 * Re-project and store the cached status, e.g. once future employment has started.
 */
export async function refreshStatus(uow: UnitOfWork, ref: RosterMemberRef): Promise<RosterMember> {
  await uow.repos.rosterMembers.lock(ref);
  await requireRosterMember(uow.repos, ref);
  return syncEmploymentStatus(uow.repos, ref, uow.now);
}
