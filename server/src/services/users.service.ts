import { fail, ok, type Result } from '../domain/errors';
import { evaluate } from '../domain/permissions';
import type { PresenceStatus, User, UserRole } from '../domain/types';
import { resolveActor, resolveDeps, type ServiceDeps } from './context';

export type CreateUserInput = {
  /** Defaults to the caller's own id. */
  id?: string;
  email: string;
  fullName: string;
  role: UserRole;
  location: string;
};

export type UpdateUserInput = {
  fullName?: string;
  location?: string;
};

const MIRROR_ATTEMPTS = 3;

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

export function createUsersService(deps: ServiceDeps) {
  const { gateway, now } = resolveDeps(deps);

  async function createUser(actorId: string, input: CreateUserInput): Promise<Result<User>> {
    const userId = input.id ?? actorId;
    if (evaluate({ id: actorId, role: null }, 'create', { kind: 'user', ownerId: userId }) === 'deny') {
      return fail('Denied', 'Users can only register themselves');
    }

    const existing = await gateway.get('users', userId);
    if (existing.ok) {
      return fail('AlreadyExists', 'User already exists');
    }
    if (existing.error.kind !== 'NotFound') {
      return existing;
    }

    const email = normalizeEmail(input.email);
    const sameEmail = await gateway.queryByField('users', 'email', email, { limit: 1 });
    if (!sameEmail.ok) return sameEmail;
    if (sameEmail.value.length > 0) {
      return fail('AlreadyExists', 'A user with this email already exists');
    }

    const user: User = {
      id: userId,
      email,
      fullName: input.fullName.trim(),
      role: input.role,
      location: input.location.trim(),
      createdAt: now(),
      userStatus: 'active',
      version: 0
    };
    // The claim document keyed by the email makes a concurrent duplicate fail here.
    const created = await gateway.createAll([
      { collection: 'users', entity: user },
      { collection: 'emails', entity: { id: email, userId, createdAt: user.createdAt, version: 0 } }
    ]);
    if (created.ok) return ok(user);
    if (created.error.kind !== 'AlreadyExists') return created;

    const winner = await gateway.get('users', userId);
    return winner.ok
      ? fail('AlreadyExists', 'User already exists')
      : fail('AlreadyExists', 'A user with this email already exists');
  }

  async function getUser(actorId: string, userId: string): Promise<Result<User>> {
    const actor = await resolveActor(gateway, actorId);
    if (!actor.ok) return actor;
    if (evaluate(actor.value, 'read', { kind: 'user', ownerId: userId }) === 'deny') {
      return fail('Denied', 'Not allowed to view this user');
    }
    return gateway.get('users', userId);
  }

  async function updateUser(actorId: string, userId: string, input: UpdateUserInput): Promise<Result<User>> {
    if (evaluate({ id: actorId, role: null }, 'update', { kind: 'user', ownerId: userId }) === 'deny') {
      return fail('Denied', 'Users can only update their own record');
    }
    const current = await gateway.get('users', userId);
    if (!current.ok) return current;

    const patch: UpdateUserInput = {};
    if (input.fullName !== undefined) patch.fullName = input.fullName.trim();
    if (input.location !== undefined) patch.location = input.location.trim();
    return gateway.updateIfMatch('users', userId, current.value.version, patch);
  }

  /**
   * Marks the caller active or offline. The volunteer profile, when there is
   * one, carries the same flag because candidate ranking reads it there.
   */
  async function setPresence(actorId: string, status: PresenceStatus): Promise<Result<User>> {
    const current = await gateway.get('users', actorId);
    if (!current.ok) return current;

    const updated = await gateway.updateIfMatch('users', actorId, current.value.version, { userStatus: status });
    if (!updated.ok) return updated;

    // The user write has landed; a profile edited meanwhile is re-read and patched again.
    for (let attempt = 0; attempt < MIRROR_ATTEMPTS; attempt += 1) {
      const profile = await gateway.get('volunteers', actorId);
      if (!profile.ok) {
        return profile.error.kind === 'NotFound' ? updated : profile;
      }
      if (profile.value.userStatus === status) return updated;

      const mirrored = await gateway.updateIfMatch('volunteers', actorId, profile.value.version, {
        userStatus: status
      });
      if (mirrored.ok) return updated;
      if (mirrored.error.kind !== 'Conflict') return mirrored;
      console.warn('[users] presence mirror lost a race, retrying', { userId: actorId, attempt });
    }
    return fail('Conflict', `Volunteer profile ${actorId} kept changing; presence was not mirrored`);
  }

  /** Volunteers and first responders, limited to the records the caller may read. */
  async function listResponders(actorId: string): Promise<Result<User[]>> {
    const actor = await resolveActor(gateway, actorId);
    if (!actor.ok) return actor;

    const [volunteers, firstResponders] = await Promise.all([
      gateway.queryByField('users', 'role', 'volunteer'),
      gateway.queryByField('users', 'role', 'first_responder')
    ]);
    if (!volunteers.ok) return volunteers;
    if (!firstResponders.ok) return firstResponders;

    const readable = [...volunteers.value, ...firstResponders.value].filter(
      (user) => evaluate(actor.value, 'read', { kind: 'user', ownerId: user.id }) === 'allow'
    );
    return ok(readable);
  }

  return { createUser, getUser, updateUser, setPresence, listResponders };
}

export type UsersService = ReturnType<typeof createUsersService>;
