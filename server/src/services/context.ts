import { randomUUID } from 'node:crypto';

import { ok, type Result } from '../domain/errors';
import type { Actor } from '../domain/types';
import type { PersistenceGateway } from '../gateway/types';

export type ServiceDeps = {
  gateway: PersistenceGateway;
  /** Epoch millis; injectable for tests. */
  now?: () => number;
  generateId?: () => string;
};

export type ResolvedDeps = Required<ServiceDeps>;

export function resolveDeps(deps: ServiceDeps): ResolvedDeps {
  return {
    gateway: deps.gateway,
    now: deps.now ?? Date.now,
    generateId: deps.generateId ?? randomUUID
  };
}

/**
 * Looks up the role of an authenticated identity. An identity without a
 * user record is still an actor, just one without a role.
 */
export async function resolveActor(gateway: PersistenceGateway, actorId: string | null): Promise<Result<Actor | null>> {
  if (!actorId) return ok(null);
  const user = await gateway.get('users', actorId);
  if (user.ok) {
    return ok({ id: actorId, role: user.value.role });
  }
  if (user.error.kind === 'NotFound') {
    return ok({ id: actorId, role: null });
  }
  return user;
}
