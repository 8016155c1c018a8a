import type { Actor } from './types';

export type Action = 'create' | 'read' | 'update';

export type Resource =
  | { kind: 'user'; ownerId: string }
  | { kind: 'request'; submitterId: string }
  | { kind: 'volunteerProfile'; ownerId: string };

export type Decision = 'allow' | 'deny';

const allowIf = (condition: boolean): Decision => (condition ? 'allow' : 'deny');

/**
 * Central access rules for every collection. Pure: the same inputs always
 * produce the same decision, and a refusal is a `deny`, never an exception.
 * `actor` is null for unauthenticated callers.
 */
export function evaluate(actor: Actor | null, action: Action, resource: Resource): Decision {
  switch (resource.kind) {
    case 'user': {
      if (!actor) return 'deny';
      const isOwner = actor.id === resource.ownerId;
      switch (action) {
        case 'create':
          return allowIf(isOwner);
        case 'read':
          return allowIf(isOwner || actor.role === 'first_responder');
        case 'update':
          return allowIf(isOwner);
      }
      break;
    }
    case 'request': {
      switch (action) {
        case 'create':
          return allowIf(actor !== null);
        case 'read':
          return 'allow';
        case 'update':
          return allowIf(actor?.role === 'volunteer' || actor?.role === 'first_responder');
      }
      break;
    }
    case 'volunteerProfile': {
      switch (action) {
        case 'create':
          return allowIf(actor !== null);
        case 'read':
          return 'allow';
        case 'update':
          return allowIf(
            actor !== null && (actor.id === resource.ownerId || actor.role === 'first_responder')
          );
      }
      break;
    }
  }
  return 'deny';
}
