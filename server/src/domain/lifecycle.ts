import { fail, ok, type Result } from './errors';
import { evaluate } from './permissions';
import type {
  Actor,
  EmergencyRequest,
  Millis,
  RequestCategory,
  RequestStatus,
  Urgency
} from './types';

export type NewRequestInput = {
  text: string;
  location: string;
  urgency?: Urgency | null;
  category?: RequestCategory | null;
};

export type StatusPatch = Pick<EmergencyRequest, 'status' | 'lastUpdated' | 'assignedResponderId'>;

const TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  pending: ['processing'],
  processing: ['resolved', 'pending'],
  resolved: []
};

export function allowedTransitions(from: RequestStatus): readonly RequestStatus[] {
  return TRANSITIONS[from];
}

export function isTerminal(status: RequestStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function initialRequest(
  id: string,
  submitterId: string,
  input: NewRequestInput,
  now: Millis
): EmergencyRequest {
  return {
    id,
    submitterId,
    text: input.text,
    urgency: input.urgency ?? 'Unknown',
    category: input.category ?? 'Other',
    location: input.location,
    status: 'pending',
    createdAt: now,
    lastUpdated: null,
    assignedResponderId: null,
    version: 0
  };
}

/**
 * Decides whether `actor` may move `request` to `target` and returns the
 * fields to write. Role is checked before the state machine so that
 * submitters are refused regardless of the request's state. Accepting a
 * request that is already processing is a Conflict, not a bad transition.
 */
export function planTransition(
  request: EmergencyRequest,
  actor: Actor | null,
  target: RequestStatus,
  now: Millis
): Result<StatusPatch> {
  if (!actor || evaluate(actor, 'update', { kind: 'request', submitterId: request.submitterId }) === 'deny') {
    return fail('Denied', 'Only volunteers and first responders can update request status');
  }

  // A second accept lost the race to whoever holds the request now.
  if (request.status === 'processing' && target === 'processing') {
    return fail('Conflict', `Request ${request.id} was already accepted by another responder`, {
      assignedResponderId: request.assignedResponderId
    });
  }

  if (!TRANSITIONS[request.status].includes(target)) {
    return fail(
      'InvalidTransition',
      isTerminal(request.status)
        ? `Request ${request.id} is already resolved`
        : `Cannot move request from ${request.status} to ${target}`,
      { from: request.status, to: target }
    );
  }

  if (request.status === 'pending') {
    return ok({ status: target, lastUpdated: now, assignedResponderId: actor.id });
  }

  // Leaving processing: only the assignee, or a first responder overriding.
  const isAssignee = request.assignedResponderId === actor.id;
  if (!isAssignee && actor.role !== 'first_responder') {
    return fail('Denied', 'Only the assigned responder or a first responder can do this');
  }

  return ok({
    status: target,
    lastUpdated: now,
    assignedResponderId: target === 'pending' ? null : request.assignedResponderId
  });
}
