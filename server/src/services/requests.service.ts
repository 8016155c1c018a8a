import { rankCandidates as defaultRanker, type CandidateRanker } from '../domain/assignment';
import { fail, ok, type Result } from '../domain/errors';
import { initialRequest, planTransition, type NewRequestInput } from '../domain/lifecycle';
import { evaluate } from '../domain/permissions';
import type { EmergencyRequest, RequestCategory, RequestStatus, Urgency } from '../domain/types';
import { DEFAULT_QUERY_LIMIT } from '../gateway/types';
import { resolveActor, resolveDeps, type ServiceDeps } from './context';

export type RequestFilter = {
  status?: RequestStatus;
  urgency?: Urgency;
  category?: RequestCategory;
  submitterId?: string;
  assignedResponderId?: string;
  limit?: number;
};

export type RequestSummary = {
  total: number;
  byStatus: Record<RequestStatus, number>;
  /** Requests that are not resolved yet. */
  openByUrgency: Record<Urgency, number>;
};

export type RequestsServiceDeps = ServiceDeps & {
  ranker?: CandidateRanker;
};

const URGENCY_ORDER: Record<Urgency, number> = { High: 0, Medium: 1, Low: 2, Unknown: 3 };

/** Most urgent first, newest first within the same urgency. */
export function compareByUrgency(a: EmergencyRequest, b: EmergencyRequest): number {
  return URGENCY_ORDER[a.urgency] - URGENCY_ORDER[b.urgency] || b.createdAt - a.createdAt;
}

function matchesFilter(request: EmergencyRequest, filter: RequestFilter): boolean {
  return (
    (filter.status === undefined || request.status === filter.status) &&
    (filter.urgency === undefined || request.urgency === filter.urgency) &&
    (filter.category === undefined || request.category === filter.category) &&
    (filter.submitterId === undefined || request.submitterId === filter.submitterId) &&
    (filter.assignedResponderId === undefined || request.assignedResponderId === filter.assignedResponderId)
  );
}

export function createRequestsService(deps: RequestsServiceDeps) {
  const { gateway, now, generateId } = resolveDeps(deps);
  const ranker = deps.ranker ?? defaultRanker;

  async function createRequest(submitterId: string, input: NewRequestInput): Promise<Result<EmergencyRequest>> {
    const actor = await resolveActor(gateway, submitterId);
    if (!actor.ok) return actor;
    if (evaluate(actor.value, 'create', { kind: 'request', submitterId }) === 'deny') {
      return fail('Denied', 'Sign in to submit a request');
    }
    if (!actor.value?.role) {
      return fail('NotFound', `User ${submitterId} is not registered`);
    }

    const request = initialRequest(
      generateId(),
      submitterId,
      { ...input, text: input.text.trim(), location: input.location.trim() },
      now()
    );
    const created = await gateway.create('requests', request);
    if (!created.ok) return created;
    console.info('[requests] created', { id: request.id, urgency: request.urgency, category: request.category });
    return ok(request);
  }

  async function getRequest(requestId: string): Promise<Result<EmergencyRequest>> {
    return gateway.get('requests', requestId);
  }

  async function listRequests(filter: RequestFilter = {}): Promise<Result<EmergencyRequest[]>> {
    // Narrow on the most selective field the store can index, then filter the rest here.
    const found = filter.submitterId
      ? await gateway.queryByField('requests', 'submitterId', filter.submitterId)
      : filter.assignedResponderId
        ? await gateway.queryByField('requests', 'assignedResponderId', filter.assignedResponderId)
        : filter.status
          ? await gateway.queryByField('requests', 'status', filter.status)
          : await gateway.list('requests');
    if (!found.ok) return found;

    const items = found.value
      .filter((request) => matchesFilter(request, filter))
      .sort(compareByUrgency)
      .slice(0, filter.limit ?? DEFAULT_QUERY_LIMIT);
    return ok(items);
  }

  /**
   * Moves a request along its lifecycle. The write is a compare-and-update on
   * the version that was read, so of two racing callers only one wins and the
   * other gets Conflict.
   */
  async function transitionRequest(
    requestId: string,
    actorId: string,
    target: RequestStatus
  ): Promise<Result<EmergencyRequest>> {
    const actor = await resolveActor(gateway, actorId);
    if (!actor.ok) return actor;

    const current = await gateway.get('requests', requestId);
    if (!current.ok) return current;

    const plan = planTransition(current.value, actor.value, target, now());
    if (!plan.ok) {
      console.warn('[requests] transition refused', {
        requestId,
        actorId,
        from: current.value.status,
        to: target,
        reason: plan.error.kind
      });
      return plan;
    }

    const updated = await gateway.updateIfMatch('requests', requestId, current.value.version, plan.value);
    if (updated.ok) {
      console.info('[requests] transitioned', {
        requestId,
        actorId,
        from: current.value.status,
        to: updated.value.status
      });
    }
    return updated;
  }

  async function rankCandidates(requestId: string): Promise<Result<string[]>> {
    const request = await gateway.get('requests', requestId);
    if (!request.ok) return request;

    const pool = await gateway.queryByField('volunteers', 'userStatus', 'active');
    if (!pool.ok) return pool;

    return ok(ranker(request.value, pool.value));
  }

  async function summarizeRequests(): Promise<Result<RequestSummary>> {
    const all = await gateway.list('requests');
    if (!all.ok) return all;

    const byStatus: Record<RequestStatus, number> = { pending: 0, processing: 0, resolved: 0 };
    const openByUrgency: Record<Urgency, number> = { High: 0, Medium: 0, Low: 0, Unknown: 0 };
    for (const request of all.value) {
      byStatus[request.status] += 1;
      if (request.status !== 'resolved') {
        openByUrgency[request.urgency] += 1;
      }
    }
    return ok({ total: all.value.length, byStatus, openByUrgency });
  }

  return { createRequest, getRequest, listRequests, transitionRequest, rankCandidates, summarizeRequests };
}

export type RequestsService = ReturnType<typeof createRequestsService>;
