import type { Request, Response } from 'express';
import { z } from 'zod';

import { REQUEST_CATEGORIES, REQUEST_STATUSES, URGENCY_LEVELS } from '../domain/types';
import { sendResult } from '../middleware/error';
import type { RequestsService } from '../services/requests.service';

const createRequestSchema = z.object({
  text: z.string().trim().min(1).max(5000),
  location: z.string().trim().min(1).max(500),
  urgency: z.enum(URGENCY_LEVELS).nullish(),
  category: z.enum(REQUEST_CATEGORIES).nullish()
});

const listQuerySchema = z.object({
  status: z.enum(REQUEST_STATUSES).optional(),
  urgency: z.enum(URGENCY_LEVELS).optional(),
  category: z.enum(REQUEST_CATEGORIES).optional(),
  submitterId: z.string().min(1).optional(),
  assignedResponderId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

const transitionSchema = z.object({
  status: z.enum(REQUEST_STATUSES)
});

const requestIdSchema = z.object({
  requestId: z.string().min(1)
});

export function createRequestsController(requests: RequestsService) {
  async function createRequestHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const parsed = createRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid request body', errors: parsed.error.flatten() });
    }

    try {
      const result = await requests.createRequest(req.user.uid, parsed.data);
      return sendResult(res, result, 201);
    } catch (error) {
      console.error('[requests] create failed', error);
      return res.status(500).json({ message: 'Failed to create request' });
    }
  }

  async function listRequestsHandler(req: Request, res: Response) {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid filter', errors: parsed.error.flatten() });
    }

    try {
      const result = await requests.listRequests(parsed.data);
      if (!result.ok) return sendResult(res, result);
      return res.json({ items: result.value });
    } catch (error) {
      console.error('[requests] list failed', error);
      return res.status(500).json({ message: 'Failed to fetch requests' });
    }
  }

  async function summaryHandler(_req: Request, res: Response) {
    try {
      return sendResult(res, await requests.summarizeRequests());
    } catch (error) {
      console.error('[requests] summary failed', error);
      return res.status(500).json({ message: 'Failed to summarize requests' });
    }
  }

  async function getRequestHandler(req: Request, res: Response) {
    const params = requestIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid request id' });
    }

    try {
      return sendResult(res, await requests.getRequest(params.data.requestId));
    } catch (error) {
      console.error('[requests] get failed', error);
      return res.status(500).json({ message: 'Failed to fetch request' });
    }
  }

  async function transitionRequestHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const params = requestIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid request id' });
    }

    const body = transitionSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({ message: 'Invalid body', errors: body.error.flatten() });
    }

    try {
      const result = await requests.transitionRequest(params.data.requestId, req.user.uid, body.data.status);
      return sendResult(res, result);
    } catch (error) {
      console.error('[requests] transition failed', error);
      return res.status(500).json({ message: 'Failed to update request' });
    }
  }

  async function candidatesHandler(req: Request, res: Response) {
    const params = requestIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid request id' });
    }

    try {
      const result = await requests.rankCandidates(params.data.requestId);
      if (!result.ok) return sendResult(res, result);
      return res.json({ requestId: params.data.requestId, candidates: result.value });
    } catch (error) {
      console.error('[requests] rank failed', error);
      return res.status(500).json({ message: 'Failed to rank candidates' });
    }
  }

  return {
    createRequestHandler,
    listRequestsHandler,
    summaryHandler,
    getRequestHandler,
    transitionRequestHandler,
    candidatesHandler
  };
}
