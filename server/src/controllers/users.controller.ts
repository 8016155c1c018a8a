import type { Request, Response } from 'express';
import { z } from 'zod';

import { PRESENCE_STATUSES, USER_ROLES } from '../domain/types';
import { sendResult } from '../middleware/error';
import type { UsersService } from '../services/users.service';

const createUserSchema = z.object({
  email: z.string().email().optional(),
  fullName: z.string().trim().min(1).max(240),
  role: z.enum(USER_ROLES).default('affected_individual'),
  location: z.string().trim().max(500).default('')
});

// Role is fixed once the record exists; strict() turns an attempt into a 400.
const updateUserSchema = z
  .object({
    fullName: z.string().trim().min(1).max(240).optional(),
    location: z.string().trim().max(500).optional()
  })
  .strict();

const presenceSchema = z.object({
  status: z.enum(PRESENCE_STATUSES)
});

const userIdSchema = z.object({
  userId: z.string().min(1)
});

export function createUsersController(users: UsersService) {
  async function createUserHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const parsed = createUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid user', errors: parsed.error.flatten() });
    }

    const email = parsed.data.email ?? req.user.email;
    if (!email) {
      return res.status(400).json({ message: 'An email address is required' });
    }

    try {
      const result = await users.createUser(req.user.uid, { ...parsed.data, email });
      return sendResult(res, result, 201);
    } catch (error) {
      console.error('[users] create failed', error);
      return res.status(500).json({ message: 'Failed to create user' });
    }
  }

  async function getMeHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    try {
      return sendResult(res, await users.getUser(req.user.uid, req.user.uid));
    } catch (error) {
      console.error('[users] get me failed', error);
      return res.status(500).json({ message: 'Failed to load profile' });
    }
  }

  async function updateMeHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const parsed = updateUserSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid profile update', errors: parsed.error.flatten() });
    }

    try {
      return sendResult(res, await users.updateUser(req.user.uid, req.user.uid, parsed.data));
    } catch (error) {
      console.error('[users] update failed', error);
      return res.status(500).json({ message: 'Failed to update profile' });
    }
  }

  async function presenceHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const parsed = presenceSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid status', errors: parsed.error.flatten() });
    }

    try {
      return sendResult(res, await users.setPresence(req.user.uid, parsed.data.status));
    } catch (error) {
      console.error('[users] presence failed', error);
      return res.status(500).json({ message: 'Failed to update status' });
    }
  }

  async function listRespondersHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    try {
      const result = await users.listResponders(req.user.uid);
      if (!result.ok) return sendResult(res, result);
      return res.json({ items: result.value });
    } catch (error) {
      console.error('[users] list responders failed', error);
      return res.status(500).json({ message: 'Failed to fetch responders' });
    }
  }

  async function getUserHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const params = userIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid user id' });
    }

    try {
      return sendResult(res, await users.getUser(req.user.uid, params.data.userId));
    } catch (error) {
      console.error('[users] get failed', error);
      return res.status(500).json({ message: 'Failed to fetch user' });
    }
  }

  return {
    createUserHandler,
    getMeHandler,
    updateMeHandler,
    presenceHandler,
    listRespondersHandler,
    getUserHandler
  };
}
