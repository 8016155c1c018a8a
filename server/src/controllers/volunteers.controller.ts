import type { Request, Response } from 'express';
import { z } from 'zod';

import { PRESENCE_STATUSES, RESPONDER_ROLES } from '../domain/types';
import { sendResult } from '../middleware/error';
import type { VolunteersService } from '../services/volunteers.service';

const profileFields = {
  specialties: z.array(z.string().max(120)).max(50),
  availability: z.string().max(240),
  experience: z.string().max(2000),
  name: z.string().trim().min(1).max(240).optional(),
  location: z.string().trim().max(500).optional()
};

const createProfileSchema = z.object({
  ...profileFields,
  specialties: profileFields.specialties.min(1)
});

const updateProfileSchema = z.object(profileFields).partial().strict();

const listQuerySchema = z.object({
  role: z.enum(RESPONDER_ROLES).optional(),
  userStatus: z.enum(PRESENCE_STATUSES).optional()
});

const profileIdSchema = z.object({
  profileId: z.string().min(1)
});

export function createVolunteersController(volunteers: VolunteersService) {
  async function createProfileHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const parsed = createProfileSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid volunteer profile', errors: parsed.error.flatten() });
    }

    try {
      return sendResult(res, await volunteers.createVolunteerProfile(req.user.uid, parsed.data), 201);
    } catch (error) {
      console.error('[volunteers] create failed', error);
      return res.status(500).json({ message: 'Failed to create volunteer profile' });
    }
  }

  async function listProfilesHandler(req: Request, res: Response) {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid filter', errors: parsed.error.flatten() });
    }

    try {
      const result = await volunteers.listVolunteerProfiles(parsed.data);
      if (!result.ok) return sendResult(res, result);
      return res.json({ items: result.value });
    } catch (error) {
      console.error('[volunteers] list failed', error);
      return res.status(500).json({ message: 'Failed to fetch volunteer profiles' });
    }
  }

  async function getProfileHandler(req: Request, res: Response) {
    const params = profileIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid profile id' });
    }

    try {
      return sendResult(res, await volunteers.getVolunteerProfile(params.data.profileId));
    } catch (error) {
      console.error('[volunteers] get failed', error);
      return res.status(500).json({ message: 'Failed to fetch volunteer profile' });
    }
  }

  async function updateProfileHandler(req: Request, res: Response) {
    if (!req.user?.uid) {
      return res.status(401).json({ message: 'Unauthorized' });
    }

    const params = profileIdSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).json({ message: 'Invalid profile id' });
    }

    const parsed = updateProfileSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: 'Invalid profile update', errors: parsed.error.flatten() });
    }

    try {
      const result = await volunteers.updateVolunteerProfile(req.user.uid, params.data.profileId, parsed.data);
      return sendResult(res, result);
    } catch (error) {
      console.error('[volunteers] update failed', error);
      return res.status(500).json({ message: 'Failed to update volunteer profile' });
    }
  }

  return { createProfileHandler, listProfilesHandler, getProfileHandler, updateProfileHandler };
}
