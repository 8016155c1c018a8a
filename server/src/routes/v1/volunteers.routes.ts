import { Router } from 'express';

import { createVolunteersController } from '../../controllers/volunteers.controller';
import type { AuthMiddleware } from '../../middleware/auth';
import type { VolunteersService } from '../../services/volunteers.service';

export function createVolunteersRouter(volunteers: VolunteersService, { authenticate }: AuthMiddleware) {
  const { createProfileHandler, getProfileHandler, listProfilesHandler, updateProfileHandler } =
    createVolunteersController(volunteers);

  const volunteersRouter = Router();

  volunteersRouter.post('/', authenticate, createProfileHandler);
  volunteersRouter.get('/', listProfilesHandler);
  volunteersRouter.get('/:profileId', getProfileHandler);
  volunteersRouter.patch('/:profileId', authenticate, updateProfileHandler);

  return volunteersRouter;
}
