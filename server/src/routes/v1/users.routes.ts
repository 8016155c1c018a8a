import { Router } from 'express';

import { createUsersController } from '../../controllers/users.controller';
import type { AuthMiddleware } from '../../middleware/auth';
import type { UsersService } from '../../services/users.service';

export function createUsersRouter(users: UsersService, { authenticate }: AuthMiddleware) {
  const {
    createUserHandler,
    getMeHandler,
    getUserHandler,
    listRespondersHandler,
    presenceHandler,
    updateMeHandler
  } = createUsersController(users);

  const usersRouter = Router();

  usersRouter.post('/', authenticate, createUserHandler);
  usersRouter.get('/me', authenticate, getMeHandler);
  usersRouter.patch('/me', authenticate, updateMeHandler);
  usersRouter.post('/me/presence', authenticate, presenceHandler);
  usersRouter.get('/responders', authenticate, listRespondersHandler);
  usersRouter.get('/:userId', authenticate, getUserHandler);

  return usersRouter;
}
