import { Router } from 'express';

import type { AuthMiddleware } from '../../middleware/auth';
import type { RequestsService } from '../../services/requests.service';
import type { UsersService } from '../../services/users.service';
import type { VolunteersService } from '../../services/volunteers.service';
import { healthRouter } from './health.routes';
import { createRequestsRouter } from './requests.routes';
import { createUsersRouter } from './users.routes';
import { createVolunteersRouter } from './volunteers.routes';

export type V1Services = {
  users: UsersService;
  volunteers: VolunteersService;
  requests: RequestsService;
};

export function createV1Router(services: V1Services, auth: AuthMiddleware) {
  const router = Router();

  router.use('/health', healthRouter);
  router.use('/users', createUsersRouter(services.users, auth));
  router.use('/volunteers', createVolunteersRouter(services.volunteers, auth));
  router.use('/requests', createRequestsRouter(services.requests, auth));

  return router;
}
