import { Router } from 'express';

import { createRequestsController } from '../../controllers/requests.controller';
import type { AuthMiddleware } from '../../middleware/auth';
import type { RequestsService } from '../../services/requests.service';

export function createRequestsRouter(requests: RequestsService, { authenticate }: AuthMiddleware) {
  const {
    candidatesHandler,
    createRequestHandler,
    getRequestHandler,
    listRequestsHandler,
    summaryHandler,
    transitionRequestHandler
  } = createRequestsController(requests);

  const requestsRouter = Router();

  requestsRouter.get('/', listRequestsHandler);
  requestsRouter.get('/summary', summaryHandler);
  requestsRouter.post('/', authenticate, createRequestHandler);
  requestsRouter.get('/:requestId', getRequestHandler);
  requestsRouter.post('/:requestId/transition', authenticate, transitionRequestHandler);
  requestsRouter.get('/:requestId/candidates', candidatesHandler);

  return requestsRouter;
}
