import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { createAuthMiddleware, type VerifyIdToken } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/error';
import { createV1Router } from './routes/v1';
import type { PersistenceGateway } from './gateway/types';
import { createRequestsService } from './services/requests.service';
import { createUsersService } from './services/users.service';
import { createVolunteersService } from './services/volunteers.service';
import type { CandidateRanker } from './domain/assignment';

export type AppOptions = {
  gateway: PersistenceGateway;
  verifyIdToken: VerifyIdToken;
  nodeEnv?: 'development' | 'test' | 'production';
  clientUrl?: string;
  /** Mutating requests allowed per client per 15 minutes. */
  rateLimitMax?: number;
  /** Access logs via morgan; on unless set to false. */
  accessLog?: boolean;
  now?: () => number;
  generateId?: () => string;
  ranker?: CandidateRanker;
};

export function createApp(options: AppOptions) {
  const { gateway, now, generateId } = options;
  const nodeEnv = options.nodeEnv ?? 'development';

  const services = {
    users: createUsersService({ gateway, now, generateId }),
    volunteers: createVolunteersService({ gateway, now, generateId }),
    requests: createRequestsService({ gateway, now, generateId, ranker: options.ranker })
  };
  const auth = createAuthMiddleware(options.verifyIdToken);

  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(
    cors({
      origin: options.clientUrl ?? true,
      credentials: true
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  if (options.accessLog !== false) {
    app.use(morgan(nodeEnv === 'production' ? 'combined' : 'dev'));
  }
  app.set('trust proxy', 1);

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    max: options.rateLimitMax ?? 300,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => ['GET', 'HEAD', 'OPTIONS'].includes(req.method)
  });

  app.use(limiter);

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/v1', createV1Router(services, auth));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
