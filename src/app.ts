import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import type { Logger } from 'pino';

import { errorHandler } from './middleware/error';
import { notFound } from './middleware/notFound';
import { requestLogger } from './middleware/requestLogger';
import { RateCounter } from './middleware/rateLimit';
import healthRoutes from './routes/health';
import { authRoutes, CookieSettings } from './routes/auth';
import { CredentialService } from './auth/credentialService';

export type AppDeps = {
  credentials: CredentialService;
  cookies: CookieSettings;
  rateCounter: RateCounter;
  rateLimit: { windowSec: number; max: number };
  logger?: Logger;
  /** forwarded to express "trust proxy" so req.ip is the client behind a load balancer */
  trustProxy?: boolean | number;
};

/** Build the plain Express application (no http.Server). */
export function buildExpressApp(deps: AppDeps) {
  const app = express();

  if (deps.trustProxy !== undefined) app.set('trust proxy', deps.trustProxy);

  app.use(helmet());
  app.use(requestLogger(deps.logger));
  app.use(cookieParser());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '16kb' }));

  app.use('/api', healthRoutes);
  app.use(
    '/api/auth',
    authRoutes({
      credentials: deps.credentials,
      cookies: deps.cookies,
      rateCounter: deps.rateCounter,
      rateLimit: deps.rateLimit,
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
