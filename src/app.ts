import express, { Express, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppServices } from './services';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { logger } from './utils/logger';
import { RouteContext } from './routes/context';
import { createAuthRouter } from './routes/auth';
import { createHomeRouter } from './routes/home';
import { createDashboardRouter } from './routes/dashboard';
import { createAnnouncementRouter } from './routes/announcements';
import { createAssignmentRouter } from './routes/assignments';
import { createDiscussionRouter } from './routes/discussions';
import { createQuizRouter } from './routes/quizzes';

export interface AppOptions {
  sessionMiddleware: RequestHandler;
  isProduction: boolean;
  frontendUrl?: string | null;
}

const createCorsMiddleware = (options: AppOptions): RequestHandler =>
  cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or server-to-server calls)
      if (!origin) return callback(null, true);

      if (!options.isProduction) {
        return callback(null, true);
      }

      if (!options.frontendUrl) {
        logger.error('FRONTEND_URL environment variable is not set');
        return callback(new Error('CORS configuration error: FRONTEND_URL not set'));
      }

      let frontendOrigin: string;
      try {
        frontendOrigin = new URL(options.frontendUrl).origin;
      } catch (error) {
        logger.error(`Invalid FRONTEND_URL format: ${options.frontendUrl}`);
        return callback(new Error('CORS configuration error: Invalid FRONTEND_URL format'));
      }

      if (origin === frontendOrigin) {
        callback(null, true);
      } else {
        logger.warn(`CORS blocked origin: ${origin}. Allowed origin: ${frontendOrigin}`);
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
  });

/**
 * Assemble the HTTP application around a set of services
 */
export const createApp = (services: AppServices, options: AppOptions): Express => {
  const app = express();

  // Secure cookies behind a load balancer need the forwarded protocol
  app.set('trust proxy', 1);

  app.use(helmet());
  app.use(createCorsMiddleware(options));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  app.use(options.sessionMiddleware);

  app.use((req, res, next) => {
    const requestId = Math.random().toString(36).substring(2, 15);
    req.headers['x-request-id'] = requestId;

    if (req.method !== 'GET') {
      logger.debug(`${req.method} ${req.originalUrl}`, { requestId });
    }

    next();
  });

  const ctx: RouteContext = {
    services,
    auth: createAuthMiddleware(services.auth),
  };

  app.use('/', createHomeRouter(ctx));

  // Auth routes answer both at the root and under /api
  const authRouter = createAuthRouter(ctx);
  app.use('/', authRouter);
  app.use('/api', authRouter);

  app.use('/api', createDashboardRouter(ctx));
  app.use('/api', createAnnouncementRouter(ctx));
  app.use('/api', createAssignmentRouter(ctx));
  app.use('/api', createDiscussionRouter(ctx));
  app.use('/api', createQuizRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
