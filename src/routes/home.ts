import { Router, Request, Response } from 'express';
import { APP_NAME, RECENT_ANNOUNCEMENTS_LIMIT } from '../types/constants';
import { asyncHandler } from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { RouteContext } from './context';

export const createHomeRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  // Health check endpoint
  router.get('/health', async (req: Request, res: Response) => {
    let database: 'connected' | 'error' = 'connected';
    try {
      await services.store.accounts.countUsers();
    } catch (error) {
      logger.error('Health check could not reach the data store', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      database = 'error';
    }

    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      store: services.store.kind,
      database,
    });
  });

  /**
   * GET /
   * Public landing data: the most recent announcements
   */
  router.get(
    '/',
    auth.optionalAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const announcements = await services.announcements.list(RECENT_ANNOUNCEMENTS_LIMIT);
      res.json({
        app: APP_NAME,
        user: req.identity ?? null,
        announcements,
      });
    })
  );

  return router;
};
