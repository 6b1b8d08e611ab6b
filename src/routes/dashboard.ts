import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { RouteContext } from './context';

export const createDashboardRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  /**
   * GET /dashboard
   * Role-specific summary for the signed-in user
   */
  router.get(
    '/dashboard',
    auth.authenticateToken,
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.dashboard.summarize(requireIdentity(req)));
    })
  );

  return router;
};
