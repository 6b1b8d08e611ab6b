import { Router, Request, Response } from 'express';
import { UserRole } from '../types/entities';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { requireRoles } from '../middleware/authorization';
import { asBody, readString } from '../utils/validation';
import { RouteContext } from './context';

const parseLimit = (value: unknown): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const limit = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return limit;
};

export const createAnnouncementRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  /**
   * GET /announcements
   * All announcements, newest first
   */
  router.get(
    '/announcements',
    auth.authenticateToken,
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.announcements.list(parseLimit(req.query.limit)));
    })
  );

  /**
   * POST /announcements
   * Post an announcement (teacher only)
   */
  router.post(
    '/announcements',
    auth.authenticateToken,
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const announcement = await services.announcements.create(requireIdentity(req), {
        title: readString(body, 'title') ?? '',
        body: readString(body, 'body') ?? '',
      });
      res.status(201).json(announcement);
    })
  );

  return router;
};
