import { Router, Request, Response } from 'express';
import { UserRole } from '../types/entities';
import { asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { requireRoles } from '../middleware/authorization';
import { asBody, readString } from '../utils/validation';
import { RouteContext } from './context';

export const createDiscussionRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  router.use('/discussions', auth.authenticateToken);

  router.get(
    '/discussions',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.discussions.list());
    })
  );

  /**
   * POST /discussions
   * Open a thread (teacher only)
   */
  router.post(
    '/discussions',
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const discussion = await services.discussions.create(requireIdentity(req), {
        title: readString(body, 'title') ?? '',
      });
      res.status(201).json(discussion);
    })
  );

  router.get(
    '/discussions/:id',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.discussions.get(req.params.id));
    })
  );

  /**
   * POST /discussions/:id/posts
   * Reply to a thread (any role)
   */
  router.post(
    '/discussions/:id/posts',
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const post = await services.discussions.post(
        requireIdentity(req),
        req.params.id,
        readString(body, 'body') ?? ''
      );
      res.status(201).json(post);
    })
  );

  return router;
};
