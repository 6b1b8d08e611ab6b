import { Router, Request, Response } from 'express';
import { UserRole } from '../types/entities';
import { asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { requireRoles } from '../middleware/authorization';
import {
  asBody,
  readDate,
  readString,
  requireNumber,
} from '../utils/validation';
import { RouteContext } from './context';

export const createAssignmentRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  router.use(['/assignments', '/submissions'], auth.authenticateToken);

  /**
   * GET /assignments
   * All assignments; ?mine=true narrows a teacher's list to their own
   */
  router.get(
    '/assignments',
    asyncHandler(async (req: Request, res: Response) => {
      const assignments = await services.assignments.list(requireIdentity(req), {
        mine: req.query.mine === 'true',
      });
      res.json(assignments);
    })
  );

  /**
   * POST /assignments
   * Create an assignment (teacher only)
   */
  router.post(
    '/assignments',
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const assignment = await services.assignments.create(requireIdentity(req), {
        title: readString(body, 'title') ?? '',
        description: readString(body, 'description') ?? '',
        due_date: readDate(body, 'due_date'),
      });
      res.status(201).json(assignment);
    })
  );

  /**
   * GET /assignments/:id
   * Assignment with the caller's submission (student) or all submissions
   * (owning teacher)
   */
  router.get(
    '/assignments/:id',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.assignments.get(requireIdentity(req), req.params.id));
    })
  );

  /**
   * GET /assignments/:id/submissions
   * Submissions for one assignment, scoped to the caller
   */
  router.get(
    '/assignments/:id/submissions',
    asyncHandler(async (req: Request, res: Response) => {
      const submissions = await services.assignments.listSubmissions(requireIdentity(req), {
        assignmentId: req.params.id,
      });
      res.json(submissions);
    })
  );

  /**
   * POST /assignments/:id/submissions
   * Submit, or resubmit while ungraded (student only)
   */
  router.post(
    '/assignments/:id/submissions',
    requireRoles([UserRole.STUDENT]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const { submission, created } = await services.assignments.submit(
        requireIdentity(req),
        req.params.id,
        readString(body, 'content') ?? ''
      );
      res.status(created ? 201 : 200).json(submission);
    })
  );

  /**
   * GET /submissions
   * Own submissions (student) or submissions to own assignments (teacher)
   */
  router.get(
    '/submissions',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await services.assignments.listSubmissions(requireIdentity(req)));
    })
  );

  /**
   * POST /submissions/:id/grade
   * Grade a submission (owning teacher only)
   */
  router.post(
    '/submissions/:id/grade',
    requireRoles([UserRole.TEACHER]),
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const submission = await services.assignments.grade(requireIdentity(req), req.params.id, {
        score: requireNumber(body, 'score'),
        feedback: readString(body, 'feedback') ?? null,
      });
      res.json(submission);
    })
  );

  return router;
};
