import { Router, Request, Response } from 'express';
import { parseUserRole } from '../types/enums';
import { LoginResponse, RegisterResponse } from '../types/api';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import { requireIdentity } from '../middleware/auth';
import { asBody, readString, requireString } from '../utils/validation';
import { logger } from '../utils/logger';
import { RouteContext } from './context';

export const createAuthRouter = ({ services, auth }: RouteContext): Router => {
  const router = Router();

  /**
   * POST /register
   * Create an account; the client should continue to the login page
   */
  router.post(
    '/register',
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const role = parseUserRole(body.role);
      if (!role) {
        throw new ValidationError('role must be "teacher" or "student"');
      }

      const user = await services.accounts.register({
        name: readString(body, 'name'),
        email: requireString(body, 'email'),
        password: typeof body.password === 'string' ? body.password : '',
        role,
      });

      const response: RegisterResponse = {
        success: true,
        message: 'Registration successful. Please login.',
        user,
        redirectTo: '/login',
      };
      res.status(201).json(response);
    })
  );

  /**
   * POST /login
   * Authenticate with email and password and start a session
   */
  router.post(
    '/login',
    asyncHandler(async (req: Request, res: Response) => {
      const body = asBody(req.body);
      const email = readString(body, 'email');
      const password = typeof body.password === 'string' ? body.password : '';

      if (!email || !password) {
        logger.warn('Login missing credentials', {
          requestId: req.headers['x-request-id'],
          email: email ? '[PROVIDED]' : '[MISSING]',
          password: password ? '[PROVIDED]' : '[MISSING]',
        });
        throw new ValidationError('Email and password are required');
      }

      const identity = await services.auth.login(req, email, password);

      const response: LoginResponse = {
        success: true,
        message: 'Welcome back!',
        user: identity,
        redirectTo: '/dashboard',
      };
      res.json(response);
    })
  );

  /**
   * POST /logout
   * Destroy the session and clear its cookie
   */
  router.post(
    '/logout',
    asyncHandler(async (req: Request, res: Response) => {
      await services.auth.logout(req, res);
      res.json({ success: true, message: 'Logged out.', redirectTo: '/' });
    })
  );

  /**
   * GET /me
   * Identity bound to the current session
   */
  router.get(
    '/me',
    auth.authenticateToken,
    asyncHandler(async (req: Request, res: Response) => {
      const identity = requireIdentity(req);
      res.json({
        success: true,
        user: identity,
        session: services.auth.getSessionStats(req),
      });
    })
  );

  return router;
};
