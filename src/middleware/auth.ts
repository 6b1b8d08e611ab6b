import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/authService';
import { Identity } from '../types/entities';
import { logger } from '../utils/logger';
import { AuthenticationError, asyncHandler } from './errorHandler';
import '../types/express';

export interface AuthMiddleware {
  authenticateToken: RequestHandler;
  optionalAuth: RequestHandler;
}

/**
 * Build the session-authentication middleware for an AuthService
 */
export const createAuthMiddleware = (auth: AuthService): AuthMiddleware => {
  /**
   * Require a valid session and attach the identity to the request
   */
  const authenticateToken = asyncHandler(
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        req.identity = await auth.currentIdentity(req);
      } catch (error) {
        if (error instanceof AuthenticationError) {
          logger.warn('Invalid session attempt', {
            path: req.path,
            sessionId: req.sessionID,
            hasSession: !!req.session,
          });
        }
        throw error;
      }
      next();
    }
  );

  /**
   * Attach the identity when a valid session exists, continue anonymously
   * otherwise
   */
  const optionalAuth = asyncHandler(
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        req.identity = await auth.currentIdentity(req);
      } catch (error) {
        if (!(error instanceof AuthenticationError)) {
          throw error;
        }
      }
      next();
    }
  );

  return { authenticateToken, optionalAuth };
};

/**
 * The identity set by authenticateToken; throws when the route was mounted
 * without it
 */
export const requireIdentity = (req: Request): Identity => {
  if (!req.identity) {
    throw new AuthenticationError();
  }
  return req.identity;
};
