import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UserRole } from '../types/entities';
import { AuthorizationError, asyncHandler } from './errorHandler';
import { requireIdentity } from './auth';

/**
 * Check if a role is one of the allowed roles
 */
export const hasAnyRole = (role: UserRole, allowedRoles: UserRole[]): boolean => {
  return allowedRoles.includes(role);
};

/**
 * Middleware to require one of the given roles.
 * Must run after authenticateToken.
 */
export const requireRoles = (allowedRoles: UserRole[]): RequestHandler => {
  return asyncHandler(
    (req: Request, res: Response, next: NextFunction): void => {
      const identity = requireIdentity(req);

      if (!hasAnyRole(identity.role, allowedRoles)) {
        throw new AuthorizationError(`Required roles: ${allowedRoles.join(", ")}`);
      }

      next();
    }
  );
};
