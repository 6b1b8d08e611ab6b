import { Request, Response } from 'express';
import { Identity, UserRole } from '../types/entities';
import { assertNever } from '../types/enums';
import {
  AuthenticationError,
  AuthorizationError,
} from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { AccountService, toIdentity } from './accountService';
import { SessionManagementService } from './session';

const roleLabel = (role: UserRole): string => {
  switch (role) {
    case UserRole.TEACHER:
      return 'Teacher';
    case UserRole.STUDENT:
      return 'Student';
    default:
      return assertNever(role);
  }
};

/**
 * Throw AuthorizationError unless the identity has the given role
 */
export const requireRole = (identity: Identity, role: UserRole): void => {
  if (identity.role !== role) {
    throw new AuthorizationError(`${roleLabel(role)} role required`);
  }
};

/**
 * Auth Service
 * Ties account credentials to the HTTP session
 */
export class AuthService {
  constructor(
    private readonly accounts: AccountService,
    private readonly sessions: SessionManagementService
  ) {}

  /**
   * Verify credentials and bind the resulting identity to a new session.
   * Throws InvalidCredentialsError on a bad email or password.
   */
  async login(req: Request, email: string, password: string): Promise<Identity> {
    const identity = await this.accounts.authenticate(email, password);
    await this.sessions.createSession(req, identity);

    logger.info('User session created', {
      requestId: req.headers['x-request-id'],
      userId: identity.userId,
      role: identity.role,
    });
    return identity;
  }

  /**
   * Resolve the identity bound to the request's session.
   * The user is reloaded so a deleted account or changed role takes effect.
   */
  async currentIdentity(req: Request): Promise<Identity> {
    const sessionData = await this.sessions.validateSession(req);
    if (!sessionData) {
      throw new AuthenticationError('Valid session is required');
    }

    const user = await this.accounts.findById(sessionData.userId);
    if (!user) {
      logger.warn('Session refers to a missing user', { userId: sessionData.userId });
      await this.sessions.destroySession(req);
      throw new AuthenticationError('User not found');
    }

    return toIdentity(user);
  }

  async logout(req: Request, res: Response): Promise<void> {
    const currentUser = this.sessions.getCurrentUser(req);
    await this.sessions.destroySession(req);
    this.sessions.clearSessionCookie(res);

    logger.info('User logout completed', {
      requestId: req.headers['x-request-id'],
      userId: currentUser?.userId,
    });
  }

  getSessionStats(req: Request) {
    return this.sessions.getSessionStats(req);
  }
}
