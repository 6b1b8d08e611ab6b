import { Request, Response } from 'express';
import { Identity, UserRole } from '../types/entities';
import { SESSION_COOKIE_NAME, SESSION_MAX_AGE_MS } from '../types/constants';
import '../types/session';

// User session data interface
export interface UserSessionData {
  userId: string;
  email: string;
  name: string;
  role: UserRole;
  isAuthenticated: boolean;
  loginTime: string;
  lastActivity: string;
}

// Session configuration interface
export interface SessionConfig {
  maxAge: number;
  secure: boolean;
  cookieName: string;
}

export class SessionManagementError extends Error {
  constructor(
    message: string,
    public code?: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'SessionManagementError';
  }
}

const withSessionError = (message: string, code: string) => {
  return (resolve: () => void, reject: (reason: SessionManagementError) => void) =>
    (err: unknown): void => {
      if (err) {
        reject(new SessionManagementError(message, code, 500));
      } else {
        resolve();
      }
    };
};

/**
 * Session Management Service
 * Binds an identity to the express-session and validates it on later requests
 */
export class SessionManagementService {
  private config: SessionConfig;

  constructor(config?: Partial<SessionConfig>) {
    this.config = {
      maxAge: SESSION_MAX_AGE_MS,
      secure: process.env.NODE_ENV === 'production',
      cookieName: SESSION_COOKIE_NAME,
      ...config,
    };
  }

  /**
   * Start a fresh session for an authenticated identity.
   * The session id is regenerated so a pre-login id cannot be reused.
   */
  async createSession(req: Request, identity: Identity): Promise<UserSessionData> {
    await new Promise<void>((resolve, reject) => {
      req.session.regenerate(
        withSessionError('Failed to regenerate session', 'SESSION_REGENERATE_ERROR')(resolve, reject)
      );
    });

    const now = new Date().toISOString();
    const sessionData: UserSessionData = {
      userId: identity.userId,
      email: identity.email,
      name: identity.name,
      role: identity.role,
      isAuthenticated: true,
      loginTime: now,
      lastActivity: now,
    };

    req.session.user = sessionData;
    req.session.cookie.maxAge = this.config.maxAge;
    req.session.cookie.secure = this.config.secure;
    req.session.cookie.httpOnly = true;

    await this.save(req, 'Failed to save session', 'SESSION_SAVE_ERROR');
    return sessionData;
  }

  /**
   * Validate and refresh session
   * @returns Session data if valid, null if missing, unauthenticated or expired
   */
  async validateSession(req: Request): Promise<UserSessionData | null> {
    const sessionData = req.session?.user;
    if (!sessionData || !sessionData.isAuthenticated) {
      return null;
    }

    const now = new Date();
    const sessionAge = now.getTime() - new Date(sessionData.loginTime).getTime();
    if (Number.isNaN(sessionAge) || sessionAge > this.config.maxAge) {
      await this.destroySession(req);
      return null;
    }

    sessionData.lastActivity = now.toISOString();
    req.session.user = sessionData;
    await this.save(req, 'Failed to update session', 'SESSION_UPDATE_ERROR');

    return sessionData;
  }

  async destroySession(req: Request): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      req.session.destroy(
        withSessionError('Failed to destroy session', 'SESSION_DESTROY_ERROR')(resolve, reject)
      );
    });
  }

  clearSessionCookie(res: Response): void {
    res.clearCookie(this.config.cookieName, {
      path: '/',
      httpOnly: true,
      secure: this.config.secure,
      sameSite: 'lax',
    });
  }

  getCurrentUser(req: Request): UserSessionData | null {
    const sessionUser = req.session?.user;
    return sessionUser && sessionUser.isAuthenticated ? sessionUser : null;
  }

  getSessionStats(req: Request): {
    isAuthenticated: boolean;
    sessionAge?: number;
    lastActivity?: string;
  } {
    const user = this.getCurrentUser(req);
    if (!user) {
      return { isAuthenticated: false };
    }

    return {
      isAuthenticated: true,
      sessionAge: Date.now() - new Date(user.loginTime).getTime(),
      lastActivity: user.lastActivity,
    };
  }

  private async save(req: Request, message: string, code: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      req.session.save(withSessionError(message, code)(resolve, reject));
    });
  }
}
