import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { ErrorResponse } from '../types/api';
import '../types/express';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class CustomError extends Error implements AppError {
  statusCode: number;
  code: string;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code || 'INTERNAL_SERVER_ERROR';
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

// 400: malformed or missing input
export class ValidationError extends CustomError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

// 401: no valid session, or a failed login
export class AuthenticationError extends CustomError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'AUTHENTICATION_ERROR');
  }
}

export class InvalidCredentialsError extends CustomError {
  constructor() {
    super('Invalid credentials', 401, 'INVALID_CREDENTIALS');
  }
}

// 403: wrong role, or not the owner of the assignment or quiz
export class AuthorizationError extends CustomError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 403, 'AUTHORIZATION_ERROR');
  }
}

export class NotFoundError extends CustomError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

// 409: one-per-student rules, grade-once, duplicate registration
export class ConflictError extends CustomError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT_ERROR');
  }
}

export class DuplicateEmailError extends CustomError {
  constructor() {
    super('Email already registered', 409, 'DUPLICATE_EMAIL');
  }
}

export class DatabaseError extends CustomError {
  constructor(message: string = 'Database operation failed') {
    super(message, 500, 'DATABASE_ERROR');
  }
}

interface ResolvedError {
  statusCode: number;
  code: string;
  message: string;
}

// body-parser marks malformed JSON with type 'entity.parse.failed'
const isBodyParseError = (err: Error): boolean => {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
};

const resolveError = (err: AppError): ResolvedError => {
  if (isBodyParseError(err)) {
    return { statusCode: 400, code: 'INVALID_JSON', message: 'Request body is not valid JSON' };
  }
  return {
    statusCode: err.statusCode || 500,
    code: err.code || 'INTERNAL_SERVER_ERROR',
    message: err.message || 'An unexpected error occurred',
  };
};

const getRequestId = (req: Request): string => {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header) {
    return header;
  }
  return Math.random().toString(36).substring(2, 15);
};

/**
 * Render every error as the JSON envelope. 5xx responses are logged as
 * errors and lose their message in production; 4xx are logged as warnings.
 * Outside production the stack is returned under `details`.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  next: NextFunction
): void => {
  const requestId = getRequestId(req);
  const { statusCode, code, message } = resolveError(err);
  const isProduction = process.env.NODE_ENV === 'production';

  const logData = {
    requestId,
    method: req.method,
    url: req.originalUrl,
    statusCode,
    code,
    message,
    stack: err.stack,
    userId: req.identity?.userId,
  };
  if (statusCode >= 500) {
    logger.error('Server Error', logData);
  } else {
    logger.warn('Client Error', logData);
  }

  const errorResponse: ErrorResponse = {
    error: {
      code,
      message: isProduction && statusCode >= 500 ? 'Internal server error' : message,
      ...(isProduction ? {} : { details: { stack: err.stack } }),
    },
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
    requestId,
  };

  res.status(statusCode).json(errorResponse);
};

// Forwards a rejected handler promise to the error handler
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// Unmatched routes
export const notFoundHandler = (req: Request, res: Response): void => {
  const errorResponse: ErrorResponse = {
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.originalUrl} not found`
    },
    timestamp: new Date().toISOString(),
    path: req.originalUrl
  };

  res.status(404).json(errorResponse);
};
