import { Request, Response, NextFunction } from 'express';
import { hasAnyRole, requireRoles } from '../authorization';
import { UserRole } from '../../types/entities';
import { AuthenticationError, AuthorizationError } from '../errorHandler';

describe('Authorization Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;

  beforeEach(() => {
    mockRequest = {
      params: {},
      body: {},
      query: {},
      path: '/test',
    };
    mockResponse = {};
    mockNext = jest.fn();
  });

  const identity = (role: UserRole) => ({
    userId: 'user-1',
    email: 'user@example.com',
    name: 'Test User',
    role,
  });

  describe('hasAnyRole', () => {
    it('should return true when the role is allowed', () => {
      expect(hasAnyRole(UserRole.TEACHER, [UserRole.TEACHER, UserRole.STUDENT])).toBe(true);
    });

    it('should return false when the role is not allowed', () => {
      expect(hasAnyRole(UserRole.STUDENT, [UserRole.TEACHER])).toBe(false);
    });
  });

  // Express routes errors thrown synchronously by middleware to the error handler
  describe('requireRoles', () => {
    it('should call next for an allowed role', () => {
      mockRequest.identity = identity(UserRole.TEACHER);

      requireRoles([UserRole.TEACHER])(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).toHaveBeenCalledWith();
    });

    it('should reject a role outside the allowed list', () => {
      mockRequest.identity = identity(UserRole.STUDENT);

      expect(() =>
        requireRoles([UserRole.TEACHER])(mockRequest as Request, mockResponse as Response, mockNext)
      ).toThrow(new AuthorizationError('Required roles: teacher'));
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should require an identity', () => {
      expect(() =>
        requireRoles([UserRole.STUDENT])(mockRequest as Request, mockResponse as Response, mockNext)
      ).toThrow(AuthenticationError);
    });
  });
});
