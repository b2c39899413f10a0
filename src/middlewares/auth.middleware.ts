import { Response, NextFunction, RequestHandler } from 'express';
import { ActingUser, AuthRequest } from '../types/request.types';
import { UnauthorizedError } from '../utils/errors';
import { ResponseHandler } from '../utils/response';
import { AuthService } from '../modules/auth/auth.service';

const bearerToken = (req: AuthRequest): string | undefined => {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
};

/**
 * Resolves the acting user from the Bearer token and stores it on req.user.
 */
export const createAuthenticate = (authService: AuthService): RequestHandler => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    try {
      req.user = await authService.resolveActingUser(token);
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to authenticate');
    }

    next();
  };
};

/**
 * Passes when the user holds any of the listed roles.
 */
export const requireRole = (...roles: string[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!req.user.roles.some(role => roles.includes(role))) {
      return ResponseHandler.forbidden(res, 'Insufficient role for this action');
    }

    next();
  };
};

/**
 * Acting user of an authenticated request. Handlers mounted behind
 * authenticate always have one.
 */
export const currentUser = (req: AuthRequest): ActingUser => {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
};
