import { Request, Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { currentUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { AuthService } from './auth.service';
import { loginSchema, refreshTokenSchema } from './auth.validation';

export const createAuthController = (auth: AuthService) => {
  const login = async (req: Request, res: Response) => {
    try {
      const { username, password } = loginSchema.parse(req.body);
      const result = await auth.login(username, password);
      logger.info('[Login] User logged in successfully', { userId: result.user.id, ip: req.ip });
      return ResponseHandler.success(res, result, 'Login successful');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to log in');
    }
  };

  const refreshToken = async (req: Request, res: Response) => {
    try {
      const { refresh_token } = refreshTokenSchema.parse(req.body);
      const tokens = await auth.refresh(refresh_token);
      return ResponseHandler.success(res, tokens, 'Token refreshed successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to refresh token');
    }
  };

  const logout = async (req: AuthRequest, res: Response) => {
    try {
      await auth.logout(currentUser(req));
      return ResponseHandler.success(res, undefined, 'Logged out successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to log out');
    }
  };

  const getCurrentUser = async (req: AuthRequest, res: Response) => {
    try {
      const user = await auth.me(currentUser(req));
      return ResponseHandler.success(res, user, 'User retrieved successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to retrieve user');
    }
  };

  return { login, refreshToken, logout, getCurrentUser };
};

export type AuthController = ReturnType<typeof createAuthController>;
