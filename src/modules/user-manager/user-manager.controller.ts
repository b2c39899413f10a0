import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { currentUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { UserManagerService } from './user-manager.service';
import {
  createUserSchema,
  resetPasswordSchema,
  roleBodySchema,
  updateProfileSchema,
  userStatusSchema,
} from './user-manager.validation';

export const createUserManagerController = (userManager: UserManagerService) => {
  const createUser = async (req: AuthRequest, res: Response) => {
    try {
      const validated = createUserSchema.parse(req.body);
      const user = await userManager.createUser(currentUser(req), validated);
      return ResponseHandler.created(res, user, 'User created successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to create user');
    }
  };

  const deleteUser = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      await userManager.deleteUser(currentUser(req), id);
      return ResponseHandler.success(res, undefined, 'User deleted successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to delete user');
    }
  };

  const updateUserStatus = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { is_active } = userStatusSchema.parse(req.body);
      const user = await userManager.updateUserStatus(currentUser(req), id, is_active);
      return ResponseHandler.success(res, user, 'User status updated successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update user status');
    }
  };

  const updateUserProfile = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const validated = updateProfileSchema.parse(req.body);
      const user = await userManager.updateUserProfile(currentUser(req), id, validated);
      return ResponseHandler.success(res, user, 'User profile updated successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update user profile');
    }
  };

  const resetPassword = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { new_password } = resetPasswordSchema.parse(req.body);
      await userManager.resetPassword(currentUser(req), id, new_password);
      return ResponseHandler.success(res, undefined, 'Password reset successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to reset password');
    }
  };

  const assignRole = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { role } = roleBodySchema.parse(req.body);
      const user = await userManager.assignRole(currentUser(req), id, role);
      return ResponseHandler.success(res, user, 'Role assigned successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to assign role');
    }
  };

  const removeRole = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { role } = roleBodySchema.parse(req.body);
      const user = await userManager.removeRole(currentUser(req), id, role);
      return ResponseHandler.success(res, user, 'Role removed successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to remove role');
    }
  };

  return {
    createUser,
    deleteUser,
    updateUserStatus,
    updateUserProfile,
    resetPassword,
    assignRole,
    removeRole,
  };
};

export type UserManagerController = ReturnType<typeof createUserManagerController>;
