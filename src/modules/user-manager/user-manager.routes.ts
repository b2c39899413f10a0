import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { COORDINATOR_ROLES } from '../../constants/user.constants';
import { UserManagerController } from './user-manager.controller';

export const createUserManagerRoutes = (controller: UserManagerController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.use(authenticate);

  router.post('/users', requireRole(...COORDINATOR_ROLES), controller.createUser);
  router.delete('/users/:id', requireRole(...COORDINATOR_ROLES), controller.deleteUser);
  router.put('/users/:id/status', requireRole(...COORDINATOR_ROLES), controller.updateUserStatus);
  // Rank check happens in the service
  router.put('/users/:id/profile', controller.updateUserProfile);
  router.put('/users/:id/password', controller.resetPassword);

  router.post('/users/:id/roles', requireRole(...COORDINATOR_ROLES), controller.assignRole);
  router.delete('/users/:id/roles', requireRole(...COORDINATOR_ROLES), controller.removeRole);

  return router;
};
