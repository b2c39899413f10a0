import express, { RequestHandler } from 'express';
import { AuthController } from './auth.controller';

export const createAuthRoutes = (controller: AuthController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.post('/login', controller.login);
  router.post('/refresh-token', controller.refreshToken);

  router.post('/logout', authenticate, controller.logout);
  router.get('/me', authenticate, controller.getCurrentUser);

  return router;
};
