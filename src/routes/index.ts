import express from 'express';
import { FLOW_TYPE } from '../constants';
import { Services } from '../container';
import { createAuthenticate } from '../middlewares/auth.middleware';
import { createAuthController } from '../modules/auth/auth.controller';
import { createAuthRoutes } from '../modules/auth/auth.routes';
import { createOrdersController } from '../modules/orders/orders.controller';
import { createMobileOrdersRoutes, createOrdersRoutes } from '../modules/orders/orders.routes';
import { createUserManagerController } from '../modules/user-manager/user-manager.controller';
import { createUserManagerRoutes } from '../modules/user-manager/user-manager.routes';
import { createFlowsController } from '../modules/flows/flows.controller';
import { createFlowsRoutes } from '../modules/flows/flows.routes';

export const createRoutes = (services: Services) => {
  const router = express.Router();
  const authenticate = createAuthenticate(services.auth);
  const ordersController = createOrdersController(services.orders);

  // API Routes
  router.use('/auth', createAuthRoutes(createAuthController(services.auth), authenticate));
  router.use('/orders', createOrdersRoutes(ordersController, authenticate));
  router.use('/mobile/orders', createMobileOrdersRoutes(ordersController, authenticate));
  router.use('/user-manager', createUserManagerRoutes(createUserManagerController(services.userManager), authenticate));
  router.use(
    '/ribbons',
    createFlowsRoutes(createFlowsController(services.flows, FLOW_TYPE.RIBBON), authenticate, 'ribbon-flows')
  );
  router.use(
    '/onlines',
    createFlowsRoutes(createFlowsController(services.flows, FLOW_TYPE.ONLINE), authenticate, 'online-flows')
  );

  return router;
};
