import express, { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { ADMIN_ROLES, COORDINATOR_ROLES } from '../../constants/user.constants';
import { OrdersController } from './orders.controller';

export const createOrdersRoutes = (controller: OrdersController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.use(authenticate);

  // Intake
  router.post('/bulk', controller.bulkCreateOrders);

  router.get('/:id', controller.getOrder);
  router.put('/:id', controller.updateOrder);
  router.put('/:id/complained', controller.markComplained);

  // Admin: cancel / duplicate
  router.put('/:id/cancel', requireRole(...ADMIN_ROLES), controller.cancelOrder);
  router.post('/:id/duplicate', requireRole(...ADMIN_ROLES), controller.duplicateOrder);

  // Coordinator: picker assignment
  router.put('/:id/assign-picker', requireRole(...COORDINATOR_ROLES), controller.assignPicker);
  router.put('/:id/pending-pick', requireRole(...COORDINATOR_ROLES), controller.setPending);

  return router;
};

export const createMobileOrdersRoutes = (controller: OrdersController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.use(authenticate);

  router.put('/:id/pick', controller.pick);
  router.put('/:id/complete', controller.completePicking);
  // Coordinator credentials travel in the body
  router.put('/:id/pending-pick', controller.setPendingWithApproval);

  return router;
};
