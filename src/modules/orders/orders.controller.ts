import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { currentUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { idParamSchema } from '../../utils/validation';
import { NewOrderInput, OrderFulfillmentService, UpdateOrderInput } from './orders.service';
import {
  CreateOrderBody,
  UpdateOrderBody,
  assignPickerSchema,
  bulkCreateOrdersSchema,
  complainedSchema,
  coordinatorApprovalSchema,
  updateOrderSchema,
} from './orders.validation';

const toNewOrderInput = ({ order_details, ...header }: CreateOrderBody): NewOrderInput => ({
  ...header,
  details: order_details,
});

const toUpdateOrderInput = ({ order_details, ...header }: UpdateOrderBody): UpdateOrderInput => ({
  ...header,
  details: order_details,
});

export const createOrdersController = (orders: OrderFulfillmentService) => {
  const getOrder = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const order = await orders.getOrder(id);
      return ResponseHandler.success(res, order, 'Order retrieved successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to retrieve order');
    }
  };

  const bulkCreateOrders = async (req: AuthRequest, res: Response) => {
    try {
      const validated = bulkCreateOrdersSchema.parse(req.body);
      const result = await orders.bulkCreateOrders(validated.orders.map(toNewOrderInput));
      const { created, skipped, failed } = result.summary;

      if (created === 0 && skipped === 0) {
        return ResponseHandler.error(res, 'No orders could be created', 400, {
          code: 'VALIDATION_ERROR',
          details: result,
        });
      }
      if (created === 0) {
        return ResponseHandler.success(res, result, 'All orders were skipped (already exist)');
      }

      const message = failed > 0 || skipped > 0
        ? 'Bulk order creation completed with some issues'
        : 'Bulk order creation completed';
      return ResponseHandler.created(res, result, message);
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to create orders');
    }
  };

  const updateOrder = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const validated = updateOrderSchema.parse(req.body);
      const order = await orders.updateOrder(id, toUpdateOrderInput(validated), currentUser(req));
      return ResponseHandler.success(res, order, 'Order updated successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update order');
    }
  };

  const markComplained = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { complained } = complainedSchema.parse(req.body);
      const order = await orders.markComplained(id, complained);
      return ResponseHandler.success(res, order, 'Complained status updated successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to update complained status');
    }
  };

  const cancelOrder = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const order = await orders.cancelOrder(id, currentUser(req));
      return ResponseHandler.success(res, order, 'Order cancelled successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to cancel order');
    }
  };

  const duplicateOrder = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const result = await orders.duplicateOrder(id, currentUser(req));
      return ResponseHandler.created(res, result, 'Order duplicated successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to duplicate order');
    }
  };

  const assignPicker = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { picker_id } = assignPickerSchema.parse(req.body);
      const order = await orders.assignPicker(id, picker_id, currentUser(req));
      return ResponseHandler.success(res, order, 'Picker assigned successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to assign picker');
    }
  };

  const setPending = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const order = await orders.setPending(id, currentUser(req));
      return ResponseHandler.success(res, order, 'Order set to pending picking');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to set order pending');
    }
  };

  // Mobile handlers, used by the picker app

  const pick = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const order = await orders.pick(id, currentUser(req));
      return ResponseHandler.success(res, order, 'Order picked successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to pick order');
    }
  };

  const completePicking = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const result = await orders.completePicking(id, currentUser(req));
      return ResponseHandler.success(res, result, 'Picking completed successfully');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to complete picking');
    }
  };

  const setPendingWithApproval = async (req: AuthRequest, res: Response) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const credentials = coordinatorApprovalSchema.parse(req.body);
      const order = await orders.setPendingWithApproval(id, currentUser(req), credentials);
      return ResponseHandler.success(res, order, 'Order set to pending picking');
    } catch (error) {
      return ResponseHandler.fromError(res, error, 'Failed to set order pending');
    }
  };

  return {
    getOrder,
    bulkCreateOrders,
    updateOrder,
    markComplained,
    cancelOrder,
    duplicateOrder,
    assignPicker,
    setPending,
    pick,
    completePicking,
    setPendingWithApproval,
  };
};

export type OrdersController = ReturnType<typeof createOrdersController>;
