import { z } from 'zod';
import { optionalDateTimeSchema } from '../../utils/validation';

// Validation schemas for the Orders module

const detailFields = {
  sku: z.string().trim().min(1, 'sku is required'),
  product_name: z.string().trim().min(1, 'product_name is required'),
  variant: z.string().default(''),
  quantity: z.number().int().min(1, 'quantity must be at least 1'),
  price: z.number().int().nonnegative().default(0),
};

const headerFields = {
  channel: z.string().trim().min(1, 'channel is required'),
  store: z.string().trim().min(1, 'store is required'),
  buyer: z.string().trim().min(1, 'buyer is required'),
  address: z.string().trim().min(1, 'address is required'),
  sent_before: optionalDateTimeSchema,
};

export const createOrderSchema = z.object({
  order_ginee_id: z.string().trim().min(1, 'order_ginee_id is required'),
  tracking: z.string().trim().min(1, 'tracking is required'),
  courier: z.string().default(''),
  ...headerFields,
  order_details: z.array(z.object(detailFields)).min(1, 'order must have at least one detail'),
});

export const bulkCreateOrdersSchema = z.object({
  orders: z.array(createOrderSchema).min(1, 'orders must not be empty'),
});

export const updateOrderSchema = z.object({
  order_ginee_id: z.string().trim().min(1).optional(),
  tracking: z.string().trim().min(1, 'tracking is required'),
  courier: z.string().trim().min(1, 'courier is required'),
  ...headerFields,
  // id 0 adds a detail, an existing id updates it, omitted details are removed.
  // Price is required so an update never zeroes a stored price.
  order_details: z
    .array(
      z.object({
        id: z.number().int().nonnegative().default(0),
        ...detailFields,
        price: z.number({ required_error: 'price is required' }).int().nonnegative(),
      })
    )
    .min(1, 'order must have at least one detail'),
});

export const assignPickerSchema = z.object({
  picker_id: z.number().int().positive('picker_id is required'),
});

export const complainedSchema = z.object({
  complained: z.boolean(),
});

export const coordinatorApprovalSchema = z.object({
  username: z.string().trim().min(1, 'coordinator username is required'),
  password: z.string().min(1, 'coordinator password is required'),
});

export type CreateOrderBody = z.infer<typeof createOrderSchema>;
export type UpdateOrderBody = z.infer<typeof updateOrderSchema>;
