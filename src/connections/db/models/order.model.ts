// Order Model - orders / order_details tables

import { EventStatus, ProcessingStatus } from '../../../constants/order.constants';
import { Product } from './product.model';

export interface Order {
  id: number;
  order_ginee_id: string; // unique external id
  tracking: string; // unique
  processing_status: ProcessingStatus;
  event_status: EventStatus | null;
  channel: string;
  store: string;
  buyer: string;
  address: string;
  courier: string;
  sent_before: Date | null;
  assigned_by: number | null;
  assigned_at: Date | null;
  picked_by: number | null;
  picked_at: Date | null;
  pending_by: number | null;
  pending_at: Date | null;
  changed_by: number | null;
  changed_at: Date | null;
  cancelled_by: number | null;
  cancelled_at: Date | null;
  complained: boolean;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null; // Soft delete
}

export interface OrderDetail {
  id: number;
  order_id: number;
  sku: string;
  product_name: string;
  variant: string;
  quantity: number;
  price: number;
  created_at: Date;
  updated_at: Date;
}

// Weak reference: product is looked up by sku when the order is read
export interface OrderDetailView extends OrderDetail {
  product: Product | null;
}

export interface OrderWithDetails extends Order {
  details: OrderDetail[];
}

export interface OrderView extends Order {
  details: OrderDetailView[];
}

export interface OrderHeaderInput {
  order_ginee_id: string;
  tracking: string;
  channel: string;
  store: string;
  buyer: string;
  address: string;
  courier: string;
  sent_before: Date | null;
}

export interface OrderDetailInput {
  sku: string;
  product_name: string;
  variant: string;
  quantity: number;
  price: number;
}

// id 0 inserts a new detail, any other id updates that detail
export interface OrderDetailChange extends OrderDetailInput {
  id: number;
}

export interface CreateOrderInput extends OrderHeaderInput {
  processing_status: ProcessingStatus;
  event_status?: EventStatus | null;
  changed_by?: number | null;
  changed_at?: Date | null;
  complained?: boolean;
}

/**
 * Columns a transition may write. Keys present (even with null) are written,
 * absent keys are left as they are.
 */
export type OrderPatch = Partial<
  Pick<
    Order,
    | 'order_ginee_id'
    | 'tracking'
    | 'processing_status'
    | 'event_status'
    | 'channel'
    | 'store'
    | 'buyer'
    | 'address'
    | 'courier'
    | 'sent_before'
    | 'assigned_by'
    | 'assigned_at'
    | 'picked_by'
    | 'picked_at'
    | 'pending_by'
    | 'pending_at'
    | 'changed_by'
    | 'changed_at'
    | 'cancelled_by'
    | 'cancelled_at'
    | 'complained'
  >
>;

export interface PickedOrder {
  id: number;
  order_id: number;
  picked_by: number;
  created_at: Date;
}
