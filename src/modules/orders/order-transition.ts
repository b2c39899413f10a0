/**
 * Order Transition Rules
 *
 * Pure guards for every state-changing operation on an order. The service
 * re-reads the locked row and asks these before writing anything.
 */

import {
  ASSIGN_BLOCKED_STATUSES,
  EVENT_STATUS,
  MODIFY_BLOCKED_STATUSES,
  PICKABLE_STATUSES,
  PROCESSING_STATUS,
} from '../../constants/order.constants';
import { Order } from '../../connections/db/models/order.model';

export type OrderTransition =
  | 'assign'
  | 'pick'
  | 'complete'
  | 'pending'
  | 'update'
  | 'cancel'
  | 'duplicate';

export type TransitionCode = 'ORDER_CANCELLED' | 'INVALID_STATUS';

export type TransitionResult =
  | { ok: true }
  | { ok: false; code: TransitionCode; message: string; status: string };

type TransitionOrder = Pick<Order, 'processing_status' | 'event_status'>;

const ACTION_LABEL: Record<OrderTransition, string> = {
  assign: 'assign a picker to',
  pick: 'pick',
  complete: 'complete picking of',
  pending: 'set pending',
  update: 'update',
  cancel: 'cancel',
  duplicate: 'duplicate',
};

const blocked = (transition: OrderTransition, status: string): TransitionResult => ({
  ok: false,
  code: 'INVALID_STATUS',
  message: `Cannot ${ACTION_LABEL[transition]} order with status '${status}'`,
  status,
});

export const isCancelled = (order: TransitionOrder): boolean =>
  order.event_status === EVENT_STATUS.CANCELLED;

/**
 * Validates a transition against the order's current state.
 * Cancellation is checked first and blocks everything; each transition then
 * applies its own allow- or block-list on processing_status.
 */
export function validateOrderTransition(
  transition: OrderTransition,
  order: TransitionOrder
): TransitionResult {
  const status = order.processing_status;

  if (isCancelled(order)) {
    return {
      ok: false,
      code: 'ORDER_CANCELLED',
      message: `Cannot ${ACTION_LABEL[transition]} a cancelled order (status '${status}')`,
      status,
    };
  }

  switch (transition) {
    case 'assign':
      return ASSIGN_BLOCKED_STATUSES.includes(status) ? blocked(transition, status) : { ok: true };

    case 'pick':
      return PICKABLE_STATUSES.includes(status) ? { ok: true } : blocked(transition, status);

    case 'complete':
    case 'pending':
      return status === PROCESSING_STATUS.PICKING_PROCESS ? { ok: true } : blocked(transition, status);

    case 'update':
    case 'cancel':
    case 'duplicate':
      return MODIFY_BLOCKED_STATUSES.includes(status) ? blocked(transition, status) : { ok: true };
  }
}
