import {
  DUPLICATE_ID_SUFFIX,
  DUPLICATE_TRACKING_PREFIX,
  EVENT_STATUS,
  PROCESSING_STATUS,
} from '../../constants/order.constants';
import {
  Order,
  OrderDetail,
  OrderDetailChange,
  OrderDetailInput,
  OrderHeaderInput,
  OrderView,
  OrderWithDetails,
  PickedOrder,
} from '../../connections/db/models/order.model';
import { DataSource, Repositories } from '../../connections/db/repositories/types';
import { ActingUser } from '../../types/request.types';
import {
  ConflictError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  ValidationFailedError,
  errorMessage,
} from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { AuthorizationGuard } from '../auth/authorization.guard';
import { OrderTransition, validateOrderTransition } from './order-transition';

export interface NewOrderInput extends OrderHeaderInput {
  details: OrderDetailInput[];
}

export interface UpdateOrderInput {
  order_ginee_id?: string;
  tracking: string;
  channel: string;
  store: string;
  buyer: string;
  address: string;
  courier: string;
  sent_before: Date | null;
  details: OrderDetailChange[];
}

export interface CoordinatorCredentials {
  username: string;
  password: string;
}

/**
 * Checks coordinator credentials presented on a picker's device and returns
 * the approving user.
 */
export interface CoordinatorApprover {
  verifyCoordinatorApproval(credentials: CoordinatorCredentials): Promise<ActingUser>;
}

export interface CompletePickingResult {
  order: Order;
  pickedOrder: PickedOrder;
}

export interface DuplicateOrderResult {
  original: OrderWithDetails;
  duplicate: OrderWithDetails;
}

export interface BulkCreateResult {
  summary: {
    total: number;
    created: number;
    skipped: number;
    failed: number;
  };
  created: OrderWithDetails[];
  skipped: Array<{ index: number; order_ginee_id: string; reason: string }>;
  failed: Array<{ index: number; order_ginee_id: string; error: string }>;
}

export type Clock = () => Date;

/**
 * Order Fulfillment State Machine
 *
 * Every transition runs in one transaction that re-reads the order under a
 * row lock, validates it, then writes. Racing callers are serialized by the
 * lock, so the loser sees the winner's status.
 */
export class OrderFulfillmentService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly guard: AuthorizationGuard,
    private readonly approver: CoordinatorApprover,
    private readonly now: Clock = () => new Date()
  ) {}

  private async lockOrder(repos: Repositories, orderId: number): Promise<Order> {
    const order = await repos.orders.lockById(orderId);
    if (!order) {
      throw new NotFoundError('Order not found', { orderId });
    }
    return order;
  }

  private assertTransition(transition: OrderTransition, order: Order): void {
    const result = validateOrderTransition(transition, order);
    if (!result.ok) {
      throw new InvalidStateError(result.message, result.status, {
        orderId: order.id,
        reason: result.code,
      });
    }
  }

  private async withDetails(repos: Repositories, order: Order): Promise<OrderWithDetails> {
    const details = await repos.orders.findDetails(order.id);
    return { ...order, details };
  }

  /**
   * Coordinator hands an order to a picker.
   */
  async assignPicker(orderId: number, pickerId: number, actor: ActingUser): Promise<Order> {
    return this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);

      const picker = await repos.users.findById(pickerId);
      if (!picker) {
        throw new NotFoundError('Picker not found', { pickerId });
      }

      this.guard.assertCoordinatorRank(actor.roles);
      this.assertTransition('assign', order);

      const updated = await repos.orders.update(order.id, {
        assigned_by: actor.id,
        assigned_at: this.now(),
        picked_by: pickerId,
        processing_status: PROCESSING_STATUS.PICKING_PROCESS,
      });

      logger.info('Order assigned to picker', { orderId, pickerId, assignedBy: actor.id });
      return updated;
    });
  }

  /**
   * Picker takes an order for themselves.
   */
  async pick(orderId: number, actor: ActingUser): Promise<Order> {
    return this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('pick', order);

      return repos.orders.update(order.id, {
        picked_by: actor.id,
        picked_at: this.now(),
        processing_status: PROCESSING_STATUS.PICKING_PROCESS,
      });
    });
  }

  /**
   * Only the picker holding the order can complete it. The PickedOrder row and
   * the status change commit together.
   */
  async completePicking(orderId: number, actor: ActingUser): Promise<CompletePickingResult> {
    return this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('complete', order);

      if (order.picked_by !== actor.id) {
        throw new ForbiddenError('Only the assigned picker can complete this order', {
          orderId,
          pickedBy: order.picked_by,
        });
      }

      const pickedOrder = await repos.pickedOrders.create(order.id, actor.id);
      const updated = await repos.orders.update(order.id, {
        processing_status: PROCESSING_STATUS.PICKING_COMPLETE,
        picked_at: order.picked_at ?? this.now(),
      });

      return { order: updated, pickedOrder };
    });
  }

  /**
   * Returns an in-progress order to the pool. Pick and assignment attribution
   * is cleared so it can be picked or assigned again.
   */
  async setPending(orderId: number, actor: ActingUser): Promise<Order> {
    return this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('pending', order);

      return repos.orders.update(order.id, {
        processing_status: PROCESSING_STATUS.PENDING_PICKING,
        pending_by: actor.id,
        pending_at: this.now(),
        picked_by: null,
        assigned_by: null,
        assigned_at: null,
      });
    });
  }

  /**
   * Mobile variant: a picker sets pending with a coordinator's credentials.
   * pending_by records the picker, the approval is audited.
   */
  async setPendingWithApproval(
    orderId: number,
    actor: ActingUser,
    credentials: CoordinatorCredentials
  ): Promise<Order> {
    const coordinator = await this.approver.verifyCoordinatorApproval(credentials);
    const order = await this.setPending(orderId, actor);

    auditLog('order.pending_approved', {
      orderId,
      pickerId: actor.id,
      approvedBy: coordinator.id,
    });
    return order;
  }

  /**
   * Replaces header fields and reconciles details: id 0 inserts, a known id
   * updates, an unknown id fails, omitted ids are deleted.
   */
  async updateOrder(orderId: number, input: UpdateOrderInput, actor: ActingUser): Promise<OrderWithDetails> {
    return this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('update', order);

      if (input.details.length === 0) {
        throw new ValidationFailedError('Order must have at least one detail', { orderId });
      }

      if (input.tracking !== order.tracking) {
        const owner = await repos.orders.findByTracking(input.tracking);
        if (owner && owner.id !== order.id) {
          throw new ConflictError('Tracking is already used by another order', { tracking: input.tracking });
        }
      }

      const orderGineeId = input.order_ginee_id ?? order.order_ginee_id;
      if (orderGineeId !== order.order_ginee_id) {
        const owner = await repos.orders.findByGineeId(orderGineeId);
        if (owner && owner.id !== order.id) {
          throw new ConflictError('Order ginee id is already used by another order', {
            order_ginee_id: orderGineeId,
          });
        }
      }

      const existing = await repos.orders.findDetails(order.id);
      const existingIds = new Set(existing.map(detail => detail.id));
      const keptIds = new Set<number>();

      for (const change of input.details) {
        const { id, ...fields } = change;
        if (id === 0) {
          await repos.orders.insertDetail(order.id, fields);
          continue;
        }
        if (!existingIds.has(id)) {
          throw new NotFoundError('Order detail not found', { orderId, detailId: id });
        }
        await repos.orders.updateDetail(id, fields);
        keptIds.add(id);
      }

      for (const detail of existing) {
        if (!keptIds.has(detail.id)) {
          await repos.orders.deleteDetail(detail.id);
        }
      }

      const updated = await repos.orders.update(order.id, {
        order_ginee_id: orderGineeId,
        tracking: input.tracking,
        channel: input.channel,
        store: input.store,
        buyer: input.buyer,
        address: input.address,
        courier: input.courier,
        sent_before: input.sent_before,
        event_status: EVENT_STATUS.CHANGED,
        changed_by: actor.id,
        changed_at: this.now(),
      });

      return this.withDetails(repos, updated);
    });
  }

  async cancelOrder(orderId: number, actor: ActingUser): Promise<Order> {
    const cancelled = await this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('cancel', order);

      return repos.orders.update(order.id, {
        event_status: EVENT_STATUS.CANCELLED,
        cancelled_by: actor.id,
        cancelled_at: this.now(),
      });
    });

    auditLog('order.cancelled', { orderId, cancelledBy: actor.id });
    return cancelled;
  }

  /**
   * Splits an order in two. The source keeps its id but moves to the derived
   * identifiers (E-X2 / X-T); a new order takes over the original ones with
   * copies of every detail.
   */
  async duplicateOrder(orderId: number, actor: ActingUser): Promise<DuplicateOrderResult> {
    const result = await this.dataSource.transaction(async (repos) => {
      const order = await this.lockOrder(repos, orderId);
      this.assertTransition('duplicate', order);

      const renamedGineeId = `${order.order_ginee_id}${DUPLICATE_ID_SUFFIX}`;
      const renamedTracking = `${DUPLICATE_TRACKING_PREFIX}${order.tracking}`;

      if (await repos.orders.findByGineeId(renamedGineeId)) {
        throw new ConflictError('Order has already been duplicated', { order_ginee_id: renamedGineeId });
      }
      if (await repos.orders.findByTracking(renamedTracking)) {
        throw new ConflictError('Order has already been duplicated', { tracking: renamedTracking });
      }

      const details = await repos.orders.findDetails(order.id);
      const now = this.now();

      const renamed = await repos.orders.update(order.id, {
        order_ginee_id: renamedGineeId,
        tracking: renamedTracking,
      });

      const created = await repos.orders.create({
        order_ginee_id: order.order_ginee_id,
        tracking: order.tracking,
        processing_status: order.processing_status,
        event_status: EVENT_STATUS.DUPLICATED,
        channel: order.channel,
        store: order.store,
        buyer: order.buyer,
        address: order.address,
        courier: order.courier,
        sent_before: order.sent_before,
        changed_by: actor.id,
        changed_at: now,
        complained: false,
      });

      const copiedDetails: OrderDetail[] = [];
      for (const detail of details) {
        copiedDetails.push(await repos.orders.insertDetail(created.id, {
          sku: detail.sku,
          product_name: detail.product_name,
          variant: detail.variant,
          quantity: detail.quantity,
          price: detail.price,
        }));
      }

      return {
        original: { ...renamed, details },
        duplicate: { ...created, details: copiedDetails },
      };
    });

    auditLog('order.duplicated', {
      orderId,
      duplicateId: result.duplicate.id,
      duplicatedBy: actor.id,
    });
    return result;
  }

  /**
   * Complaint flag is not a processing transition; it is allowed in any state.
   */
  async markComplained(orderId: number, complained: boolean): Promise<Order> {
    const { orders } = this.dataSource.repositories;
    const order = await orders.findById(orderId);
    if (!order) {
      throw new NotFoundError('Order not found', { orderId });
    }
    return orders.update(order.id, { complained });
  }

  /**
   * Intake from the marketplace export. Each order commits on its own; known
   * external ids are skipped and insert failures are reported, not thrown.
   */
  async bulkCreateOrders(inputs: NewOrderInput[]): Promise<BulkCreateResult> {
    const result: BulkCreateResult = {
      summary: { total: inputs.length, created: 0, skipped: 0, failed: 0 },
      created: [],
      skipped: [],
      failed: [],
    };

    for (const [index, input] of inputs.entries()) {
      const existing = await this.dataSource.repositories.orders.findByGineeId(input.order_ginee_id);
      if (existing) {
        result.skipped.push({ index, order_ginee_id: input.order_ginee_id, reason: 'Order already exists' });
        continue;
      }

      try {
        const created = await this.createOrder(input);
        result.created.push(created);
      } catch (error) {
        logger.warn('Bulk order insert failed', { index, order_ginee_id: input.order_ginee_id, error: errorMessage(error) });
        result.failed.push({ index, order_ginee_id: input.order_ginee_id, error: errorMessage(error) });
      }
    }

    result.summary.created = result.created.length;
    result.summary.skipped = result.skipped.length;
    result.summary.failed = result.failed.length;
    return result;
  }

  private async createOrder(input: NewOrderInput): Promise<OrderWithDetails> {
    if (input.details.length === 0) {
      throw new ValidationFailedError('Order must have at least one detail', {
        order_ginee_id: input.order_ginee_id,
      });
    }

    return this.dataSource.transaction(async (repos) => {
      const { details, ...header } = input;
      const order = await repos.orders.create({
        ...header,
        processing_status: PROCESSING_STATUS.READY_TO_PICK,
      });

      const created: OrderDetail[] = [];
      for (const detail of details) {
        created.push(await repos.orders.insertDetail(order.id, detail));
      }
      return { ...order, details: created };
    });
  }

  /**
   * Order with details, each enriched by a product lookup on sku.
   */
  async getOrder(orderId: number): Promise<OrderView> {
    const { orders, products } = this.dataSource.repositories;
    const order = await orders.findById(orderId);
    if (!order) {
      throw new NotFoundError('Order not found', { orderId });
    }

    const details = await orders.findDetails(order.id);
    const skus = [...new Set(details.map(detail => detail.sku))];
    const productsBySku = new Map((await products.findBySkus(skus)).map(product => [product.sku, product]));

    return {
      ...order,
      details: details.map(detail => ({ ...detail, product: productsBySku.get(detail.sku) ?? null })),
    };
  }
}
