import {
  CreateOrderInput,
  Order,
  OrderDetail,
  OrderDetailInput,
  OrderPatch,
} from '../models/order.model';
import { NotFoundError } from '../../../utils/errors';
import { OrderRepository, Queryable } from './types';

// Whitelist for dynamic UPDATE ... SET
const ORDER_PATCH_COLUMNS = [
  'order_ginee_id',
  'tracking',
  'processing_status',
  'event_status',
  'channel',
  'store',
  'buyer',
  'address',
  'courier',
  'sent_before',
  'assigned_by',
  'assigned_at',
  'picked_by',
  'picked_at',
  'pending_by',
  'pending_at',
  'changed_by',
  'changed_at',
  'cancelled_by',
  'cancelled_at',
  'complained',
] as const satisfies readonly (keyof OrderPatch)[];

export class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<Order | null> {
    const result = await this.db.query<Order>(
      'SELECT * FROM orders WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    return result.rows[0] ?? null;
  }

  async lockById(id: number): Promise<Order | null> {
    const result = await this.db.query<Order>(
      'SELECT * FROM orders WHERE id = $1 AND deleted_at IS NULL FOR UPDATE',
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByGineeId(orderGineeId: string): Promise<Order | null> {
    const result = await this.db.query<Order>(
      'SELECT * FROM orders WHERE order_ginee_id = $1 AND deleted_at IS NULL',
      [orderGineeId]
    );
    return result.rows[0] ?? null;
  }

  async findByTracking(tracking: string): Promise<Order | null> {
    const result = await this.db.query<Order>(
      'SELECT * FROM orders WHERE tracking = $1 AND deleted_at IS NULL',
      [tracking]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateOrderInput): Promise<Order> {
    const result = await this.db.query<Order>(
      `INSERT INTO orders (
        order_ginee_id, tracking, processing_status, event_status, channel, store,
        buyer, address, courier, sent_before, changed_by, changed_at, complained
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
      RETURNING *`,
      [
        input.order_ginee_id,
        input.tracking,
        input.processing_status,
        input.event_status ?? null,
        input.channel,
        input.store,
        input.buyer,
        input.address,
        input.courier,
        input.sent_before,
        input.changed_by ?? null,
        input.changed_at ?? null,
        input.complained ?? false,
      ]
    );
    return result.rows[0];
  }

  async update(id: number, patch: OrderPatch): Promise<Order> {
    const sets: string[] = [];
    const values: unknown[] = [];

    for (const column of ORDER_PATCH_COLUMNS) {
      if (column in patch) {
        values.push(patch[column]);
        sets.push(`${column} = $${values.length}`);
      }
    }
    sets.push('updated_at = CURRENT_TIMESTAMP');
    values.push(id);

    const result = await this.db.query<Order>(
      `UPDATE orders SET ${sets.join(', ')} WHERE id = $${values.length} AND deleted_at IS NULL RETURNING *`,
      values
    );
    const order = result.rows[0];
    if (!order) {
      throw new NotFoundError('Order not found', { orderId: id });
    }
    return order;
  }

  async findDetails(orderId: number): Promise<OrderDetail[]> {
    const result = await this.db.query<OrderDetail>(
      'SELECT * FROM order_details WHERE order_id = $1 ORDER BY id ASC',
      [orderId]
    );
    return result.rows;
  }

  async insertDetail(orderId: number, input: OrderDetailInput): Promise<OrderDetail> {
    const result = await this.db.query<OrderDetail>(
      `INSERT INTO order_details (order_id, sku, product_name, variant, quantity, price)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [orderId, input.sku, input.product_name, input.variant, input.quantity, input.price]
    );
    return result.rows[0];
  }

  async updateDetail(detailId: number, input: OrderDetailInput): Promise<OrderDetail> {
    const result = await this.db.query<OrderDetail>(
      `UPDATE order_details
       SET sku = $1, product_name = $2, variant = $3, quantity = $4, price = $5,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $6
       RETURNING *`,
      [input.sku, input.product_name, input.variant, input.quantity, input.price, detailId]
    );
    const detail = result.rows[0];
    if (!detail) {
      throw new NotFoundError('Order detail not found', { detailId });
    }
    return detail;
  }

  async deleteDetail(detailId: number): Promise<void> {
    await this.db.query('DELETE FROM order_details WHERE id = $1', [detailId]);
  }
}
