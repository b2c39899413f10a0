import { PickedOrder } from '../models/order.model';
import { PickedOrderRepository, Queryable } from './types';

export class PgPickedOrderRepository implements PickedOrderRepository {
  constructor(private readonly db: Queryable) {}

  async create(orderId: number, pickedBy: number): Promise<PickedOrder> {
    const result = await this.db.query<PickedOrder>(
      'INSERT INTO picked_orders (order_id, picked_by) VALUES ($1, $2) RETURNING *',
      [orderId, pickedBy]
    );
    return result.rows[0];
  }

  async findByOrderId(orderId: number): Promise<PickedOrder[]> {
    const result = await this.db.query<PickedOrder>(
      'SELECT * FROM picked_orders WHERE order_id = $1 ORDER BY created_at ASC',
      [orderId]
    );
    return result.rows;
  }
}
