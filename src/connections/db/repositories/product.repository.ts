import { Product } from '../models/product.model';
import { ProductRepository, Queryable } from './types';

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async findBySkus(skus: string[]): Promise<Product[]> {
    if (skus.length === 0) {
      return [];
    }
    const result = await this.db.query<Product>(
      'SELECT * FROM products WHERE sku = ANY($1::text[])',
      [skus]
    );
    return result.rows;
  }
}
