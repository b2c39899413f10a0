import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS order_details (
        id SERIAL PRIMARY KEY,
        order_id INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
        -- Weak reference to products.sku, no foreign key
        sku VARCHAR(100) NOT NULL,
        product_name VARCHAR(255) NOT NULL DEFAULT '',
        variant VARCHAR(255) NOT NULL DEFAULT '',
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        price INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_details_order ON order_details(order_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_order_details_sku ON order_details(sku)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_order_details_sku');
    await client.query('DROP INDEX IF EXISTS idx_order_details_order');
    await client.query('DROP TABLE IF EXISTS order_details CASCADE');
  },
};
