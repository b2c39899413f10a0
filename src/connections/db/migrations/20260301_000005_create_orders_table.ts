import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        order_ginee_id VARCHAR(100) UNIQUE NOT NULL,
        tracking VARCHAR(100) UNIQUE NOT NULL,
        -- Free text: QC and outbound write their own statuses here
        processing_status VARCHAR(50) NOT NULL DEFAULT 'ready to pick',
        event_status VARCHAR(20),
        channel VARCHAR(100) NOT NULL DEFAULT '',
        store VARCHAR(255) NOT NULL DEFAULT '',
        buyer VARCHAR(255) NOT NULL DEFAULT '',
        address TEXT NOT NULL DEFAULT '',
        courier VARCHAR(100) NOT NULL DEFAULT '',
        sent_before TIMESTAMP,
        -- Attribution pairs
        assigned_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        assigned_at TIMESTAMP,
        picked_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        picked_at TIMESTAMP,
        pending_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        pending_at TIMESTAMP,
        changed_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        changed_at TIMESTAMP,
        cancelled_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        cancelled_at TIMESTAMP,
        complained BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        -- Soft delete
        deleted_at TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_processing_status ON orders(processing_status)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_processing_status');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
