import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS outbounds (
        id SERIAL PRIMARY KEY,
        tracking VARCHAR(100) UNIQUE NOT NULL,
        outbound_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        expedition VARCHAR(100) NOT NULL DEFAULT '',
        expedition_color VARCHAR(20) NOT NULL DEFAULT '',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS outbounds CASCADE');
  },
};
