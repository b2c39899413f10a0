import { PoolClient } from 'pg';
import { Migration } from './types';
import { DEFAULT_ROLE_HIERARCHY } from '../../../constants/user.constants';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS roles (
        id SERIAL PRIMARY KEY,
        name VARCHAR(50) UNIQUE NOT NULL,
        description TEXT,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    // Seed every role of the default hierarchy
    for (const name of Object.keys(DEFAULT_ROLE_HIERARCHY)) {
      await client.query(
        'INSERT INTO roles (name, description) VALUES ($1, $2) ON CONFLICT (name) DO NOTHING',
        [name, `${name} role`]
      );
    }
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS roles CASCADE');
  },
};
