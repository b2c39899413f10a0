import { PoolClient } from 'pg';
import bcrypt from 'bcryptjs';
import { Migration } from './types';
import { ROLE } from '../../../constants/user.constants';
import { logger } from '../../../utils/logging';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS user_roles (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        role_id INTEGER NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
        assigned_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (user_id, role_id)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_user_roles_user ON user_roles(user_id)
    `);

    // Bootstrap superadmin: every other account is created through it
    const existing = await client.query(
      `SELECT u.id FROM users u
       JOIN user_roles ur ON ur.user_id = u.id
       JOIN roles r ON r.id = ur.role_id
       WHERE r.name = $1 LIMIT 1`,
      [ROLE.SUPERADMIN]
    );

    if (existing.rows.length === 0) {
      const username = process.env.SUPERADMIN_USERNAME || 'superadmin';
      const password = process.env.SUPERADMIN_PASSWORD || 'change-me';
      const passwordHash = await bcrypt.hash(password, 10);

      const user = await client.query<{ id: number }>(
        `INSERT INTO users (username, email, full_name, password_hash)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (username) DO UPDATE SET updated_at = CURRENT_TIMESTAMP
         RETURNING id`,
        [username, `${username}@localhost`, 'Super Administrator', passwordHash]
      );

      await client.query(
        `INSERT INTO user_roles (user_id, role_id)
         SELECT $1, id FROM roles WHERE name = $2
         ON CONFLICT (user_id, role_id) DO NOTHING`,
        [user.rows[0].id, ROLE.SUPERADMIN]
      );

      logger.warn(`Default superadmin "${username}" created, change its password after first login`);
    }
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_user_roles_user');
    await client.query('DROP TABLE IF EXISTS user_roles CASCADE');
  },
};
