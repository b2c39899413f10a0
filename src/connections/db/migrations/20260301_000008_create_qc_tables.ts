import { PoolClient } from 'pg';
import { Migration } from './types';

const QC_TABLES = ['qc_ribbons', 'qc_onlines'];

export const migration: Migration = {
  async up(client: PoolClient) {
    for (const table of QC_TABLES) {
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${table} (
          id SERIAL PRIMARY KEY,
          tracking VARCHAR(100) UNIQUE NOT NULL,
          qc_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
          created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
          updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
      `);

      await client.query(`
        CREATE INDEX IF NOT EXISTS idx_${table}_created_at ON ${table}(created_at)
      `);
    }
  },

  async down(client: PoolClient) {
    for (const table of QC_TABLES) {
      await client.query(`DROP INDEX IF EXISTS idx_${table}_created_at`);
      await client.query(`DROP TABLE IF EXISTS ${table} CASCADE`);
    }
  },
};
