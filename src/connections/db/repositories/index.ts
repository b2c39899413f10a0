import { Pool } from 'pg';
import { logger } from '../../../utils/logging';
import { errorMessage } from '../../../utils/errors';
import { PgFlowRepository } from './flow.repository';
import { PgOrderRepository } from './order.repository';
import { PgPickedOrderRepository } from './picked-order.repository';
import { PgProductRepository } from './product.repository';
import { PgRoleRepository, PgUserRepository, PgUserRoleRepository } from './user.repository';
import { DataSource, Queryable, Repositories } from './types';

export * from './types';

export const createPgRepositories = (db: Queryable): Repositories => ({
  orders: new PgOrderRepository(db),
  pickedOrders: new PgPickedOrderRepository(db),
  products: new PgProductRepository(db),
  users: new PgUserRepository(db),
  roles: new PgRoleRepository(db),
  userRoles: new PgUserRoleRepository(db),
  flows: new PgFlowRepository(db),
});

/**
 * DataSource over a pg Pool. Transactions check out one client and run
 * BEGIN / COMMIT, or ROLLBACK when the work throws.
 */
export class PgDataSource implements DataSource {
  readonly repositories: Repositories;

  constructor(private readonly pool: Pool) {
    this.repositories = createPgRepositories(pool);
  }

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(createPgRepositories(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('Transaction rollback failed', { error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
