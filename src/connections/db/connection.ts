import { Pool } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

export const pool = new Pool(dbConfig);

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err) {
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts:`, {
          error: errorMessage(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, {
        error: errorMessage(err),
      });
      await new Promise(resolve => setTimeout(resolve, retryDelay));
    }
  }
};
