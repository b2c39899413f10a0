import { createApp } from './app';
import { appConfig, connectDatabase, pool, PgDataSource } from './connections';
import { createServices } from './container';
import { logger } from './utils/logging';
import { errorMessage } from './utils/errors';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    const services = createServices(new PgDataSource(pool));
    const app = createApp(services, pool);

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
};

void startServer();
