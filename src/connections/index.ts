// Database
export { pool, connectDatabase, PgDataSource } from './db';
export type { DataSource, Repositories } from './db';

// Config - All configurations in one place
export { appConfig, logConfig, roleConfig, parseRoleHierarchy, dbConfig } from './config';
