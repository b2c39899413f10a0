export { pool, connectDatabase } from './connection';
export { PgDataSource, createPgRepositories } from './repositories';
export type { DataSource, Repositories } from './repositories';
