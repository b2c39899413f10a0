export { appConfig, logConfig, roleConfig, parseRoleHierarchy } from './app.config';
export { dbConfig } from './database.config';
