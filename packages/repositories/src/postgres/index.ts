// Postgres storage: connection, configuration, schema and repositories
export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export { loadDatabaseConfig } from './config.js';
export * from './schema/index.js';
export * from './repositories/index.js';
