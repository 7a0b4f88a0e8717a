export type { EducationDatabase } from './db/database.js';
export {
  applyMigrations,
  MIGRATIONS_FOLDER,
  type MigrationOptions,
  splitStatements,
  STATEMENT_BREAKPOINT,
} from './db/migrate.js';
export * from './db/schema/index.js';
export type { PostgresStorageConfig } from './interfaces/postgresStorageConfig.js';
export { PostgresStorage } from './postgresStorage.js';
