/**
 * Database Module
 *
 * PostgreSQL storage for blotters, incident records and command logs.
 */

export {
  BlotterStatus,
  BlotterStatusSchema,
  BlotterSchema,
  CreateBlotterInputSchema,
  type Blotter,
  type BlotterRow,
  type CreateBlotterInput,
  type GetBlottersOptions,
  type BlotterRecord,
  type RecordRow,
  type GetRecordsOptions,
  type StoredCommandLog,
  type CommandLogRow,
  type RecordWithLogs,
  type CountyCount,
  rowToBlotter,
  rowToRecord,
  rowToCommandLog,
} from './types.js';

export { PersistenceError, PersistenceErrorCode, isPersistenceError } from './errors.js';

export {
  DatabaseConfigSchema,
  type DatabaseConfig,
  type DatabaseEnvReport,
  loadDatabaseConfig,
  parseDatabaseUrl,
  validateDatabaseEnv,
} from './config.js';

export {
  type PoolType,
  type PoolClient,
  createDatabasePool,
  getDatabasePool,
  closeDatabasePool,
  withTransaction,
  checkDatabaseConnection,
} from './client.js';

export { type BlotterRepository, type SaveIncidentsOptions, createPgBlotterRepository } from './repository.js';

export {
  type MigrationDirection,
  type MigrationFile,
  type MigrationRecord,
  type MigrationResult,
  type MigrationRunResult,
  type MigrationRunnerOptions,
  parseMigrationFilename,
  calculateChecksum,
  getMigrationsDir,
  readMigrationFiles,
  ensureMigrationsTable,
  getAppliedMigrations,
  getCurrentVersion,
  runMigration,
  migrateUp,
  migrateDown,
  getMigrationStatus,
} from './migrations.js';
