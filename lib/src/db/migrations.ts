/**
 * Database Migrations
 *
 * SQL-file migration runner for the blotter schema. Files live in
 * `./migrations` as `NNN_name.sql` with an optional `NNN_name.down.sql`;
 * every applied file is recorded in `schema_migrations` with its checksum.
 */

import { createHash } from 'crypto';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';

import { getGlobalLogger, type Logger } from '../logging/index.js';
import { type PoolType, withTransaction } from './client.js';

export type MigrationDirection = 'up' | 'down';

export interface MigrationFile {
  filename: string;
  /** Numeric filename prefix */
  version: number;
  path: string;
  direction: MigrationDirection;
  /** Filename without the `.sql` / `.down.sql` suffix */
  baseName: string;
}

export interface MigrationRecord {
  id: number;
  migrationName: string;
  version: number;
  direction: MigrationDirection;
  checksum: string | null;
  executionTimeMs: number | null;
  success: boolean;
  errorMessage: string | null;
  appliedAt: Date;
}

export interface MigrationResult {
  migrationName: string;
  version: number;
  direction: MigrationDirection;
  success: boolean;
  executionTimeMs: number;
  error?: string;
}

export interface MigrationRunResult {
  success: boolean;
  applied: MigrationResult[];
  errors: string[];
  totalTime: number;
}

export interface MigrationRunnerOptions {
  /** Log what would run without touching the schema */
  dryRun?: boolean;
  /** Maximum number of migrations to apply (default all for up, 1 for down) */
  maxMigrations?: number;
  /** up: highest version to apply; down: roll back to but not including this version */
  targetVersion?: number;
  /** Apply pending migrations even when an applied file's checksum changed */
  force?: boolean;
  /** Directory holding the SQL files (default: bundled migrations) */
  migrationsDir?: string;
  logger?: Logger;
}

interface MigrationRow {
  id: number;
  migration_name: string;
  version: number;
  direction: MigrationDirection;
  checksum: string | null;
  execution_time_ms: number | null;
  success: boolean;
  error_message: string | null;
  applied_at: Date;
}

/**
 * Parses `NNN_name.sql` or `NNN_name.down.sql`
 */
export function parseMigrationFilename(
  filename: string
): { version: number; direction: MigrationDirection; baseName: string } | null {
  const match = /^(\d+)_(.+?)(\.down)?\.sql$/.exec(filename);
  if (!match) {
    return null;
  }

  const [, prefix = '', name = '', down] = match;
  return {
    version: parseInt(prefix, 10),
    direction: down ? 'down' : 'up',
    baseName: `${prefix}_${name}`,
  };
}

export function calculateChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function getMigrationsDir(): string {
  return fileURLToPath(new URL('./migrations', import.meta.url));
}

/**
 * Migration files for one direction, in the order they should run
 * (ascending for up, descending for down)
 */
export async function readMigrationFiles(
  direction: MigrationDirection = 'up',
  migrationsDir: string = getMigrationsDir()
): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const migrations: MigrationFile[] = [];

  for (const file of files) {
    const parsed = parseMigrationFilename(file);
    if (parsed && parsed.direction === direction) {
      migrations.push({ filename: file, path: join(migrationsDir, file), ...parsed });
    }
  }

  return migrations.sort((a, b) => (direction === 'up' ? a.version - b.version : b.version - a.version));
}

function rowToMigrationRecord(row: MigrationRow): MigrationRecord {
  return {
    id: row.id,
    migrationName: row.migration_name,
    version: row.version,
    direction: row.direction,
    checksum: row.checksum,
    executionTimeMs: row.execution_time_ms,
    success: row.success,
    errorMessage: row.error_message,
    appliedAt: row.applied_at,
  };
}

export async function ensureMigrationsTable(pool: PoolType): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      migration_name VARCHAR(255) NOT NULL,
      version INTEGER NOT NULL,
      direction VARCHAR(10) NOT NULL DEFAULT 'up' CHECK (direction IN ('up', 'down')),
      checksum VARCHAR(64),
      execution_time_ms INTEGER,
      success BOOLEAN DEFAULT TRUE,
      error_message TEXT,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS idx_schema_migrations_version ON schema_migrations(version);
  `);
}

export async function getAppliedMigrations(pool: PoolType): Promise<MigrationRecord[]> {
  const result = await pool.query<MigrationRow>(
    'SELECT * FROM schema_migrations WHERE success = TRUE ORDER BY version ASC, id ASC'
  );
  return result.rows.map(rowToMigrationRecord);
}

/**
 * Highest applied `up` version, 0 for an empty database
 */
export async function getCurrentVersion(pool: PoolType): Promise<number> {
  const result = await pool.query<{ max_version: number }>(
    `SELECT COALESCE(MAX(version), 0) AS max_version
     FROM schema_migrations
     WHERE direction = 'up' AND success = TRUE`
  );
  return result.rows[0]?.max_version ?? 0;
}

async function recordMigration(
  pool: PoolType,
  migration: MigrationFile,
  outcome: { checksum: string; executionTimeMs: number; success: boolean; errorMessage?: string }
): Promise<void> {
  await pool.query(
    `INSERT INTO schema_migrations
     (migration_name, version, direction, checksum, execution_time_ms, success, error_message)
     VALUES ($1, $2, $3, $4, $5, $6, $7)`,
    [
      migration.filename,
      migration.version,
      migration.direction,
      outcome.checksum,
      outcome.executionTimeMs,
      outcome.success,
      outcome.errorMessage ?? null,
    ]
  );
}

/**
 * Runs one migration file inside a transaction and records the outcome
 */
export async function runMigration(
  pool: PoolType,
  migration: MigrationFile,
  options: { dryRun?: boolean; logger?: Logger } = {}
): Promise<MigrationResult> {
  const logger = options.logger ?? getGlobalLogger().child('migrations');
  const startTime = Date.now();
  const content = await readFile(migration.path, 'utf-8');
  const checksum = calculateChecksum(content);
  const base = { migrationName: migration.filename, version: migration.version, direction: migration.direction };

  if (options.dryRun) {
    logger.info('Dry run: would apply migration', { migration: migration.filename });
    return { ...base, success: true, executionTimeMs: 0 };
  }

  try {
    const client = await pool.connect();
    await withTransaction(client, async () => {
      await client.query(content);
      if (migration.direction === 'down') {
        await client.query(`DELETE FROM schema_migrations WHERE migration_name = $1 AND direction = 'up'`, [
          `${migration.baseName}.sql`,
        ]);
      }
    });
  } catch (error) {
    const executionTimeMs = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : String(error);

    try {
      await recordMigration(pool, migration, { checksum, executionTimeMs, success: false, errorMessage });
    } catch (recordError) {
      logger.warn('Could not record failed migration', {
        migration: migration.filename,
        error: recordError instanceof Error ? recordError.message : String(recordError),
      });
    }

    return { ...base, success: false, executionTimeMs, error: errorMessage };
  }

  const executionTimeMs = Date.now() - startTime;
  if (migration.direction === 'up') {
    await recordMigration(pool, migration, { checksum, executionTimeMs, success: true });
  }

  logger.info('Applied migration', { migration: migration.filename, executionTimeMs });
  return { ...base, success: true, executionTimeMs };
}

async function runSequence(
  pool: PoolType,
  migrations: MigrationFile[],
  options: MigrationRunnerOptions,
  startTime: number
): Promise<MigrationRunResult> {
  const applied: MigrationResult[] = [];
  const errors: string[] = [];

  for (const migration of migrations) {
    const result = await runMigration(pool, migration, { dryRun: options.dryRun, logger: options.logger });
    applied.push(result);

    if (!result.success) {
      errors.push(`${migration.filename}: ${result.error ?? 'unknown error'}`);
      break;
    }
  }

  return { success: errors.length === 0, applied, errors, totalTime: Date.now() - startTime };
}

/**
 * Applies pending `up` migrations in version order, stopping at the first
 * failure
 */
export async function migrateUp(pool: PoolType, options: MigrationRunnerOptions = {}): Promise<MigrationRunResult> {
  const startTime = Date.now();
  await ensureMigrationsTable(pool);

  const migrations = await readMigrationFiles('up', options.migrationsDir);
  const appliedRecords = await getAppliedMigrations(pool);

  if (!options.force) {
    const errors: string[] = [];
    for (const record of appliedRecords.filter((r) => r.direction === 'up')) {
      const file = migrations.find((m) => m.filename === record.migrationName);
      if (file && record.checksum) {
        const checksum = calculateChecksum(await readFile(file.path, 'utf-8'));
        if (checksum !== record.checksum) {
          errors.push(`${file.filename}: checksum changed since it was applied`);
        }
      }
    }
    if (errors.length > 0) {
      return { success: false, applied: [], errors, totalTime: Date.now() - startTime };
    }
  }

  const currentVersion = await getCurrentVersion(pool);
  const targetVersion = options.targetVersion ?? Infinity;
  const pending = migrations
    .filter((m) => m.version > currentVersion && m.version <= targetVersion)
    .slice(0, options.maxMigrations ?? Infinity);

  return runSequence(pool, pending, options, startTime);
}

/**
 * Rolls back applied migrations that have a `.down.sql`, newest first
 * (one step unless `maxMigrations` says otherwise)
 */
export async function migrateDown(pool: PoolType, options: MigrationRunnerOptions = {}): Promise<MigrationRunResult> {
  const startTime = Date.now();
  await ensureMigrationsTable(pool);

  const appliedUp = (await getAppliedMigrations(pool)).filter((m) => m.direction === 'up');
  const downMigrations = await readMigrationFiles('down', options.migrationsDir);
  const targetVersion = options.targetVersion ?? 0;

  const candidates = downMigrations
    .filter((down) => appliedUp.some((up) => up.migrationName === `${down.baseName}.sql`))
    .filter((m) => m.version > targetVersion)
    .slice(0, options.maxMigrations ?? 1);

  return runSequence(pool, candidates, options, startTime);
}

export async function getMigrationStatus(
  pool: PoolType,
  options: { migrationsDir?: string } = {}
): Promise<{
  currentVersion: number;
  pendingMigrations: MigrationFile[];
  appliedMigrations: MigrationRecord[];
  availableMigrations: MigrationFile[];
}> {
  await ensureMigrationsTable(pool);

  const currentVersion = await getCurrentVersion(pool);
  const appliedMigrations = await getAppliedMigrations(pool);
  const availableMigrations = await readMigrationFiles('up', options.migrationsDir);

  return {
    currentVersion,
    pendingMigrations: availableMigrations.filter((m) => m.version > currentVersion),
    appliedMigrations,
    availableMigrations,
  };
}
