#!/usr/bin/env tsx
/**
 * Database Migration Runner Script
 *
 * Applies, rolls back or lists the blotter schema migrations.
 *
 * Usage:
 *   npx tsx scripts/src/run-migrations.ts [command] [options]
 *   # or via npm script:
 *   npm run migrate -- [command] [options]
 *
 * Commands:
 *   up        Run pending migrations (default)
 *   down      Roll back migrations (default: 1 step)
 *   status    Show migration status
 *
 * Options:
 *   --dry-run         Show what would be done without making changes
 *   --steps=N         Number of migrations to run/roll back
 *   --target=N        Target version to migrate to
 *   --force           Apply even if an applied file's checksum changed
 *
 * Environment variables:
 *   - DATABASE_URL, or DB_HOST / DB_PORT / DB_USER / DB_PASSWORD / DB_NAME
 */

import {
  createDatabasePool,
  createLoggerFromEnv,
  getMigrationStatus,
  loadDatabaseConfig,
  migrateDown,
  migrateUp,
  validateDatabaseEnv,
  type MigrationRunResult,
  type MigrationRunnerOptions,
  type PoolType,
} from '@mt-blotter/lib';

type Command = 'up' | 'down' | 'status';

interface ParsedArgs {
  command: Command;
  dryRun: boolean;
  steps?: number;
  target?: number;
  force: boolean;
}

function parseArgs(): ParsedArgs {
  const result: ParsedArgs = { command: 'up', dryRun: false, force: false };

  for (const arg of process.argv.slice(2)) {
    if (arg === 'up' || arg === 'down' || arg === 'status') {
      result.command = arg;
    } else if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg === '--force') {
      result.force = true;
    } else if (arg.startsWith('--steps=')) {
      result.steps = parseInt(arg.slice(8), 10);
    } else if (arg.startsWith('--target=')) {
      result.target = parseInt(arg.slice(9), 10);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown argument: ${arg}`);
      printHelp();
      process.exit(1);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Database Migration Runner

Usage:
  npm run migrate -- [command] [options]

Commands:
  up        Run pending migrations (default)
  down      Roll back migrations (default: 1 step)
  status    Show migration status

Options:
  --dry-run         Show what would be done without making changes
  --steps=N         Number of migrations to run/roll back
  --target=N        Target version to migrate to
  --force           Apply even if an applied file's checksum changed
  -h, --help        Show this help message
`);
}

function printResult(result: MigrationRunResult, direction: 'up' | 'down'): void {
  console.log('');
  console.log(`MIGRATION ${direction.toUpperCase()} ${result.success ? 'COMPLETE' : 'FAILED'}`);

  if (result.applied.length === 0 && result.errors.length === 0) {
    console.log(direction === 'up' ? 'No pending migrations.' : 'No migrations to roll back.');
  }

  for (const migration of result.applied) {
    console.log(`  ${migration.success ? '[OK]' : '[FAILED]'} ${migration.migrationName} (${migration.executionTimeMs}ms)`);
  }

  for (const error of result.errors) {
    console.log(`  - ${error}`);
  }

  console.log(`Total time: ${result.totalTime}ms`);
}

async function printStatus(pool: PoolType): Promise<void> {
  const status = await getMigrationStatus(pool);

  console.log(`Current version: ${status.currentVersion}`);
  console.log(`Available migrations: ${status.availableMigrations.length}`);
  console.log(`Pending migrations: ${status.pendingMigrations.length}`);

  for (const migration of status.appliedMigrations) {
    const date = migration.appliedAt.toISOString().split('T')[0] ?? '';
    console.log(`  [v${migration.version}] ${migration.migrationName} (${date})`);
  }
  for (const migration of status.pendingMigrations) {
    console.log(`  [v${migration.version}] ${migration.filename} (pending)`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs();
  const logger = createLoggerFromEnv('migrate');

  const validation = validateDatabaseEnv();
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (!validation.isValid) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    process.exit(1);
  }

  const config = loadDatabaseConfig();
  logger.info('Connecting', { host: config.host, port: config.port, database: config.database });

  // Migrations run on a single connection
  const pool = createDatabasePool({ ...config, maxConnections: 1 }, logger.child('db'));
  const options: MigrationRunnerOptions = {
    dryRun: args.dryRun,
    targetVersion: args.target,
    maxMigrations: args.steps,
    force: args.force,
    logger,
  };

  let success = true;
  try {
    switch (args.command) {
      case 'up': {
        const result = await migrateUp(pool, options);
        printResult(result, 'up');
        success = result.success;
        break;
      }
      case 'down': {
        const result = await migrateDown(pool, options);
        printResult(result, 'down');
        success = result.success;
        break;
      }
      case 'status':
        await printStatus(pool);
        break;
    }
  } finally {
    await pool.end();
  }

  process.exit(success ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
