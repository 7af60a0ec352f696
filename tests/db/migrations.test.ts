/**
 * Tests for the SQL migration runner
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  calculateChecksum,
  migrateDown,
  migrateUp,
  parseMigrationFilename,
  readMigrationFiles,
  type PoolType,
} from '../../lib/src/db/index.js';
import { Logger } from '../../lib/src/logging/index.js';

const logger = new Logger({ console: false });

const CREATE_A = 'CREATE TABLE a (id SERIAL PRIMARY KEY);';
const CREATE_B = 'CREATE TABLE b (id SERIAL PRIMARY KEY);';

interface AppliedRow {
  migration_name: string;
  version: number;
  checksum: string;
}

function createFakePool(applied: AppliedRow[] = []) {
  const clientStatements: Array<{ sql: string; values: unknown[] }> = [];
  const recorded: unknown[][] = [];

  const client = {
    query: vi.fn(async (sql: string, values: unknown[] = []) => {
      clientStatements.push({ sql, values });
      if (sql.includes('FAIL')) {
        throw new Error('syntax error at or near "FAIL"');
      }
      return { rows: [], rowCount: 0 };
    }),
    release: vi.fn(),
  };

  const pool = {
    query: vi.fn(async (sql: string, values: unknown[] = []) => {
      if (sql.includes('SELECT * FROM schema_migrations')) {
        return {
          rows: applied.map((row, index) => ({
            id: index + 1,
            direction: 'up',
            execution_time_ms: 5,
            success: true,
            error_message: null,
            applied_at: new Date('2026-02-01T00:00:00Z'),
            ...row,
          })),
        };
      }
      if (sql.includes('MAX(version)')) {
        return { rows: [{ max_version: Math.max(0, ...applied.map((row) => row.version)) }] };
      }
      if (sql.includes('INSERT INTO schema_migrations')) {
        recorded.push(values);
      }
      return { rows: [] };
    }),
    connect: vi.fn(async () => client),
  };

  return { pool: pool as unknown as PoolType, connect: pool.connect, client, clientStatements, recorded };
}

describe('parseMigrationFilename', () => {
  it('should parse up and down files', () => {
    expect(parseMigrationFilename('001_create_blotter_tables.sql')).toEqual({
      version: 1,
      direction: 'up',
      baseName: '001_create_blotter_tables',
    });
    expect(parseMigrationFilename('012_add_notes.down.sql')).toEqual({
      version: 12,
      direction: 'down',
      baseName: '012_add_notes',
    });
  });

  it('should ignore other files', () => {
    expect(parseMigrationFilename('README.md')).toBeNull();
    expect(parseMigrationFilename('create_tables.sql')).toBeNull();
  });
});

describe('readMigrationFiles', () => {
  it('should find the bundled schema migration in both directions', async () => {
    expect((await readMigrationFiles('up')).map((file) => file.filename)).toEqual(['001_create_blotter_tables.sql']);
    expect((await readMigrationFiles('down')).map((file) => file.filename)).toEqual([
      '001_create_blotter_tables.down.sql',
    ]);
  });

  it('should store parsed incident fields without a length limit', async () => {
    const [schema] = await readMigrationFiles('up');
    const sql = await readFile(schema?.path ?? '', 'utf-8');
    const columnType = (table: string, column: string): string | undefined => {
      const body = new RegExp(`CREATE TABLE IF NOT EXISTS ${table} \\(([\\s\\S]*?)\\n\\);`).exec(sql)?.[1] ?? '';
      return new RegExp(`^\\s*${column} (\\w+)`, 'm').exec(body)?.[1];
    };

    for (const column of ['cfs_number', 'date', 'time', 'incident_type', 'location', 'details', 'county', 'officer']) {
      expect(columnType('records', column), column).toBe('TEXT');
    }
    expect(columnType('command_logs', 'timestamp')).toBe('TEXT');
    expect(columnType('command_logs', 'officer')).toBe('TEXT');
  });
});

describe('migration runner', () => {
  let migrationsDir: string;

  beforeEach(async () => {
    migrationsDir = await mkdtemp(join(tmpdir(), 'blotter-migrations-'));
    await writeFile(join(migrationsDir, '001_a.sql'), CREATE_A);
    await writeFile(join(migrationsDir, '002_b.sql'), CREATE_B);
    await writeFile(join(migrationsDir, '002_b.down.sql'), 'DROP TABLE b;');
  });

  afterEach(async () => {
    await rm(migrationsDir, { recursive: true, force: true });
  });

  describe('migrateUp', () => {
    it('should apply pending migrations in version order, each in a transaction', async () => {
      const db = createFakePool();

      const result = await migrateUp(db.pool, { migrationsDir, logger });

      expect(result.success).toBe(true);
      expect(result.applied.map((migration) => migration.migrationName)).toEqual(['001_a.sql', '002_b.sql']);
      expect(db.clientStatements.map((statement) => statement.sql)).toEqual([
        'BEGIN',
        CREATE_A,
        'COMMIT',
        'BEGIN',
        CREATE_B,
        'COMMIT',
      ]);
      expect(db.recorded.map((values) => values.slice(0, 4))).toEqual([
        ['001_a.sql', 1, 'up', calculateChecksum(CREATE_A)],
        ['002_b.sql', 2, 'up', calculateChecksum(CREATE_B)],
      ]);
    });

    it('should skip versions already applied', async () => {
      const db = createFakePool([{ migration_name: '001_a.sql', version: 1, checksum: calculateChecksum(CREATE_A) }]);

      const result = await migrateUp(db.pool, { migrationsDir, logger });

      expect(result.applied.map((migration) => migration.migrationName)).toEqual(['002_b.sql']);
    });

    it('should stop at the first failure and record it', async () => {
      await writeFile(join(migrationsDir, '002_b.sql'), 'FAIL;');
      await writeFile(join(migrationsDir, '003_c.sql'), 'CREATE TABLE c ();');
      const db = createFakePool();

      const result = await migrateUp(db.pool, { migrationsDir, logger });

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['002_b.sql: syntax error at or near "FAIL"']);
      expect(result.applied.map((migration) => [migration.migrationName, migration.success])).toEqual([
        ['001_a.sql', true],
        ['002_b.sql', false],
      ]);
      expect(db.clientStatements.at(-1)?.sql).toBe('ROLLBACK');
      expect(db.recorded.at(-1)?.slice(5)).toEqual([false, 'syntax error at or near "FAIL"']);
      expect(db.client.release).toHaveBeenCalledTimes(2);
    });

    it('should refuse to run when an applied file changed', async () => {
      const db = createFakePool([{ migration_name: '001_a.sql', version: 1, checksum: 'stale' }]);

      const result = await migrateUp(db.pool, { migrationsDir, logger });

      expect(result).toMatchObject({ success: false, applied: [], errors: ['001_a.sql: checksum changed since it was applied'] });
      expect(db.connect).not.toHaveBeenCalled();
    });

    it('should run anyway with force', async () => {
      const db = createFakePool([{ migration_name: '001_a.sql', version: 1, checksum: 'stale' }]);

      const result = await migrateUp(db.pool, { migrationsDir, logger, force: true });

      expect(result.success).toBe(true);
      expect(result.applied.map((migration) => migration.migrationName)).toEqual(['002_b.sql']);
    });

    it('should honour target version and dry run', async () => {
      const db = createFakePool();

      const result = await migrateUp(db.pool, { migrationsDir, logger, targetVersion: 1, dryRun: true });

      expect(result.applied.map((migration) => migration.migrationName)).toEqual(['001_a.sql']);
      expect(db.connect).not.toHaveBeenCalled();
      expect(db.recorded).toEqual([]);
    });
  });

  describe('migrateDown', () => {
    it('should roll back the newest applied migration and remove its record', async () => {
      const db = createFakePool([
        { migration_name: '001_a.sql', version: 1, checksum: calculateChecksum(CREATE_A) },
        { migration_name: '002_b.sql', version: 2, checksum: calculateChecksum(CREATE_B) },
      ]);

      const result = await migrateDown(db.pool, { migrationsDir, logger });

      expect(result.applied.map((migration) => migration.migrationName)).toEqual(['002_b.down.sql']);
      expect(db.clientStatements.map((statement) => statement.values)).toEqual([[], [], ['002_b.sql'], []]);
      expect(db.clientStatements[1]?.sql).toBe('DROP TABLE b;');
      expect(db.recorded).toEqual([]);
    });

    it('should do nothing when no applied migration has a down file', async () => {
      const db = createFakePool([{ migration_name: '001_a.sql', version: 1, checksum: calculateChecksum(CREATE_A) }]);

      const result = await migrateDown(db.pool, { migrationsDir, logger });

      expect(result).toMatchObject({ success: true, applied: [], errors: [] });
    });
  });
});
