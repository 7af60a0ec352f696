/**
 * Blotter Repository
 *
 * Storage seam for the batch processor. The PostgreSQL implementation writes
 * one blotter's records and command logs in a single transaction, so a
 * failure leaves no partial rows behind.
 */

import type pg from 'pg';

import type { FormatTag, ParsedIncident } from '../parsing/types.js';
import type { SourceType } from '../pdf/types.js';
import { type PoolType, withTransaction } from './client.js';
import { PersistenceError, PersistenceErrorCode } from './errors.js';
import {
  type Blotter,
  type BlotterRecord,
  type BlotterRow,
  type BlotterStatus,
  type CommandLogRow,
  type CountyCount,
  type CreateBlotterInput,
  type GetBlottersOptions,
  type GetRecordsOptions,
  type RecordRow,
  type RecordWithLogs,
  BlotterStatus as Status,
  CreateBlotterInputSchema,
  rowToBlotter,
  rowToCommandLog,
  rowToRecord,
} from './types.js';

export interface SaveIncidentsOptions {
  /** Final status written with the records (default `success`) */
  status?: Extract<BlotterStatus, 'success' | 'partial'>;
  /** Replaces the blotter's county before records copy it */
  county?: string | null;
  format?: FormatTag | null;
  /** Known only once the file has been read */
  sourceType?: SourceType | null;
  notes?: string | null;
}

export interface BlotterRepository {
  /** Insert a blotter row in `pending` (or the given) status */
  createBlotter(input: CreateBlotterInput): Promise<Blotter>;
  /**
   * Insert every incident (with its command log) and set the blotter's
   * count and status, all in one transaction
   *
   * @returns Number of records written
   * @throws {PersistenceError} After rolling back
   */
  saveParsedIncidents(blotterId: number, incidents: readonly ParsedIncident[], options?: SaveIncidentsOptions): Promise<number>;
  markBlotterFailed(blotterId: number, notes: string): Promise<void>;
  getBlotterById(id: number): Promise<Blotter | null>;
  listBlotters(options?: GetBlottersOptions): Promise<Blotter[]>;
  getRecords(options?: GetRecordsOptions): Promise<BlotterRecord[]>;
  getRecordWithLogs(id: number): Promise<RecordWithLogs | null>;
  getCountyCounts(): Promise<CountyCount[]>;
  /** Records and command logs go with it (ON DELETE CASCADE) */
  deleteBlotter(id: number): Promise<boolean>;
}

const INSERT_RECORD = `
  INSERT INTO records (
    blotter_id, position, cfs_number, date, time,
    incident_type, location, details, county, officer
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  RETURNING id
`;

const INSERT_COMMAND_LOG = `
  INSERT INTO command_logs (record_id, position, timestamp, officer, entry)
  VALUES ($1, $2, $3, $4, $5)
`;

/** Escape LIKE wildcards so user search text matches literally */
function toLikePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, '\\$&')}%`;
}

/**
 * PostgreSQL-backed repository
 *
 * @example
 * ```typescript
 * const repository = createPgBlotterRepository(getDatabasePool());
 * const blotter = await repository.createBlotter({ filename: 'gcso.pdf', county: 'Gallatin' });
 * ```
 */
export function createPgBlotterRepository(pool: PoolType): BlotterRepository {
  async function run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw PersistenceError.fromError(error, operation);
    }
  }

  async function connect(operation: string): Promise<pg.PoolClient> {
    try {
      return await pool.connect();
    } catch (error) {
      throw PersistenceError.fromError(error, operation, PersistenceErrorCode.CONNECTION_ERROR);
    }
  }

  return {
    createBlotter(input) {
      return run('createBlotter', async () => {
        const data = CreateBlotterInputSchema.parse(input);
        const result = await pool.query<BlotterRow>(
          `INSERT INTO blotters (filename, county, status, file_path, source_type, format, notes)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           RETURNING *`,
          [
            data.filename,
            data.county,
            data.status ?? Status.PENDING,
            data.filePath ?? null,
            data.sourceType ?? null,
            data.format ?? null,
            data.notes ?? null,
          ]
        );

        const row = result.rows[0];
        if (!row) {
          throw new Error('INSERT returned no row');
        }
        return rowToBlotter(row);
      });
    },

    async saveParsedIncidents(blotterId, incidents, options = {}) {
      const operation = 'saveParsedIncidents';
      const client = await connect(operation);

      try {
        return await withTransaction(client, async () => {
          const blotter = await client.query<Pick<BlotterRow, 'county'>>(
            `UPDATE blotters
             SET county = COALESCE($2, county), format = COALESCE($3, format),
                 source_type = COALESCE($4, source_type)
             WHERE id = $1
             RETURNING county`,
            [blotterId, options.county ?? null, options.format ?? null, options.sourceType ?? null]
          );
          const county = blotter.rows[0]?.county;
          if (county === undefined) {
            throw new PersistenceError(`Blotter ${blotterId} not found`, PersistenceErrorCode.NOT_FOUND, operation);
          }

          for (const [position, incident] of incidents.entries()) {
            const inserted = await client.query<Pick<RecordRow, 'id'>>(INSERT_RECORD, [
              blotterId,
              position,
              incident.cfsNumber,
              incident.date,
              incident.time,
              incident.incidentType,
              incident.location,
              incident.details,
              county,
              incident.officer,
            ]);

            const recordId = inserted.rows[0]?.id;
            if (recordId === undefined) {
              throw new Error(`INSERT returned no id for incident ${position}`);
            }

            for (const [logPosition, log] of incident.commandLogs.entries()) {
              await client.query(INSERT_COMMAND_LOG, [recordId, logPosition, log.timestamp, log.officer, log.entry]);
            }
          }

          await client.query(
            `UPDATE blotters SET incident_count = $2, status = $3, notes = COALESCE($4, notes) WHERE id = $1`,
            [blotterId, incidents.length, options.status ?? Status.SUCCESS, options.notes ?? null]
          );

          return incidents.length;
        });
      } catch (error) {
        throw PersistenceError.fromError(error, operation);
      }
    },

    markBlotterFailed(blotterId, notes) {
      return run('markBlotterFailed', async () => {
        await pool.query(`UPDATE blotters SET status = $2, incident_count = 0, notes = $3 WHERE id = $1`, [
          blotterId,
          Status.FAILED,
          notes,
        ]);
      });
    },

    getBlotterById(id) {
      return run('getBlotterById', async () => {
        const result = await pool.query<BlotterRow>('SELECT * FROM blotters WHERE id = $1', [id]);
        const row = result.rows[0];
        return row ? rowToBlotter(row) : null;
      });
    },

    listBlotters(options = {}) {
      return run('listBlotters', async () => {
        const conditions: string[] = [];
        const values: (string | number)[] = [];
        let paramIndex = 1;

        if (options.county !== undefined) {
          conditions.push(`county = $${paramIndex++}`);
          values.push(options.county);
        }

        if (options.status !== undefined) {
          conditions.push(`status = $${paramIndex++}`);
          values.push(options.status);
        }

        const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        values.push(options.limit ?? 50, options.offset ?? 0);

        const result = await pool.query<BlotterRow>(
          `SELECT * FROM blotters ${whereClause}
           ORDER BY upload_date DESC, id DESC
           LIMIT $${paramIndex++} OFFSET $${paramIndex}`,
          values
        );
        return result.rows.map(rowToBlotter);
      });
    },

    getRecords(options = {}) {
      return run('getRecords', async () => {
        const conditions: string[] = [];
        const values: (string | number)[] = [];
        let paramIndex = 1;

        if (options.blotterId !== undefined) {
          conditions.push(`blotter_id = $${paramIndex++}`);
          values.push(options.blotterId);
        }

        if (options.county !== undefined) {
          conditions.push(`county = $${paramIndex++}`);
          values.push(options.county);
        }

        if (options.search) {
          const param = `$${paramIndex++}`;
          conditions.push(`(incident_type ILIKE ${param} OR location ILIKE ${param} OR details ILIKE ${param})`);
          values.push(toLikePattern(options.search));
        }

        const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        values.push(options.limit ?? 100, options.offset ?? 0);

        const result = await pool.query<RecordRow>(
          `SELECT * FROM records ${whereClause}
           ORDER BY blotter_id DESC, position ASC
           LIMIT $${paramIndex++} OFFSET $${paramIndex}`,
          values
        );
        return result.rows.map(rowToRecord);
      });
    },

    getRecordWithLogs(id) {
      return run('getRecordWithLogs', async () => {
        const record = await pool.query<RecordRow>('SELECT * FROM records WHERE id = $1', [id]);
        const row = record.rows[0];
        if (!row) {
          return null;
        }

        const logs = await pool.query<CommandLogRow>(
          'SELECT * FROM command_logs WHERE record_id = $1 ORDER BY position ASC',
          [id]
        );
        return { ...rowToRecord(row), commandLogs: logs.rows.map(rowToCommandLog) };
      });
    },

    getCountyCounts() {
      return run('getCountyCounts', async () => {
        const result = await pool.query<{ county: string; record_count: number }>(
          `SELECT county, COUNT(*)::int AS record_count FROM records GROUP BY county ORDER BY county`
        );
        return result.rows.map((row) => ({ county: row.county, recordCount: row.record_count }));
      });
    },

    deleteBlotter(id) {
      return run('deleteBlotter', async () => {
        const result = await pool.query('DELETE FROM blotters WHERE id = $1', [id]);
        return (result.rowCount ?? 0) > 0;
      });
    },
  };
}
