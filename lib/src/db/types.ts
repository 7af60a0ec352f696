/**
 * Database Types
 *
 * Entities for ingested blotters, their incident records and each record's
 * command log. Domain objects are camelCase; rows mirror the PostgreSQL
 * columns.
 */

import { z } from 'zod';
import { SourceTypeSchema, type SourceType } from '../pdf/types.js';
import { FormatTagSchema, type FormatTag } from '../parsing/types.js';

/**
 * Processing status of one ingested blotter
 */
export const BlotterStatus = {
  PENDING: 'pending',
  SUCCESS: 'success',
  /** Incidents were stored but the text may be incomplete */
  PARTIAL: 'partial',
  FAILED: 'failed',
} as const;

export type BlotterStatus = (typeof BlotterStatus)[keyof typeof BlotterStatus];

export const BlotterStatusSchema = z.enum(['pending', 'success', 'partial', 'failed']);

// =============================================================================
// Blotters
// =============================================================================

export const BlotterSchema = z.object({
  id: z.number().int().positive(),
  filename: z.string().min(1),
  county: z.string().min(1),
  uploadDate: z.date(),
  status: BlotterStatusSchema,
  incidentCount: z.number().int().nonnegative(),
  filePath: z.string().nullable(),
  sourceType: SourceTypeSchema.nullable(),
  format: FormatTagSchema.nullable(),
  notes: z.string().nullable(),
});

export type Blotter = z.infer<typeof BlotterSchema>;

export const CreateBlotterInputSchema = z.object({
  filename: z.string().min(1),
  county: z.string().min(1),
  filePath: z.string().nullable().optional(),
  sourceType: SourceTypeSchema.nullable().optional(),
  format: FormatTagSchema.nullable().optional(),
  status: BlotterStatusSchema.optional(),
  notes: z.string().nullable().optional(),
});

export type CreateBlotterInput = z.infer<typeof CreateBlotterInputSchema>;

export interface BlotterRow {
  id: number;
  filename: string;
  county: string;
  upload_date: Date;
  status: BlotterStatus;
  incident_count: number;
  file_path: string | null;
  source_type: SourceType | null;
  format: FormatTag | null;
  notes: string | null;
}

export function rowToBlotter(row: BlotterRow): Blotter {
  return {
    id: row.id,
    filename: row.filename,
    county: row.county,
    uploadDate: row.upload_date,
    status: row.status,
    incidentCount: row.incident_count,
    filePath: row.file_path,
    sourceType: row.source_type,
    format: row.format,
    notes: row.notes,
  };
}

export interface GetBlottersOptions {
  county?: string;
  status?: BlotterStatus;
  /** Maximum number of blotters to return (default 50) */
  limit?: number;
  offset?: number;
}

// =============================================================================
// Records
// =============================================================================

/**
 * One stored incident. `county` always equals the parent blotter's county.
 */
export interface BlotterRecord {
  id: number;
  blotterId: number;
  /** 0-based document order within the blotter */
  position: number;
  cfsNumber: string | null;
  date: string | null;
  time: string | null;
  incidentType: string | null;
  location: string | null;
  details: string | null;
  county: string;
  officer: string | null;
  createdAt: Date;
}

export interface RecordRow {
  id: number;
  blotter_id: number;
  position: number;
  cfs_number: string | null;
  date: string | null;
  time: string | null;
  incident_type: string | null;
  location: string | null;
  details: string | null;
  county: string;
  officer: string | null;
  created_at: Date;
}

export function rowToRecord(row: RecordRow): BlotterRecord {
  return {
    id: row.id,
    blotterId: row.blotter_id,
    position: row.position,
    cfsNumber: row.cfs_number,
    date: row.date,
    time: row.time,
    incidentType: row.incident_type,
    location: row.location,
    details: row.details,
    county: row.county,
    officer: row.officer,
    createdAt: row.created_at,
  };
}

export interface GetRecordsOptions {
  blotterId?: number;
  county?: string;
  /** Case-insensitive match against type, location and details */
  search?: string;
  /** Maximum number of records to return (default 100) */
  limit?: number;
  offset?: number;
}

// =============================================================================
// Command Logs
// =============================================================================

export interface StoredCommandLog {
  id: number;
  recordId: number;
  /** Narrative order within the record */
  position: number;
  timestamp: string;
  officer: string | null;
  entry: string;
  createdAt: Date;
}

export interface CommandLogRow {
  id: number;
  record_id: number;
  position: number;
  timestamp: string;
  officer: string | null;
  entry: string;
  created_at: Date;
}

export function rowToCommandLog(row: CommandLogRow): StoredCommandLog {
  return {
    id: row.id,
    recordId: row.record_id,
    position: row.position,
    timestamp: row.timestamp,
    officer: row.officer,
    entry: row.entry,
    createdAt: row.created_at,
  };
}

export interface RecordWithLogs extends BlotterRecord {
  commandLogs: StoredCommandLog[];
}

export interface CountyCount {
  county: string;
  recordCount: number;
}
