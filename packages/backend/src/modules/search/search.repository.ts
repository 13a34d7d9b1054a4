import { type PoolClient } from 'pg';

import { exec } from '../../shared/db';
import { ConcurrentModificationError, RemoteIOError } from '../../shared/errors';
import { jobRecordSchema, type JobRecord, type RunMode } from './search.schemas';

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

export interface JobRecordKey {
  entityFqn: string;
  extension: string;
}

export const JOB_RECORD_EXTENSION = 'service.reindexJob';

/** Batch and stream runs occupy independent keys. */
export function jobRecordKey(mode: RunMode): JobRecordKey {
  return { entityFqn: `reindexJob:search:${mode}`, extension: JOB_RECORD_EXTENSION };
}

export function formatKey(key: JobRecordKey): string {
  return `${key.entityFqn}/${key.extension}`;
}

// ---------------------------------------------------------------------------
// Private row interface (snake_case, matches DB columns)
// ---------------------------------------------------------------------------

interface JobRecordRow {
  entity_fqn: string;
  extension: string;
  json: unknown;
  // BIGINT arrives as a string from pg
  timestamp: string | number;
}

// ---------------------------------------------------------------------------
// Row → domain mapper
// ---------------------------------------------------------------------------

function toJobRecord(row: JobRecordRow): JobRecord {
  const parsed = jobRecordSchema.safeParse(row.json);
  if (!parsed.success) {
    throw new RemoteIOError(
      `Stored job record ${row.entity_fqn}/${row.extension} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  // The column is authoritative for the CAS token
  return { ...parsed.data, timestamp: Number(row.timestamp) };
}

const JOB_RECORD_COLUMNS = 'entity_fqn, extension, json, timestamp';

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/** Reads the record stored for a key at exactly the given timestamp. */
export async function getJobRecord(
  key: JobRecordKey,
  timestamp: number,
  client?: PoolClient,
): Promise<JobRecord | null> {
  const result = await exec<JobRecordRow>(
    `SELECT ${JOB_RECORD_COLUMNS} FROM entity_extension_time_series
     WHERE entity_fqn = $1 AND extension = $2 AND timestamp = $3`,
    [key.entityFqn, key.extension, timestamp],
    client,
  );
  return result.rows[0] ? toJobRecord(result.rows[0]) : null;
}

export async function getLatestJobRecord(
  key: JobRecordKey,
  client?: PoolClient,
): Promise<JobRecord | null> {
  const result = await exec<JobRecordRow>(
    `SELECT ${JOB_RECORD_COLUMNS} FROM entity_extension_time_series
     WHERE entity_fqn = $1 AND extension = $2
     ORDER BY timestamp DESC
     LIMIT 1`,
    [key.entityFqn, key.extension],
    client,
  );
  return result.rows[0] ? toJobRecord(result.rows[0]) : null;
}

/**
 * Creates the record for a key. Throws ConcurrentModificationError when
 * another writer created it first.
 */
export async function insertJobRecord(
  key: JobRecordKey,
  record: JobRecord,
  client?: PoolClient,
): Promise<JobRecord> {
  const result = await exec<JobRecordRow>(
    `INSERT INTO entity_extension_time_series (entity_fqn, extension, json, timestamp)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (entity_fqn, extension) DO NOTHING
     RETURNING ${JOB_RECORD_COLUMNS}`,
    [key.entityFqn, key.extension, JSON.stringify(record), record.timestamp],
    client,
  );
  if (!result.rows[0]) {
    throw new ConcurrentModificationError(`Job record ${formatKey(key)} already exists`);
  }
  return toJobRecord(result.rows[0]);
}

/**
 * Compare-and-swap write: replaces the stored record only while its
 * timestamp still equals `expectedTimestamp`. A mismatch leaves the row
 * untouched and throws ConcurrentModificationError.
 */
export async function updateJobRecord(
  key: JobRecordKey,
  record: JobRecord,
  expectedTimestamp: number,
  client?: PoolClient,
): Promise<JobRecord> {
  const result = await exec<JobRecordRow>(
    `UPDATE entity_extension_time_series
     SET json = $3, timestamp = $4
     WHERE entity_fqn = $1 AND extension = $2 AND timestamp = $5
     RETURNING ${JOB_RECORD_COLUMNS}`,
    [key.entityFqn, key.extension, JSON.stringify(record), record.timestamp, expectedTimestamp],
    client,
  );
  if (!result.rows[0]) {
    throw new ConcurrentModificationError(
      `Job record ${formatKey(key)} changed since timestamp ${expectedTimestamp}`,
    );
  }
  return toJobRecord(result.rows[0]);
}
