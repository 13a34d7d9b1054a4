import * as searchRepo from './search.repository';
import { formatKey, jobRecordKey, type JobRecordKey } from './search.repository';
import type { JobRecord, RunMode } from './search.schemas';
import { createRunLock } from './search.job-scheduler';
import { ConcurrentModificationError, errorMessage } from '../../shared/errors';
import { logger } from '../../shared/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Storage seam for job records; the PostgreSQL repository in production. */
export interface JobRecordStore {
  getLatest(key: JobRecordKey): Promise<JobRecord | null>;
  insert(key: JobRecordKey, record: JobRecord): Promise<JobRecord>;
  update(key: JobRecordKey, record: JobRecord, expectedTimestamp: number): Promise<JobRecord>;
}

export type JobRecordDraft = Omit<JobRecord, 'timestamp'>;

export interface JobRecordUpdateOptions {
  /** Record to start from when the key has never been written. */
  seed?: () => JobRecordDraft;
}

/**
 * Single in-process owner of every job record key.
 *
 * Read-modify-write cycles on the same key run one at a time, each write is
 * a CAS against the timestamp this tracker last saw, and every new
 * timestamp is strictly greater than the previous one. Methods resolve to
 * null when a write lost a race with a writer outside this process.
 */
export interface JobRecordTracker {
  read(key: JobRecordKey): Promise<JobRecord | null>;
  reset(key: JobRecordKey, draft: JobRecordDraft): Promise<JobRecord | null>;
  update(
    key: JobRecordKey,
    mutate: (record: JobRecord) => JobRecord,
    options?: JobRecordUpdateOptions,
  ): Promise<JobRecord | null>;
}

export type IndexFailureReporter = (context: string, reason: string) => Promise<void>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const pgJobRecordStore: JobRecordStore = {
  getLatest: (key) => searchRepo.getLatestJobRecord(key),
  insert: (key, record) => searchRepo.insertJobRecord(key, record),
  update: (key, record, expectedTimestamp) =>
    searchRepo.updateJobRecord(key, record, expectedTimestamp),
};

export function emptyJobRecord(mode: RunMode): JobRecordDraft {
  return {
    runMode: mode,
    status: 'STARTING',
    startTime: null,
    endTime: null,
    entities: [],
    stats: { total: 0, success: 0, failed: 0 },
    failureDetails: null,
    startedBy: null,
    batchSize: 100,
    flushIntervalSeconds: 2,
    recreateIndex: false,
  };
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

export function createJobRecordTracker(
  store: JobRecordStore = pgJobRecordStore,
  clock: () => number = Date.now,
): JobRecordTracker {
  const lock = createRunLock();
  const cache = new Map<string, JobRecord>();

  function serialise<T>(key: JobRecordKey, task: () => Promise<T>): Promise<T> {
    return lock.run(formatKey(key), task);
  }

  function nextTimestamp(previous: number | undefined): number {
    const now = clock();
    return previous !== undefined && now <= previous ? previous + 1 : now;
  }

  async function current(key: JobRecordKey): Promise<JobRecord | null> {
    const id = formatKey(key);
    const cached = cache.get(id);
    if (cached) return cached;

    const stored = await store.getLatest(key);
    if (stored) cache.set(id, stored);
    return stored;
  }

  async function write(
    key: JobRecordKey,
    previous: JobRecord | null,
    draft: JobRecordDraft,
  ): Promise<JobRecord | null> {
    const id = formatKey(key);
    const record: JobRecord = { ...draft, timestamp: nextTimestamp(previous?.timestamp) };

    try {
      const saved = previous
        ? await store.update(key, record, previous.timestamp)
        : await store.insert(key, record);
      cache.set(id, saved);
      return saved;
    } catch (err) {
      if (err instanceof ConcurrentModificationError) {
        // Next cycle re-reads whatever the other writer stored
        cache.delete(id);
        logger.warn('JobRecordTracker: update lost a concurrent write, record left as stored', {
          key: id,
          error: err.message,
        });
        return null;
      }
      throw err;
    }
  }

  return {
    read(key) {
      return serialise(key, async () => {
        const stored = await store.getLatest(key);
        if (stored) cache.set(formatKey(key), stored);
        return stored;
      });
    },

    reset(key, draft) {
      return serialise(key, async () => write(key, await current(key), draft));
    },

    update(key, mutate, options = {}) {
      return serialise(key, async () => {
        const previous = await current(key);
        const base = previous ?? (options.seed ? { ...options.seed(), timestamp: 0 } : null);
        if (!base) {
          logger.debug('JobRecordTracker: no record to update', { key: formatKey(key) });
          return null;
        }
        const { timestamp: _ignored, ...draft } = mutate(base);
        return write(key, previous, draft);
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Index failure channel
// ---------------------------------------------------------------------------

/**
 * Index lifecycle failures all land on the streaming job record so there is
 * one place to check index health. Recording is best-effort.
 */
export function createIndexFailureReporter(
  tracker: JobRecordTracker,
  clock: () => number = Date.now,
): IndexFailureReporter {
  const key = jobRecordKey('STREAM');

  return async (context, reason) => {
    try {
      await tracker.update(
        key,
        (record) => ({
          ...record,
          status: 'ACTIVEWITHERROR',
          failureDetails: { context, lastFailedAt: clock(), lastFailedReason: reason },
        }),
        { seed: () => emptyJobRecord('STREAM') },
      );
    } catch (err) {
      logger.error('IndexFailureReporter: could not record index failure', {
        context,
        error: errorMessage(err),
      });
    }
  };
}
