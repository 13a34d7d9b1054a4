import type { Client } from '@opensearch-project/opensearch';

import type { IndexKind } from './mappings/index-kinds';
import {
  createBulkListener,
  createBulkProcessor,
  type BulkProcessorDeps,
} from './search.bulk-processor';
import type { DocumentBuilderRegistry, SearchDocument } from './search.document-builders';
import type { CatalogEntity, EntityPage, EntitySource } from './search.entity-source';
import type { IndexLifecycleManager, IndexStatuses } from './search.index-lifecycle';
import type { JobRecordTracker } from './search.job-records';
import { createRunLock, type Dispatch, type JobScheduler, type RunLock } from './search.job-scheduler';
import { jobRecordKey, type JobRecordKey } from './search.repository';
import type { FailureDetails, JobRecord, JobStats, ReindexRequest, RunMode } from './search.schemas';
import { NotFoundError, RemoteIOError, errorMessage } from '../../shared/errors';
import { logger } from '../../shared/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReindexAccepted {
  message: string;
  dispatch: Dispatch;
}

export interface ReindexServiceDeps {
  client: Client;
  lifecycle: IndexLifecycleManager;
  tracker: JobRecordTracker;
  entitySource: EntitySource;
  builders: DocumentBuilderRegistry;
  scheduler: JobScheduler;
  runLock?: RunLock;
  clock?: () => number;
  bulk?: BulkProcessorDeps;
}

export interface ReindexService {
  /** Hands the job to the worker pool and returns once it is dispatched. */
  submit(request: ReindexRequest, startedBy: string): Promise<ReindexAccepted>;
  /** Job body; runs under the per-mode run lock. */
  run(request: ReindexRequest, startedBy: string): Promise<void>;
  lastStatus(mode: RunMode): Promise<JobRecord>;
  indexStatuses(): IndexStatuses;
  reconcileIndexes(): Promise<IndexStatuses>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TEAM_FIELDS = ['name', 'displayName'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drops profiler output from a table and its columns before indexing. */
export function stripTableProfile(entity: CatalogEntity): CatalogEntity {
  const { profile: _profile, ...rest } = entity;
  if (Array.isArray(rest.columns)) {
    rest.columns = rest.columns.map((column: unknown) => {
      if (!isRecord(column)) return column;
      const { profile: _columnProfile, ...columnRest } = column;
      return columnRest;
    });
  }
  return rest;
}

function entityLabel(entity: CatalogEntity): string {
  const label = entity.fullyQualifiedName ?? entity.name ?? entity.id;
  return typeof label === 'string' ? label : 'unknown';
}

function statusFor(failure: FailureDetails | null): JobRecord['status'] {
  return failure ? 'ACTIVEWITHERROR' : 'ACTIVE';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createReindexService(deps: ReindexServiceDeps): ReindexService {
  const { client, lifecycle, tracker, entitySource, builders, scheduler } = deps;
  const runLock = deps.runLock ?? createRunLock();
  const clock = deps.clock ?? Date.now;

  function failure(context: string, err: unknown): FailureDetails {
    return { context, lastFailedAt: clock(), lastFailedReason: errorMessage(err) };
  }

  /** Job record writes never end a kind's loop; a failed write is logged and the job moves on. */
  async function saveProgress(entityType: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (err) {
      logger.error('ReindexService: job record update failed', {
        entityType,
        error: errorMessage(err),
      });
    }
  }

  function buildDocument(kind: IndexKind, entityType: string, entity: CatalogEntity): SearchDocument {
    return builders.build(entityType, kind === 'table' ? stripTableProfile(entity) : entity);
  }

  /** Drops the index first when a clean rebuild is requested. */
  async function prepareIndex(kind: IndexKind, recreate: boolean): Promise<string> {
    if (recreate) {
      await lifecycle.dropIndex(kind);
    }
    const indexName = lifecycle.indexNameFor(kind);
    if (!(await lifecycle.ensureIndex(kind))) {
      throw new RemoteIOError(`Index ${indexName} is not available`);
    }
    return indexName;
  }

  async function forEachPage(
    entityType: string,
    pageSize: number,
    handle: (page: EntityPage) => Promise<void>,
  ): Promise<void> {
    const fields =
      entityType.toLowerCase() === 'team' ? TEAM_FIELDS : entitySource.allowedFields(entityType);
    let after: string | null = null;
    do {
      const page: EntityPage = await entitySource.listAfter(entityType, {
        fields,
        include: 'all',
        limit: pageSize,
        after,
      });
      await handle(page);
      after = page.paging.after;
    } while (after);
  }

  // -------------------------------------------------------------------------
  // Batch
  // -------------------------------------------------------------------------

  async function runBatch(key: JobRecordKey, request: ReindexRequest): Promise<void> {
    const listener = createBulkListener(clock);
    const processor = createBulkProcessor(
      client,
      listener,
      { batchSize: request.batchSize, flushIntervalMs: request.flushIntervalSeconds * 1000 },
      deps.bulk,
    );

    try {
      for (const entityType of request.entities) {
        listener.allowTotalRequestUpdate();
        try {
          const kind = lifecycle.indexKindFor(entityType);
          const index = await prepareIndex(kind, request.recreateIndex);

          await forEachPage(entityType, request.batchSize, async (page) => {
            listener.addRequests(page.paging.total);
            for (const entity of page.data) {
              let doc: SearchDocument;
              try {
                doc = buildDocument(kind, entityType, entity);
              } catch (err) {
                logger.warn('ReindexService: skipping entity that could not be built', {
                  entityType,
                  entity: entityLabel(entity),
                  error: errorMessage(err),
                });
                listener.recordSkipped(`Building ${entityType} ${entityLabel(entity)}`, errorMessage(err));
                continue;
              }
              await processor.add({ index, id: doc.id, doc });
            }
            await processor.flush();
          });
        } catch (err) {
          logger.error('ReindexService: reindexing entity type failed', {
            entityType,
            error: errorMessage(err),
          });
          listener.recordFailure(`Reindexing ${entityType}`, errorMessage(err));
        }

        const stats = listener.getStats();
        const lastFailure = listener.getLastFailure();
        await saveProgress(entityType, () =>
          tracker.update(key, (record) => {
            const failureDetails = lastFailure ?? record.failureDetails;
            return { ...record, stats, failureDetails, status: statusFor(failureDetails) };
          }),
        );
      }
    } finally {
      await processor.close();
    }
  }

  // -------------------------------------------------------------------------
  // Stream
  // -------------------------------------------------------------------------

  async function runStream(key: JobRecordKey, request: ReindexRequest): Promise<void> {
    const stats: JobStats = { total: 0, success: 0, failed: 0 };

    function record(entityType: string, failureDetails: FailureDetails | null): Promise<void> {
      const snapshot = { ...stats };
      return saveProgress(entityType, () =>
        tracker.update(key, (current) => {
          const latest = failureDetails ?? current.failureDetails;
          return { ...current, stats: snapshot, failureDetails: latest, status: statusFor(latest) };
        }),
      );
    }

    for (const entityType of request.entities) {
      try {
        const kind = lifecycle.indexKindFor(entityType);
        const index = await prepareIndex(kind, request.recreateIndex);
        let countTotal = true;

        await forEachPage(entityType, request.batchSize, async (page) => {
          if (countTotal) {
            stats.total += page.paging.total;
            countTotal = false;
          }
          for (const entity of page.data) {
            let failed: FailureDetails | null = null;
            try {
              const doc = buildDocument(kind, entityType, entity);
              await client.update({ index, id: doc.id, body: { doc, doc_as_upsert: true } });
              stats.success += 1;
            } catch (err) {
              stats.failed += 1;
              failed = failure(`Reindexing ${entityType} ${entityLabel(entity)}`, err);
              logger.warn('ReindexService: document write failed', {
                entityType,
                entity: entityLabel(entity),
                error: errorMessage(err),
              });
            }
            await record(entityType, failed);
          }
        });
      } catch (err) {
        logger.error('ReindexService: reindexing entity type failed', {
          entityType,
          error: errorMessage(err),
        });
        await record(entityType, failure(`Reindexing ${entityType}`, err));
      }
    }
  }

  // -------------------------------------------------------------------------
  // Job
  // -------------------------------------------------------------------------

  async function execute(request: ReindexRequest, startedBy: string): Promise<void> {
    const key = jobRecordKey(request.runMode);
    const startedAt = clock();

    logger.info('ReindexService: job started', {
      runMode: request.runMode,
      entities: request.entities,
      startedBy,
    });

    await tracker.reset(key, {
      runMode: request.runMode,
      status: 'STARTING',
      startTime: startedAt,
      endTime: null,
      entities: request.entities,
      stats: { total: 0, success: 0, failed: 0 },
      failureDetails: null,
      startedBy,
      batchSize: request.batchSize,
      flushIntervalSeconds: request.flushIntervalSeconds,
      recreateIndex: request.recreateIndex,
    });

    try {
      if (request.runMode === 'BATCH') {
        await runBatch(key, request);
      } else {
        await runStream(key, request);
      }
    } finally {
      await finish(key, request.runMode, startedAt);
    }
  }

  /** Stamps the end time so the record never stays mid-run. */
  async function finish(key: JobRecordKey, runMode: RunMode, startedAt: number): Promise<void> {
    try {
      const finished = await tracker.update(key, (record) => ({
        ...record,
        endTime: clock(),
        status: statusFor(record.failureDetails),
      }));

      logger.info('ReindexService: job finished', {
        runMode,
        status: finished?.status,
        stats: finished?.stats,
        durationMs: clock() - startedAt,
      });
    } catch (err) {
      logger.error('ReindexService: could not finalize job record', {
        runMode,
        error: errorMessage(err),
      });
    }
  }

  return {
    async submit(request, startedBy) {
      const dispatch = await scheduler.submit(`reindex:${request.runMode}`, () =>
        runLock.run(request.runMode, () => execute(request, startedBy)),
      );
      return { message: 'Reindexing started', dispatch };
    },

    run(request, startedBy) {
      return runLock.run(request.runMode, () => execute(request, startedBy));
    },

    async lastStatus(mode) {
      const record = await tracker.read(jobRecordKey(mode));
      if (!record) {
        throw new NotFoundError('No last run');
      }
      return record;
    },

    indexStatuses() {
      return lifecycle.getStatuses();
    },

    reconcileIndexes() {
      return lifecycle.reconcileAll();
    },
  };
}
