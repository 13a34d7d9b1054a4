import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Client } from '@opensearch-project/opensearch';
import { createReindexService, stripTableProfile } from './search.service';
import { createDocumentBuilderRegistry } from './search.document-builders';
import type { CatalogEntity, EntityPage, EntitySource, ListOptions } from './search.entity-source';
import { createIndexLifecycleManager, type IndexLifecycleManager } from './search.index-lifecycle';
import {
  createIndexFailureReporter,
  createJobRecordTracker,
  emptyJobRecord,
  type JobRecordTracker,
} from './search.job-records';
import { createJobScheduler, type JobScheduler } from './search.job-scheduler';
import { jobRecordKey } from './search.repository';
import type { ReindexRequest } from './search.schemas';
import type { MappingTemplate } from './mappings/index-kinds';
import { NotFoundError, RemoteIOError } from '../../shared/errors';
import { MemoryJobRecordStore } from '../../../tests/helpers/memory-job-record-store';

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const template: MappingTemplate = { mappings: { properties: { name: { type: 'text' } } } };

function createFakeClient() {
  const indices = {
    exists: vi.fn().mockResolvedValue({ body: false }),
    create: vi.fn().mockResolvedValue({ body: { acknowledged: true } }),
    putMapping: vi.fn().mockResolvedValue({ body: { acknowledged: true } }),
    delete: vi.fn().mockResolvedValue({ body: { acknowledged: true } }),
  };
  const bulk = vi.fn(async ({ body }: { body: unknown[] }): Promise<{ body: unknown }> => ({
    body: {
      errors: false,
      items: Array.from({ length: body.length / 2 }, (_, i) => ({ update: { _id: String(i), status: 200 } })),
    },
  }));
  const update = vi.fn().mockResolvedValue({ body: { result: 'updated' } });
  return { indices, bulk, update, client: { indices, bulk, update } as unknown as Client };
}

function tableEntity(id: string, extra: Record<string, unknown> = {}): CatalogEntity {
  return { id, name: `t${id}`, fullyQualifiedName: `svc.t${id}`, ...extra };
}

/** Serves fixed pages per entity type; the cursor is the next page number. */
function createPagedSource(pages: Record<string, CatalogEntity[][]>) {
  const listAfter = vi.fn(async (entityType: string, options: ListOptions): Promise<EntityPage> => {
    const typePages = pages[entityType.toLowerCase()];
    if (!typePages) {
      throw new RemoteIOError(`No rows for ${entityType}`);
    }
    const pageNo = options.after === null ? 0 : Number(options.after);
    return {
      data: typePages[pageNo] ?? [],
      paging: {
        total: typePages.flat().length,
        after: pageNo + 1 < typePages.length ? String(pageNo + 1) : null,
      },
    };
  });
  const allowedFields = vi.fn(() => ['columns', 'owner']);
  const source: EntitySource = { listAfter, allowedFields };
  return { listAfter, allowedFields, source };
}

const fivePages = [[tableEntity('1'), tableEntity('2')], [tableEntity('3'), tableEntity('4')], [tableEntity('5')]];

function request(overrides: Partial<ReindexRequest> = {}): ReindexRequest {
  return {
    entities: ['table'],
    runMode: 'BATCH',
    batchSize: 2,
    flushIntervalSeconds: 2,
    recreateIndex: false,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('search.service', () => {
  const clock = () => 10_000;
  let fake: ReturnType<typeof createFakeClient>;
  let store: MemoryJobRecordStore;
  let tracker: JobRecordTracker;
  let lifecycle: IndexLifecycleManager;
  let scheduler: JobScheduler;

  beforeEach(() => {
    fake = createFakeClient();
    store = new MemoryJobRecordStore();
    tracker = createJobRecordTracker(store, clock);
    lifecycle = createIndexLifecycleManager({
      client: fake.client,
      reportFailure: createIndexFailureReporter(tracker, clock),
      loadMapping: () => template,
    });
    scheduler = createJobScheduler({ workers: 2, queueDepth: 5 });
  });

  function createService(source: EntitySource, builders = createDocumentBuilderRegistry()) {
    return createReindexService({
      client: fake.client,
      lifecycle,
      tracker,
      entitySource: source,
      builders,
      scheduler,
      clock,
      bulk: { sleep: async () => undefined },
    });
  }

  describe('stripTableProfile', () => {
    it('removes the table profile and every column profile', () => {
      const stripped = stripTableProfile({
        id: '1',
        profile: { rowCount: 10 },
        columns: [{ name: 'a', profile: { nullCount: 0 } }, { name: 'b' }],
      });

      expect(stripped).toEqual({ id: '1', columns: [{ name: 'a' }, { name: 'b' }] });
    });

    it('leaves entities without columns alone', () => {
      expect(stripTableProfile({ id: '1', name: 'orders' })).toEqual({ id: '1', name: 'orders' });
    });
  });

  describe('batch mode', () => {
    it('pages through five tables in three fetches and three bulk flushes', async () => {
      const { source, listAfter } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.run(request(), 'admin');

      expect(listAfter).toHaveBeenCalledTimes(3);
      expect(listAfter.mock.calls.map(([, options]) => options.after)).toEqual([null, '1', '2']);
      expect(listAfter.mock.calls[0][1]).toEqual({
        fields: ['columns', 'owner'],
        include: 'all',
        limit: 2,
        after: null,
      });
      expect(fake.bulk).toHaveBeenCalledTimes(3);

      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 5, success: 5, failed: 0 });
      expect(record.status).toBe('ACTIVE');
      expect(record.failureDetails).toBeNull();
      expect(record.startedBy).toBe('admin');
      expect(record.entities).toEqual(['table']);
      expect(record.startTime).toBe(10_000);
      expect(record.endTime).toBe(10_000);
    });

    it('upserts each document into the index of its kind', async () => {
      const { source } = createPagedSource({ table: [[tableEntity('1')]] });

      await createService(source).run(request(), 'admin');

      const [{ body }] = fake.bulk.mock.calls[0];
      expect(body[0]).toEqual({ update: { _index: 'table_search_index', _id: '1' } });
      expect(body[1]).toMatchObject({ doc: { id: '1', fqn: 'svc.t1' }, doc_as_upsert: true });
    });

    it('sums paging totals across requested kinds', async () => {
      const { source } = createPagedSource({
        table: fivePages,
        topic: [[{ id: 'k1', name: 'orders' }]],
      });
      const service = createService(source);

      await service.run(request({ entities: ['table', 'topic'] }), 'admin');

      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 6, success: 6, failed: 0 });
    });

    it('drops and recreates the index before writing documents', async () => {
      await lifecycle.ensureIndex('table');
      expect(lifecycle.getStatus('table')).toBe('CREATED');
      vi.clearAllMocks();
      fake.indices.exists.mockResolvedValueOnce({ body: true });

      const { source } = createPagedSource({ table: fivePages });
      await createService(source).run(request({ recreateIndex: true }), 'admin');

      expect(fake.indices.delete).toHaveBeenCalledWith({ index: 'table_search_index' });
      expect(fake.indices.create).toHaveBeenCalledTimes(1);
      const deletedAt = fake.indices.delete.mock.invocationCallOrder[0];
      const createdAt = fake.indices.create.mock.invocationCallOrder[0];
      expect(deletedAt).toBeLessThan(createdAt);
      expect(createdAt).toBeLessThan(fake.bulk.mock.invocationCallOrder[0]);
    });

    it('fails an unknown kind without affecting the others', async () => {
      const { source, listAfter } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.run(request({ entities: ['chart', 'table'] }), 'admin');

      expect(listAfter.mock.calls.every(([entityType]) => entityType === 'table')).toBe(true);
      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 5, success: 5, failed: 0 });
      expect(record.status).toBe('ACTIVEWITHERROR');
      expect(record.failureDetails).toEqual({
        context: 'Reindexing chart',
        lastFailedAt: 10_000,
        lastFailedReason: 'Failed to find index doc for type chart',
      });
    });

    it('aborts only the kind whose page fetch fails', async () => {
      const { source } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.run(request({ entities: ['user', 'table'] }), 'admin');

      const record = await service.lastStatus('BATCH');
      expect(record.stats.success).toBe(5);
      expect(record.failureDetails?.context).toBe('Reindexing user');
      expect(record.failureDetails?.lastFailedReason).toBe('No rows for user');
    });

    it('skips a kind whose index cannot be created and reports it on the stream record', async () => {
      fake.indices.create.mockImplementation(async ({ index }: { index: string }) => {
        if (index === 'topic_search_index') throw new Error('cluster read-only');
        return { body: { acknowledged: true } };
      });
      const { source, listAfter } = createPagedSource({ table: fivePages, topic: [[{ id: 'k1', name: 'orders' }]] });
      const service = createService(source);

      await service.run(request({ entities: ['topic', 'table'] }), 'admin');

      expect(listAfter.mock.calls.some(([entityType]) => entityType === 'topic')).toBe(false);
      const batch = await service.lastStatus('BATCH');
      expect(batch.failureDetails?.lastFailedReason).toBe('Index topic_search_index is not available');
      expect(batch.stats.success).toBe(5);

      const stream = await service.lastStatus('STREAM');
      expect(stream.status).toBe('ACTIVEWITHERROR');
      expect(stream.failureDetails?.context).toBe('Creating index topic_search_index');
      expect(lifecycle.getStatus('topic')).toBe('FAILED');
    });

    it('counts entities that cannot be built as failed and keeps going', async () => {
      const { source } = createPagedSource({
        table: [[tableEntity('1'), { id: 'bad' }], [tableEntity('2')]],
      });
      const service = createService(source);

      await service.run(request(), 'admin');

      expect(fake.bulk).toHaveBeenCalledTimes(2);
      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 3, success: 2, failed: 1 });
      expect(record.status).toBe('ACTIVEWITHERROR');
      expect(record.failureDetails?.context).toBe('Building table bad');
    });

    it('records item failures from bulk responses', async () => {
      fake.bulk.mockResolvedValueOnce({
        body: {
          errors: true,
          items: [
            { update: { _id: '1', status: 200 } },
            { update: { _id: '2', status: 400, error: { type: 'mapper_parsing_exception' } } },
          ],
        },
      });
      const { source } = createPagedSource({ table: [[tableEntity('1'), tableEntity('2')]] });
      const service = createService(source);

      await service.run(request(), 'admin');

      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 2, success: 1, failed: 1 });
      expect(record.status).toBe('ACTIVEWITHERROR');
      expect(record.failureDetails?.lastFailedReason).toBe(
        '1 of 2 documents failed: 2: {"type":"mapper_parsing_exception"}',
      );
    });

    it('strips profile data from tables before building documents', async () => {
      const builders = createDocumentBuilderRegistry();
      const build = vi.spyOn(builders, 'build');
      const { source } = createPagedSource({
        table: [[tableEntity('1', { profile: { rowCount: 3 }, columns: [{ name: 'a', profile: {} }] })]],
      });

      await createService(source, builders).run(request(), 'admin');

      expect(build).toHaveBeenCalledWith('table', {
        id: '1',
        name: 't1',
        fullyQualifiedName: 'svc.t1',
        columns: [{ name: 'a' }],
      });
    });

    it('narrows team fetches to names', async () => {
      const { source, listAfter, allowedFields } = createPagedSource({ team: [[{ id: 'g1', name: 'data' }]] });

      await createService(source).run(request({ entities: ['team'] }), 'admin');

      expect(listAfter.mock.calls[0][1].fields).toEqual(['name', 'displayName']);
      expect(allowedFields).not.toHaveBeenCalled();
    });

    it('moves on to the next kind when saving progress fails', async () => {
      const { source } = createPagedSource({
        table: [[tableEntity('1')]],
        topic: [[{ id: 'k1', name: 'orders' }]],
      });
      vi.spyOn(store, 'update').mockRejectedValueOnce(new Error('connection reset'));
      const service = createService(source);

      await expect(service.run(request({ entities: ['table', 'topic'] }), 'admin')).resolves.toBeUndefined();

      const indexes = fake.bulk.mock.calls.map(([{ body }]) => (body[0] as { update: { _index: string } }).update._index);
      expect(indexes).toEqual(['table_search_index', 'topic_search_index']);
      const record = await service.lastStatus('BATCH');
      expect(record.stats).toEqual({ total: 2, success: 2, failed: 0 });
      expect(record.endTime).toBe(10_000);
    });

    it('still stamps the end time when the last progress write fails', async () => {
      const { source } = createPagedSource({ table: [[tableEntity('1')]] });
      vi.spyOn(store, 'update').mockRejectedValueOnce(new Error('connection reset'));
      const service = createService(source);

      await service.run(request(), 'admin');

      const record = await service.lastStatus('BATCH');
      expect(record.status).toBe('ACTIVE');
      expect(record.endTime).toBe(10_000);
    });
  });

  describe('stream mode', () => {
    it('writes every document synchronously and ends ACTIVE', async () => {
      const { source } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.run(request({ runMode: 'STREAM' }), 'admin');

      expect(fake.bulk).not.toHaveBeenCalled();
      expect(fake.update).toHaveBeenCalledTimes(5);
      expect(fake.update).toHaveBeenCalledWith({
        index: 'table_search_index',
        id: '3',
        body: { doc: expect.objectContaining({ id: '3' }), doc_as_upsert: true },
      });

      const record = await service.lastStatus('STREAM');
      expect(record.status).toBe('ACTIVE');
      expect(record.failureDetails).toBeNull();
      expect(record.stats).toEqual({ total: 5, success: 5, failed: 0 });
    });

    it('stores one record transition per document', async () => {
      const { source } = createPagedSource({ table: fivePages });

      await createService(source).run(request({ runMode: 'STREAM' }), 'admin');

      const streamWrites = store.writes.filter((w) => w.key === 'reindexJob:search:STREAM/service.reindexJob');
      // reset + five documents + finish
      expect(streamWrites).toHaveLength(7);
      const timestamps = streamWrites.map((w) => w.record.timestamp);
      expect([...timestamps].sort((a, b) => a - b)).toEqual(timestamps);
      expect(new Set(timestamps).size).toBe(7);
    });

    it('keeps going after a failed write and ends ACTIVEWITHERROR', async () => {
      fake.update
        .mockResolvedValueOnce({ body: { result: 'updated' } })
        .mockRejectedValueOnce(new Error('version conflict'));
      const { source } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.run(request({ runMode: 'STREAM' }), 'admin');

      expect(fake.update).toHaveBeenCalledTimes(5);
      const record = await service.lastStatus('STREAM');
      expect(record.status).toBe('ACTIVEWITHERROR');
      expect(record.stats).toEqual({ total: 5, success: 4, failed: 1 });
      expect(record.failureDetails).toEqual({
        context: 'Reindexing table svc.t2',
        lastFailedAt: 10_000,
        lastFailedReason: 'version conflict',
      });
    });

    it('clears failures left by the previous run', async () => {
      await tracker.reset(jobRecordKey('STREAM'), {
        ...emptyJobRecord('STREAM'),
        status: 'ACTIVEWITHERROR',
        failureDetails: { context: 'Creating index table_search_index', lastFailedAt: 1, lastFailedReason: 'boom' },
      });
      const { source } = createPagedSource({ table: [[tableEntity('1')]] });
      const service = createService(source);

      await service.run(request({ runMode: 'STREAM' }), 'admin');

      const record = await service.lastStatus('STREAM');
      expect(record.status).toBe('ACTIVE');
      expect(record.failureDetails).toBeNull();
    });

    it('keeps going when recording a failed kind cannot be saved', async () => {
      const { source } = createPagedSource({ topic: [[{ id: 'k1', name: 'orders' }]] });
      vi.spyOn(store, 'update')
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockRejectedValueOnce(new Error('connection reset'));
      const service = createService(source);

      await expect(
        service.run(request({ runMode: 'STREAM', entities: ['table', 'topic'] }), 'admin'),
      ).resolves.toBeUndefined();

      expect(fake.update).toHaveBeenCalledOnce();
      expect(fake.update.mock.calls[0][0]).toMatchObject({ index: 'topic_search_index', id: 'k1' });
      const record = await service.lastStatus('STREAM');
      expect(record.endTime).toBe(10_000);
    });
  });

  describe('submit', () => {
    it('returns once the job is queued', async () => {
      const { source } = createPagedSource({ table: fivePages });
      const service = createService(source);

      const accepted = await service.submit(request(), 'admin');

      expect(accepted).toEqual({ message: 'Reindexing started', dispatch: 'queued' });
      await scheduler.drain();
      const record = await service.lastStatus('BATCH');
      expect(record.status).toBe('ACTIVE');
    });

    it('runs jobs of the same mode one after another', async () => {
      const { source } = createPagedSource({ table: fivePages });
      const service = createService(source);

      await service.submit(request(), 'first');
      await service.submit(request(), 'second');
      await scheduler.drain();

      const starts = store.writes
        .filter((w) => w.key === 'reindexJob:search:BATCH/service.reindexJob' && w.record.status === 'STARTING')
        .map((w) => w.record.startedBy);
      expect(starts).toEqual(['first', 'second']);
      const record = await service.lastStatus('BATCH');
      expect(record.startedBy).toBe('second');
      expect(record.stats.total).toBe(5);
    });
  });

  describe('lastStatus', () => {
    it('throws NotFoundError when the mode never ran', async () => {
      const service = createService(createPagedSource({}).source);

      await expect(service.lastStatus('BATCH')).rejects.toThrow(NotFoundError);
      await expect(service.lastStatus('BATCH')).rejects.toThrow('No last run');
    });
  });

  describe('index maintenance', () => {
    it('reconciles every index and reports the statuses', async () => {
      const service = createService(createPagedSource({}).source);

      const statuses = await service.reconcileIndexes();

      expect(fake.indices.create).toHaveBeenCalledTimes(9);
      expect(Object.values(statuses)).toEqual(Array(9).fill('CREATED'));
      expect(service.indexStatuses()).toEqual(statuses);
    });
  });
});
