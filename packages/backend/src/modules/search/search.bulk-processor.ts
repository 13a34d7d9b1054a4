import type { Client } from '@opensearch-project/opensearch';
import pLimit from 'p-limit';
import { z } from 'zod';

import type { FailureDetails, JobStats } from './search.schemas';
import { errorMessage } from '../../shared/errors';
import { logger } from '../../shared/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UpsertRequest {
  index: string;
  id: string;
  doc: Record<string, unknown>;
}

export interface BulkResult {
  executionId: number;
  size: number;
  succeeded: number;
  failed: number;
  firstFailureReason: string | null;
}

/**
 * Accumulates per-run counters across bulk flushes. The orchestrator folds
 * them into the job record once an entity kind's pages are all submitted.
 */
export interface BulkProcessorListener {
  /** Lets the next addRequests() count towards the total; called once per entity kind. */
  allowTotalRequestUpdate(): void;
  addRequests(total: number): void;
  afterBulk(result: BulkResult): void;
  afterBulkFailure(executionId: number, size: number, err: unknown): void;
  /** Records a failure that is not tied to a bulk response, e.g. a whole entity kind. */
  recordFailure(context: string, reason: string): void;
  /** A document that could not be built is counted as failed. */
  recordSkipped(context: string, reason: string): void;
  getStats(): JobStats;
  getLastFailure(): FailureDetails | null;
}

export interface BulkProcessorConfig {
  batchSize: number;
  flushIntervalMs: number;
  concurrentRequests: number;
  backoffMs: number;
  maxRetries: number;
}

export interface BulkProcessorDeps {
  sleep?: (ms: number) => Promise<void>;
}

export interface BulkProcessor {
  /** Buffers an upsert; dispatches when the buffer is full and waits while too many requests are in flight. */
  add(request: UpsertRequest): Promise<void>;
  /** Dispatches the partial buffer and waits for every in-flight request. */
  flush(): Promise<void>;
  close(): Promise<void>;
  pending(): number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG: Omit<BulkProcessorConfig, 'batchSize' | 'flushIntervalMs'> = {
  concurrentRequests: 2,
  backoffMs: 1_000,
  maxRetries: 3,
};

const bulkResponseSchema = z.object({
  errors: z.boolean().optional(),
  items: z.array(
    z.record(
      z
        .object({
          _id: z.string().nullish(),
          status: z.number().optional(),
          error: z.unknown().optional(),
        })
        .passthrough(),
    ),
  ),
});

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ---------------------------------------------------------------------------
// Listener
// ---------------------------------------------------------------------------

export function createBulkListener(clock: () => number = Date.now): BulkProcessorListener {
  const stats: JobStats = { total: 0, success: 0, failed: 0 };
  let lastFailure: FailureDetails | null = null;
  let totalUpdateAllowed = false;

  function recordFailure(context: string, reason: string): void {
    lastFailure = { context, lastFailedAt: clock(), lastFailedReason: reason };
  }

  return {
    allowTotalRequestUpdate() {
      totalUpdateAllowed = true;
    },

    addRequests(total) {
      if (!totalUpdateAllowed) return;
      stats.total += total;
      totalUpdateAllowed = false;
    },

    afterBulk(result) {
      stats.success += result.succeeded;
      stats.failed += result.failed;
      if (result.failed > 0) {
        recordFailure(
          `Bulk request ${result.executionId}`,
          `${result.failed} of ${result.size} documents failed: ${result.firstFailureReason ?? 'unknown'}`,
        );
      }
    },

    afterBulkFailure(executionId, size, err) {
      stats.failed += size;
      recordFailure(`Bulk request ${executionId}`, errorMessage(err));
    },

    recordFailure,

    recordSkipped(context, reason) {
      stats.failed += 1;
      recordFailure(context, reason);
    },

    getStats() {
      return { ...stats };
    },

    getLastFailure() {
      return lastFailure ? { ...lastFailure } : null;
    },
  };
}

// ---------------------------------------------------------------------------
// Processor
// ---------------------------------------------------------------------------

function summarise(executionId: number, size: number, response: unknown): BulkResult {
  const parsed = bulkResponseSchema.safeParse(response);
  if (!parsed.success) {
    return { executionId, size, succeeded: 0, failed: size, firstFailureReason: 'Unrecognised bulk response' };
  }

  let failed = 0;
  let firstFailureReason: string | null = null;
  for (const item of parsed.data.items) {
    for (const action of Object.values(item)) {
      if (action.error !== undefined && action.error !== null) {
        failed++;
        firstFailureReason ??= `${action._id ?? '?'}: ${JSON.stringify(action.error)}`;
      }
    }
  }
  const succeeded = parsed.data.items.length - failed;
  return { executionId, size, succeeded, failed, firstFailureReason };
}

/**
 * Size- and time-bounded batching of document upserts onto the bulk API.
 *
 * At most `concurrentRequests` bulk calls are in flight. A failed call is
 * retried `maxRetries` times after a constant `backoffMs` pause before the
 * whole batch is reported to the listener as failed.
 */
export function createBulkProcessor(
  client: Client,
  listener: BulkProcessorListener,
  config: Pick<BulkProcessorConfig, 'batchSize' | 'flushIntervalMs'> & Partial<BulkProcessorConfig>,
  deps: BulkProcessorDeps = {},
): BulkProcessor {
  const cfg: BulkProcessorConfig = { ...DEFAULT_CONFIG, ...config };
  const sleep = deps.sleep ?? defaultSleep;
  const limit = pLimit(cfg.concurrentRequests);

  let buffer: UpsertRequest[] = [];
  const inFlight = new Set<Promise<void>>();
  let executionCounter = 0;

  const flushTimer = setInterval(() => {
    if (buffer.length > 0) dispatch();
  }, cfg.flushIntervalMs);
  flushTimer.unref();

  async function execute(executionId: number, batch: UpsertRequest[]): Promise<void> {
    const body = batch.flatMap((request) => [
      { update: { _index: request.index, _id: request.id } },
      { doc: request.doc, doc_as_upsert: true },
    ]);

    for (let attempt = 0; ; attempt++) {
      try {
        const { body: response } = await client.bulk({ body });
        listener.afterBulk(summarise(executionId, batch.length, response));
        return;
      } catch (err) {
        if (attempt < cfg.maxRetries) {
          logger.warn('BulkProcessor: bulk request failed, retrying', {
            executionId,
            attempt: attempt + 1,
            maxRetries: cfg.maxRetries,
            error: errorMessage(err),
          });
          await sleep(cfg.backoffMs);
          continue;
        }
        logger.error('BulkProcessor: bulk request failed after all retries', {
          executionId,
          size: batch.length,
          error: errorMessage(err),
        });
        listener.afterBulkFailure(executionId, batch.length, err);
        return;
      }
    }
  }

  function dispatch(): void {
    const batch = buffer;
    buffer = [];
    const executionId = ++executionCounter;
    const task = limit(() => execute(executionId, batch));
    inFlight.add(task);
    void task.then(() => {
      inFlight.delete(task);
    });
  }

  return {
    async add(request) {
      buffer.push(request);
      if (buffer.length < cfg.batchSize) return;

      // Backpressure: the producer waits for a free request slot
      while (inFlight.size >= cfg.concurrentRequests) {
        await Promise.race(inFlight);
      }
      // The interval timer may have taken the buffer meanwhile
      if (buffer.length > 0) dispatch();
    },

    async flush() {
      if (buffer.length > 0) dispatch();
      await Promise.all([...inFlight]);
    },

    async close() {
      clearInterval(flushTimer);
      if (buffer.length > 0) dispatch();
      await Promise.all([...inFlight]);
    },

    pending() {
      return buffer.length;
    },
  };
}
