import pLimit from 'p-limit';

import { errorMessage } from '../../shared/errors';
import { logger } from '../../shared/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** `queued`: handed to a worker; `inline`: ran to completion on the caller because the queue was full. */
export type Dispatch = 'queued' | 'inline';

export interface JobSchedulerConfig {
  workers: number;
  queueDepth: number;
}

export interface JobScheduler {
  submit(name: string, job: () => Promise<void>): Promise<Dispatch>;
  /** Resolves once every queued job has settled. */
  drain(): Promise<void>;
  stats(): { active: number; queued: number };
}

export interface RunLock {
  /** Runs `task` once no other task holds `key`. */
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  isHeld(key: string): boolean;
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

/**
 * Bounded worker pool. When `workers + queueDepth` jobs are already
 * accepted, the submitting caller runs the job itself instead of having it
 * rejected.
 */
export function createJobScheduler(config: JobSchedulerConfig): JobScheduler {
  const limit = pLimit(config.workers);
  const capacity = config.workers + config.queueDepth;
  const accepted = new Set<Promise<void>>();

  async function run(name: string, job: () => Promise<void>): Promise<void> {
    const startedAt = Date.now();
    try {
      await job();
      logger.info('JobScheduler: job finished', { job: name, durationMs: Date.now() - startedAt });
    } catch (err) {
      logger.error('JobScheduler: job failed', {
        job: name,
        error: errorMessage(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
  }

  return {
    async submit(name, job) {
      if (limit.activeCount + limit.pendingCount < capacity) {
        const task = limit(() => run(name, job));
        accepted.add(task);
        void task.then(() => {
          accepted.delete(task);
        });
        return 'queued';
      }

      logger.warn('JobScheduler: queue full, running job on the caller', {
        job: name,
        active: limit.activeCount,
        queued: limit.pendingCount,
      });
      await run(name, job);
      return 'inline';
    },

    async drain() {
      while (accepted.size > 0) {
        await Promise.all([...accepted]);
      }
    },

    stats() {
      return { active: limit.activeCount, queued: limit.pendingCount };
    },
  };
}

// ---------------------------------------------------------------------------
// Run lock
// ---------------------------------------------------------------------------

export function createRunLock(): RunLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run(key, task) {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);
      const tail = result.then(
        () => undefined,
        () => undefined,
      );
      tails.set(key, tail);
      void tail.then(() => {
        if (tails.get(key) === tail) tails.delete(key);
      });
      return result;
    },

    isHeld(key) {
      return tails.has(key);
    },
  };
}
