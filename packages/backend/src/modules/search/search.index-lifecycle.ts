import type { Client } from '@opensearch-project/opensearch';

import {
  INDEX_KINDS,
  indexKindFor,
  indexNameFor,
  loadMappingTemplate,
  type IndexKind,
  type MappingLoader,
} from './mappings/index-kinds';
import { openSearchErrorType } from './opensearch/client';
import type { IndexFailureReporter } from './search.job-records';
import type { IndexStatus } from './search.schemas';
import { errorMessage } from '../../shared/errors';
import { logger } from '../../shared/logger';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type IndexStatuses = Record<IndexKind, IndexStatus>;

export interface IndexLifecycleManager {
  /** True when the index exists or was created. Never throws. */
  ensureIndex(kind: IndexKind): Promise<boolean>;
  /** Pushes the template mapping onto an existing index, or creates it. Never throws. */
  reconcile(kind: IndexKind): Promise<boolean>;
  /** Best-effort delete; failures are logged and reported. */
  dropIndex(kind: IndexKind): Promise<void>;
  createAll(): Promise<IndexStatuses>;
  reconcileAll(): Promise<IndexStatuses>;
  dropAll(): Promise<void>;
  indexKindFor(entityType: string): IndexKind;
  indexNameFor(kind: IndexKind): string;
  getStatus(kind: IndexKind): IndexStatus;
  getStatuses(): IndexStatuses;
}

export interface IndexLifecycleDeps {
  client: Client;
  reportFailure: IndexFailureReporter;
  loadMapping?: MappingLoader;
}

const ALREADY_EXISTS = 'resource_already_exists_exception';

function failureReason(err: unknown): string {
  return err instanceof Error && err.stack ? err.stack : errorMessage(err);
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Owns the runtime status of every index kind for one search client.
 * Statuses start as NOT_CREATED and are rebuilt by existence checks after a restart.
 */
export function createIndexLifecycleManager(deps: IndexLifecycleDeps): IndexLifecycleManager {
  const { client, reportFailure } = deps;
  const loadMapping = deps.loadMapping ?? ((kind: IndexKind) => loadMappingTemplate(kind));

  const statuses = new Map<IndexKind, IndexStatus>(
    INDEX_KINDS.map((kind) => [kind, 'NOT_CREATED']),
  );

  function getStatus(kind: IndexKind): IndexStatus {
    return statuses.get(kind) ?? 'NOT_CREATED';
  }

  function getStatuses(): IndexStatuses {
    return {
      table: getStatus('table'),
      topic: getStatus('topic'),
      dashboard: getStatus('dashboard'),
      pipeline: getStatus('pipeline'),
      user: getStatus('user'),
      team: getStatus('team'),
      glossary: getStatus('glossary'),
      mlmodel: getStatus('mlmodel'),
      tag: getStatus('tag'),
    };
  }

  async function indexExists(indexName: string): Promise<boolean> {
    const { body } = await client.indices.exists({ index: indexName });
    return body === true;
  }

  async function createIndex(kind: IndexKind, indexName: string): Promise<void> {
    const template = loadMapping(kind);
    try {
      await client.indices.create({ index: indexName, body: template });
      logger.info('IndexLifecycle: created index', { indexKind: kind, indexName });
    } catch (err) {
      // Another creator got there first
      if (openSearchErrorType(err) === ALREADY_EXISTS) {
        logger.info('IndexLifecycle: index already exists', { indexKind: kind, indexName });
        return;
      }
      throw err;
    }
  }

  async function markFailed(kind: IndexKind, context: string, err: unknown): Promise<void> {
    statuses.set(kind, 'FAILED');
    logger.error(`IndexLifecycle: ${context} failed`, {
      indexKind: kind,
      error: errorMessage(err),
    });
    await reportFailure(context, failureReason(err));
  }

  async function ensureIndex(kind: IndexKind): Promise<boolean> {
    if (getStatus(kind) === 'CREATED') return true;

    const indexName = indexNameFor(kind);
    try {
      if (!(await indexExists(indexName))) {
        await createIndex(kind, indexName);
      }
      statuses.set(kind, 'CREATED');
      return true;
    } catch (err) {
      await markFailed(kind, `Creating index ${indexName}`, err);
      return false;
    }
  }

  async function reconcile(kind: IndexKind): Promise<boolean> {
    const indexName = indexNameFor(kind);
    let context = `Creating index ${indexName}`;
    try {
      if (await indexExists(indexName)) {
        context = `Updating index ${indexName}`;
        const template = loadMapping(kind);
        await client.indices.putMapping({ index: indexName, body: template.mappings });
        logger.info('IndexLifecycle: updated index mapping', { indexKind: kind, indexName });
      } else {
        await createIndex(kind, indexName);
      }
      statuses.set(kind, 'CREATED');
      return true;
    } catch (err) {
      await markFailed(kind, context, err);
      return false;
    }
  }

  async function dropIndex(kind: IndexKind): Promise<void> {
    const indexName = indexNameFor(kind);
    try {
      if (await indexExists(indexName)) {
        await client.indices.delete({ index: indexName });
        logger.info('IndexLifecycle: deleted index', { indexKind: kind, indexName });
      }
      statuses.set(kind, 'NOT_CREATED');
    } catch (err) {
      logger.error('IndexLifecycle: deleting index failed', {
        indexKind: kind,
        indexName,
        error: errorMessage(err),
      });
      await reportFailure(`Deleting index ${indexName}`, failureReason(err));
    }
  }

  return {
    ensureIndex,
    reconcile,
    dropIndex,

    async createAll() {
      for (const kind of INDEX_KINDS) {
        await ensureIndex(kind);
      }
      return getStatuses();
    },

    async reconcileAll() {
      for (const kind of INDEX_KINDS) {
        await reconcile(kind);
      }
      return getStatuses();
    },

    async dropAll() {
      for (const kind of INDEX_KINDS) {
        await dropIndex(kind);
      }
    },

    indexKindFor,
    indexNameFor,
    getStatus,
    getStatuses,
  };
}
