import { env } from './config/env';
import { initPool, closePool } from './shared/db';
import { errorMessage } from './shared/errors';
import { logger } from './shared/logger';
import { createApp } from './app';
import { initOpenSearch, healthCheck, closeOpenSearch } from './modules/search/opensearch/client';
import { createDocumentBuilderRegistry } from './modules/search/search.document-builders';
import { createEntitySource } from './modules/search/search.entity-source';
import { createIndexLifecycleManager, type IndexLifecycleManager } from './modules/search/search.index-lifecycle';
import { createIndexFailureReporter, createJobRecordTracker } from './modules/search/search.job-records';
import { createJobScheduler } from './modules/search/search.job-scheduler';
import { createReindexService } from './modules/search/search.service';

// Initialize database pool
initPool({ connectionString: env.DATABASE_URL });

const client = initOpenSearch({
  nodeUrls: env.OPENSEARCH_NODE_URLS,
  username: env.OPENSEARCH_USERNAME,
  password: env.OPENSEARCH_PASSWORD,
  requestTimeoutMs: env.OPENSEARCH_REQUEST_TIMEOUT_MS,
  maxRetries: 3,
  sslCertPath: env.OPENSEARCH_SSL_CERT_PATH,
});

// One tracker owns every job record key, including the index failure channel
const tracker = createJobRecordTracker();
const lifecycle = createIndexLifecycleManager({
  client,
  reportFailure: createIndexFailureReporter(tracker),
});
const scheduler = createJobScheduler({
  workers: env.REINDEX_WORKERS,
  queueDepth: env.REINDEX_QUEUE_DEPTH,
});

const reindexService = createReindexService({
  client,
  lifecycle,
  tracker,
  entitySource: createEntitySource(),
  builders: createDocumentBuilderRegistry(),
  scheduler,
});

const app = createApp({ jwtSecret: env.JWT_SECRET, reindexService });

async function prepareIndexes(manager: IndexLifecycleManager): Promise<void> {
  if (env.SEARCH_INDEXES_ON_STARTUP === 'none') return;

  const statuses =
    env.SEARCH_INDEXES_ON_STARTUP === 'reconcile' ? await manager.reconcileAll() : await manager.createAll();
  const failed = Object.entries(statuses)
    .filter(([, status]) => status === 'FAILED')
    .map(([kind]) => kind);

  if (failed.length > 0) {
    logger.warn('Some search indexes are unavailable, reindexing those kinds will fail', { failed });
  } else {
    logger.info('Search indexes ready', { mode: env.SEARCH_INDEXES_ON_STARTUP });
  }
}

const server = app.listen(env.PORT, () => {
  logger.info(`Server listening on port ${env.PORT}`, {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });

  // Verify the cluster is reachable, then bring the indexes up (non-blocking)
  healthCheck(client)
    .then((health) => {
      logger.info('OpenSearch cluster connected', {
        status: health.status,
        nodes: health.numberOfNodes,
        clusterName: health.clusterName,
      });
      return prepareIndexes(lifecycle);
    })
    .catch((err) => {
      logger.warn('OpenSearch cluster unreachable, indexes will be created on the first reindex', {
        error: errorMessage(err),
      });
    });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);

  // Stop accepting new connections
  server.close();

  // Let accepted reindex jobs finish
  await scheduler.drain();

  await closeOpenSearch();
  await closePool();

  logger.info('Shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
