import { Router } from 'express';
import { validate } from '../../middleware/validate';
import { requireAdmin } from '../../middleware/rbac';
import { createSearchController } from './search.controller';
import type { ReindexService } from './search.service';
import { reindexRequestSchema, runModeParamsSchema } from './search.schemas';

/**
 * Reindex and index-maintenance endpoints. Every route is admin-only;
 * authentication runs app-wide before this router.
 */
export function createSearchRoutes(service: ReindexService): Router {
  const controller = createSearchController(service);
  const router = Router();

  // POST /reindex: start a batch or stream reindex job
  router.post(
    '/reindex',
    validate({ body: reindexRequestSchema }),
    requireAdmin(),
    controller.reindex,
  );

  // GET /reindex/status/:runMode: last job record for BATCH or STREAM
  router.get(
    '/reindex/status/:runMode',
    validate({ params: runModeParamsSchema }),
    requireAdmin(),
    controller.getLastStatus,
  );

  // GET /indexes: index status per kind
  router.get('/indexes', requireAdmin(), controller.getIndexStatuses);

  // POST /indexes/reconcile: create or update every index from its template
  router.post('/indexes/reconcile', requireAdmin(), controller.reconcileIndexes);

  return router;
}
