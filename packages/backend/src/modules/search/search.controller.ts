import { Request, Response, NextFunction } from 'express';
import type { ReindexService } from './search.service';
import { runModeSchema } from './search.schemas';
import { successResponse } from '../../shared/envelope';
import { AuthenticationError } from '../../shared/errors';
import '../../shared/types';

export function createSearchController(service: ReindexService) {
  /**
   * POST /api/v1/search/reindex
   * Dispatches a reindex job. Returns 202 before any document is written;
   * progress and failures are only visible through the status endpoint.
   */
  async function reindex(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.user) {
        throw new AuthenticationError('Authentication required');
      }
      const accepted = await service.submit(req.body, req.user.name);

      res.status(202).json(successResponse(accepted));
    } catch (err) {
      next(err);
    }
  }

  /**
   * GET /api/v1/search/reindex/status/:runMode
   */
  async function getLastStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const record = await service.lastStatus(runModeSchema.parse(req.params.runMode));
      res.status(200).json(successResponse(record));
    } catch (err) {
      next(err);
    }
  }

  /**
   * GET /api/v1/search/indexes
   */
  function getIndexStatuses(_req: Request, res: Response): void {
    res.status(200).json(successResponse(service.indexStatuses()));
  }

  /**
   * POST /api/v1/search/indexes/reconcile
   * Creates missing indexes and pushes the bundled mappings onto existing ones.
   */
  async function reconcileIndexes(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const statuses = await service.reconcileIndexes();
      res.status(200).json(successResponse(statuses));
    } catch (err) {
      next(err);
    }
  }

  return {
    reindex,
    getLastStatus,
    getIndexStatuses,
    reconcileIndexes,
  };
}
