import { Router } from 'express';
import type { RetentionScanWorker } from '../workers/retention-scan.worker';
import { createHealthController } from '../controllers/health.controller';

export function createHealthRoutes(worker: RetentionScanWorker): Router {
  const router = Router();
  const healthController = createHealthController(worker);

  /**
   * GET /api/v1/health
   * Basic health check - no authentication required
   */
  router.get('/', healthController.getHealthCheck);

  return router;
}
