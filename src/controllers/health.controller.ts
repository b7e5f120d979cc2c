import type { NextFunction, Request, Response } from 'express';
import client from 'prom-client';
import type { RetentionScanWorker } from '../workers/retention-scan.worker';

export function createHealthController(worker: RetentionScanWorker) {
  return {
    /**
     * GET /api/v1/health
     * Liveness plus the scan worker's state; no authentication.
     */
    getHealthCheck(_req: Request, res: Response): void {
      const last = worker.lastSummary();
      res.setHeader('Cache-Control', 'no-store');
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        worker: {
          state: worker.getState(),
          lastCycleFinishedAt: last?.finishedAt ?? null,
        },
        version: process.env.npm_package_version || '1.0.0',
      });
    },

    /**
     * GET /metrics
     */
    async getMetrics(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        res.set('Content-Type', client.register.contentType);
        res.end(await client.register.metrics());
      } catch (error) {
        next(error);
      }
    },
  };
}
