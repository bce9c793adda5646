/**
 * Health Check API
 *
 * Liveness of this service plus the state of the provider health monitor.
 */

import { Router, Request, Response } from 'express';
import type { HealthMonitor } from '../services/healthCheck';

export function createHealthRouter(monitor: HealthMonitor): Router {
  const router = Router();

  /**
   * GET /health
   * Basic liveness check
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  /**
   * GET /health/monitor
   * Scan counters and the summary of the last completed scan
   */
  router.get('/monitor', (_req: Request, res: Response) => {
    res.json(monitor.getStatus());
  });

  return router;
}
