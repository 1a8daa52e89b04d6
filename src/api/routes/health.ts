import { Router, type Request, type Response } from 'express';
import { HEALTH_STATUSES, type HealthStatus } from '../../config/index.js';
import type { HealthSnapshot } from '../../services/healthMonitor/index.js';

export interface HealthCheckDependencies {
  snapshots: () => readonly HealthSnapshot[];
}

type OverallStatus = Exclude<HealthStatus, 'unknown'>;

/**
 * Worst status across targets. A target without checks yet counts as degraded.
 */
export function overallStatus(snapshots: readonly HealthSnapshot[]): OverallStatus {
  let status: OverallStatus = HEALTH_STATUSES.HEALTHY;
  for (const snapshot of snapshots) {
    if (snapshot.status === HEALTH_STATUSES.UNHEALTHY) {
      return HEALTH_STATUSES.UNHEALTHY;
    }
    if (snapshot.status !== HEALTH_STATUSES.HEALTHY) {
      status = HEALTH_STATUSES.DEGRADED;
    }
  }
  return status;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  /**
   * GET /api/health
   * Per-target health with an overall status
   */
  router.get('/', (_req: Request, res: Response) => {
    try {
      const targets = deps.snapshots();
      const status = overallStatus(targets);

      const statusCode = status === HEALTH_STATUSES.UNHEALTHY ? 503 : 200;
      res.status(statusCode).json({
        status,
        timestamp: new Date().toISOString(),
        targets,
      });
    } catch (error) {
      res.status(503).json({
        status: HEALTH_STATUSES.UNHEALTHY,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  /**
   * GET /api/health/:target
   */
  router.get('/:target', (req: Request, res: Response) => {
    const name = req.params['target'];
    const snapshot = deps.snapshots().find((s) => s.name === name);
    if (!snapshot) {
      res.status(404).json({ error: `Unknown target '${String(name)}'` });
      return;
    }
    res.json(snapshot);
  });

  return router;
}
