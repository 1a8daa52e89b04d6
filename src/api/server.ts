import express, { type Express } from 'express';
import type { Server } from 'http';
import type { HealthSnapshot } from '../services/healthMonitor/index.js';
import { logger } from '../utils/logger.js';
import { getContentType, getMetrics } from '../utils/metrics.js';
import { createHealthRouter } from './routes/health.js';

const log = logger('ApiServer');

export interface ApiDependencies {
  snapshots: () => readonly HealthSnapshot[];
}

/**
 * Read-only status API: /api/health and the Prometheus /metrics endpoint
 */
export function createApiApp(deps: ApiDependencies): Express {
  const app = express();

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetrics();
      res.set('Content-Type', getContentType());
      res.send(metrics);
    } catch (error) {
      log.error('Error collecting metrics', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).send('Error collecting metrics');
    }
  });

  app.use('/api/health', createHealthRouter({ snapshots: deps.snapshots }));

  return app;
}

/**
 * Start listening. Resolves once the port is bound.
 */
export function startApiServer(port: number, deps: ApiDependencies): Promise<Server> {
  const app = createApiApp(deps);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      server.off('error', reject);
      log.info(`API server listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      log.info('API server stopped');
      resolve();
    });
  });
}
