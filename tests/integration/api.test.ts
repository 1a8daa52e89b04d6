import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApiApp } from '../../src/api/server.js';
import { overallStatus } from '../../src/api/routes/health.js';
import { HealthAggregate, type HealthSnapshot } from '../../src/services/healthMonitor/index.js';
import { createCheck, failedCheck } from '../fixtures/targets.js';

function snapshotOf(name: string, successes: number, failures: number): HealthSnapshot {
  const aggregate = new HealthAggregate({ name, url: `http://${name}.example.com/` });
  for (let i = 0; i < successes; i++) aggregate.update(createCheck({ target: name }));
  for (let i = 0; i < failures; i++) aggregate.update(failedCheck({ target: name }));
  return aggregate.snapshot();
}

describe('Status API', () => {
  describe('overallStatus', () => {
    it('should report the worst target status', () => {
      expect(overallStatus([])).toBe('healthy');
      expect(overallStatus([snapshotOf('api', 1, 0)])).toBe('healthy');
      expect(overallStatus([snapshotOf('api', 1, 0), snapshotOf('web', 5, 1)])).toBe('degraded');
      expect(overallStatus([snapshotOf('api', 1, 0), snapshotOf('web', 5, 3)])).toBe('unhealthy');
    });

    it('should count targets without checks as degraded', () => {
      expect(overallStatus([snapshotOf('api', 1, 0), snapshotOf('new', 0, 0)])).toBe('degraded');
    });
  });

  describe('GET /api/health', () => {
    it('should return every target with 200 when none is unhealthy', async () => {
      const app = createApiApp({ snapshots: () => [snapshotOf('api', 2, 0)] });

      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.targets).toHaveLength(1);
      expect(response.body.targets[0].name).toBe('api');
      expect(response.body.targets[0].totalChecks).toBe(2);
    });

    it('should return 503 when a target is unhealthy', async () => {
      const app = createApiApp({ snapshots: () => [snapshotOf('api', 0, 3)] });

      const response = await request(app).get('/api/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('unhealthy');
    });

    it('should return a single target by name', async () => {
      const app = createApiApp({ snapshots: () => [snapshotOf('api', 1, 0), snapshotOf('web', 1, 0)] });

      const response = await request(app).get('/api/health/web');

      expect(response.status).toBe(200);
      expect(response.body.name).toBe('web');
    });

    it('should return 404 for an unknown target', async () => {
      const app = createApiApp({ snapshots: () => [] });

      const response = await request(app).get('/api/health/nope');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Unknown target 'nope'" });
    });
  });

  describe('GET /metrics', () => {
    it('should expose the Prometheus registry', async () => {
      const app = createApiApp({ snapshots: () => [] });

      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.text).toContain('# HELP http_monitor_checks_total');
    });
  });
});
