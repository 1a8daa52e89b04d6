import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { HealthAggregate, PollLoop } from '../../src/services/healthMonitor/index.js';
import { TlsCertificateInspector, UnknownCertificateInspector } from '../../src/services/prober/index.js';
import { closeFileLogging, initializeFileLogging } from '../../src/utils/fileLogger.js';
import { errorMessage } from '../../src/utils/logger.js';
import { getMetrics, getRegistry, resetMetrics } from '../../src/utils/metrics.js';
import { daysBetween, formatClockTime, sleep } from '../../src/utils/time.js';
import { createCheck, createTarget } from '../fixtures/targets.js';

describe('Time Utilities', () => {
  it('should format clock time in UTC', () => {
    expect(formatClockTime(new Date('2024-03-01T07:08:09.999Z'))).toBe('07:08:09');
  });

  it('should count whole days', () => {
    const day = 24 * 60 * 60 * 1000;
    expect(daysBetween(0, 7 * day)).toBe(7);
    expect(daysBetween(0, 7 * day - 1)).toBe(6);
  });

  it('should resolve a sleep early when aborted', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);

    await sleep(60000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it('should not wait at all when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60000, controller.signal)).resolves.toBeUndefined();
  });
});

describe('Logger Utilities', () => {
  it('should render errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });

  describe('file logging', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'http-monitor-logs-'));
    });

    // The directory is left in place: the file transport opens its stream asynchronously
    afterEach(() => {
      closeFileLogging();
    });

    it('should resolve the log path and create missing directories', () => {
      const file = path.join(dir, 'nested', 'monitor.log');

      expect(initializeFileLogging({ filePath: file })).toBe(file);
    });
  });
});

describe('Metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('should publish per-target gauges after each check', async () => {
    const target = createTarget({ name: 'metrics-target' });
    const loop = new PollLoop({
      target,
      aggregate: new HealthAggregate(target),
      prober: { probe: async () => createCheck({ target: target.name }) },
    });

    await loop.runOnce();

    const exposition = await getMetrics();
    expect(exposition).toContain('http_monitor_up{target="metrics-target"} 1');
    expect(exposition).toContain('http_monitor_checks_total{target="metrics-target",result="success"} 1');
    expect(exposition).toContain('http_monitor_uptime_percent{target="metrics-target"} 100');
    expect(getRegistry().getSingleMetric('http_monitor_health_score')).toBeDefined();
  });
});

describe('Certificate inspectors', () => {
  it('should report unknown by default', async () => {
    await expect(new UnknownCertificateInspector().daysUntilExpiry('https://api.example.com')).resolves.toBeUndefined();
  });

  it('should report unknown when the URL cannot be parsed', async () => {
    await expect(new TlsCertificateInspector().daysUntilExpiry('not a url')).resolves.toBeUndefined();
  });

  it('should report unknown when the handshake fails', async () => {
    const inspector = new TlsCertificateInspector({ timeoutMs: 1000 });

    await expect(inspector.daysUntilExpiry('https://127.0.0.1:9/')).resolves.toBeUndefined();
  });
});
