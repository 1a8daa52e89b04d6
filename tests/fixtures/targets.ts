/**
 * Test fixtures for monitored targets and checks
 */

import type { AlertRule, Target } from '../../src/config/index.js';
import { createHealthCheck, type HealthCheck } from '../../src/services/prober/index.js';

export function createTarget(overrides: Partial<Target> = {}): Target {
  return {
    name: 'api',
    url: 'http://127.0.0.1:9/health',
    method: 'GET',
    headers: {},
    expectedStatus: [],
    timeoutMs: 1000,
    intervalMs: 60000,
    followRedirects: false,
    ...overrides,
  };
}

export function createCheck(overrides: Partial<HealthCheck> = {}): HealthCheck {
  return createHealthCheck({
    target: 'api',
    timestamp: new Date('2024-03-01T12:00:00.000Z'),
    success: true,
    statusCode: 200,
    responseTimeMs: 100,
    ...overrides,
  });
}

export function failedCheck(overrides: Partial<HealthCheck> = {}): HealthCheck {
  return createCheck({
    success: false,
    statusCode: undefined,
    error: 'Connection refused (http://127.0.0.1:9/health)',
    ...overrides,
  });
}

export function createRule(overrides: Partial<AlertRule> = {}): AlertRule {
  return {
    name: 'ops',
    webhookUrl: 'http://127.0.0.1:9/hook',
    triggers: [{ type: 'response_time_ms', thresholdMs: 100 }],
    cooldownMs: 30 * 60 * 1000,
    ...overrides,
  };
}
