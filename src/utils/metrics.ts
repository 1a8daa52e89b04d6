import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// Probe Metrics
// ============================================

export const checksTotal = new Counter({
  name: 'http_monitor_checks_total',
  help: 'Total number of probes performed',
  labelNames: ['target', 'result'] as const,
  registers: [registry],
});

export const responseTime = new Histogram({
  name: 'http_monitor_response_time_ms',
  help: 'Probe response time in milliseconds',
  labelNames: ['target'] as const,
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  registers: [registry],
});

// ============================================
// Aggregate Metrics
// ============================================

export const targetUp = new Gauge({
  name: 'http_monitor_up',
  help: 'Outcome of the latest probe (1=success, 0=failure)',
  labelNames: ['target'] as const,
  registers: [registry],
});

export const healthScore = new Gauge({
  name: 'http_monitor_health_score',
  help: 'Composite health score between 0 and 1',
  labelNames: ['target'] as const,
  registers: [registry],
});

export const uptimePercent = new Gauge({
  name: 'http_monitor_uptime_percent',
  help: 'Share of successful probes since start, in percent',
  labelNames: ['target'] as const,
  registers: [registry],
});

export const consecutiveFailures = new Gauge({
  name: 'http_monitor_consecutive_failures',
  help: 'Current run of failed probes',
  labelNames: ['target'] as const,
  registers: [registry],
});

export const loopRestarts = new Counter({
  name: 'http_monitor_loop_restarts_total',
  help: 'Poll loops restarted after an unexpected failure',
  labelNames: ['target'] as const,
  registers: [registry],
});

// ============================================
// Alert Metrics
// ============================================

export const alertsTotal = new Counter({
  name: 'http_monitor_alerts_total',
  help: 'Alert evaluations that fired, by outcome',
  labelNames: ['rule', 'target', 'outcome'] as const, // outcome: 'sent' | 'suppressed' | 'failed'
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Get the metrics registry
 */
export function getRegistry(): Registry {
  return registry;
}

/**
 * Get all metrics as string for Prometheus scraping
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for metrics response
 */
export function getContentType(): string {
  return registry.contentType;
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}

/**
 * Helper to record one probe outcome
 */
export function recordCheck(target: string, success: boolean, responseTimeMs: number): void {
  checksTotal.labels(target, success ? 'success' : 'failure').inc();
  responseTime.labels(target).observe(responseTimeMs);
  targetUp.labels(target).set(success ? 1 : 0);
}

/**
 * Helper to publish the aggregate view of a target
 */
export function updateTargetHealth(
  target: string,
  health: { healthScore: number; uptimePercentage: number | null; consecutiveFailures: number }
): void {
  healthScore.labels(target).set(health.healthScore);
  if (health.uptimePercentage !== null) {
    uptimePercent.labels(target).set(health.uptimePercentage);
  }
  consecutiveFailures.labels(target).set(health.consecutiveFailures);
}

/**
 * Helper to record an alert outcome
 */
export function recordAlert(rule: string, target: string, outcome: 'sent' | 'suppressed' | 'failed'): void {
  alertsTotal.labels(rule, target, outcome).inc();
}
