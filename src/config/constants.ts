// Health statuses
export const HEALTH_STATUSES = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
  UNKNOWN: 'unknown',
} as const;

export type HealthStatus = (typeof HEALTH_STATUSES)[keyof typeof HEALTH_STATUSES];

// HTTP methods accepted for probes
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'HEAD', 'OPTIONS', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

// Per-check output formats
export const OUTPUT_FORMATS = {
  PRETTY: 'pretty',
  JSON: 'json',
  CSV: 'csv',
  PROMETHEUS: 'prometheus',
} as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[keyof typeof OUTPUT_FORMATS];

// Alert trigger kinds, as spelled in the monitor file
export const TRIGGER_TYPES = {
  CONSECUTIVE_FAILURES: 'consecutive_failures',
  RESPONSE_TIME_MS: 'response_time_ms',
  HEALTH_SCORE_BELOW: 'health_score_below',
  CERT_EXPIRING_DAYS: 'cert_expiring_days',
} as const;

export type TriggerType = (typeof TRIGGER_TYPES)[keyof typeof TRIGGER_TYPES];

// Rolling history kept per target
export const HISTORY_CAPACITY = 100;

// Uptime thresholds (percent) used when there is no current failure streak
export const UPTIME_THRESHOLDS = {
  HEALTHY: 99,
  DEGRADED: 95,
} as const;

// Health score weighting
export const HEALTH_SCORE_WEIGHTS = {
  UPTIME: 0.7,
  RESPONSE_TIME: 0.3,
} as const;

// Response time tiers: average ms upper bound -> score
export const RESPONSE_TIME_TIERS: ReadonlyArray<{ maxMs: number; score: number }> = [
  { maxMs: 500, score: 1.0 },
  { maxMs: 2000, score: 0.8 },
  { maxMs: 5000, score: 0.5 },
];

export const SLOW_RESPONSE_SCORE = 0.2;

// Monitor file defaults
export const MONITOR_DEFAULTS = {
  INTERVAL_SECONDS: 60,
  TIMEOUT_SECONDS: 10,
  MAX_CONSECUTIVE_FAILURES: 3,
  REPORT_INTERVAL_SECONDS: 30,
  WEBHOOK_TIMEOUT_SECONDS: 10,
  COOLDOWN_MINUTES: 30,
} as const;
