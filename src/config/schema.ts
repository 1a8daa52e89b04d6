import { z } from 'zod';
import {
  HTTP_METHODS,
  MONITOR_DEFAULTS,
  OUTPUT_FORMATS,
  TRIGGER_TYPES,
  type HttpMethod,
  type OutputFormat,
} from './constants.js';

// ============================================
// Process environment
// ============================================

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

const ApiConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(9464),
});

export const EnvConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: LogLevelSchema.default('info'),
  // Used by `monitor` when no --config is given
  monitorConfigPath: z.string().min(1).default('monitor.yml'),
  api: ApiConfigSchema,
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export { LogLevelSchema };

// ============================================
// Domain types (what the engine consumes)
// ============================================

/**
 * One monitored endpoint. Loaded once, never mutated.
 */
export interface Target {
  readonly name: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  /** Empty means any 2xx is acceptable */
  readonly expectedStatus: readonly number[];
  readonly expectedContent?: string;
  readonly timeoutMs: number;
  readonly intervalMs: number;
  readonly followRedirects: boolean;
}

export type AlertTrigger =
  | { readonly type: typeof TRIGGER_TYPES.CONSECUTIVE_FAILURES; readonly count: number }
  | { readonly type: typeof TRIGGER_TYPES.RESPONSE_TIME_MS; readonly thresholdMs: number }
  | { readonly type: typeof TRIGGER_TYPES.HEALTH_SCORE_BELOW; readonly score: number }
  | { readonly type: typeof TRIGGER_TYPES.CERT_EXPIRING_DAYS; readonly days: number };

export interface AlertRule {
  readonly name: string;
  readonly webhookUrl: string;
  readonly triggers: readonly AlertTrigger[];
  readonly cooldownMs: number;
}

export interface MonitorSettings {
  readonly outputFormat: OutputFormat;
  readonly enableColors: boolean;
  readonly logFile?: string;
  /** Consecutive failures at which a target is classified unhealthy */
  readonly unhealthyAfterFailures: number;
  readonly reportIntervalMs: number;
  readonly checkCertificates: boolean;
  readonly webhookTimeoutMs: number;
}

export interface MonitorConfig {
  readonly targets: readonly Target[];
  readonly settings: MonitorSettings;
  readonly alerts: readonly AlertRule[];
}

// ============================================
// Monitor file (snake_case on disk)
// ============================================

const TargetFileSchema = z.object({
  name: z.string().trim().min(1),
  url: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'URL must use http or https' }),
  method: z
    .string()
    .default('GET')
    .transform((method) => method.toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
  headers: z.record(z.string()).default({}),
  expected_status: z.array(z.number().int().min(100).max(599)).default([]),
  expected_content: z.string().min(1).optional(),
  // Fall back to settings.default_timeout / default_interval
  timeout_seconds: z.number().positive().optional(),
  interval_seconds: z.number().positive().optional(),
  follow_redirects: z.boolean().default(false),
});

const SettingsFileSchema = z.object({
  default_interval: z.number().positive().default(MONITOR_DEFAULTS.INTERVAL_SECONDS),
  default_timeout: z.number().positive().default(MONITOR_DEFAULTS.TIMEOUT_SECONDS),
  max_consecutive_failures: z.number().int().min(1).default(MONITOR_DEFAULTS.MAX_CONSECUTIVE_FAILURES),
  output_format: z.nativeEnum(OUTPUT_FORMATS).default(OUTPUT_FORMATS.PRETTY),
  enable_colors: z.boolean().default(true),
  log_file: z.string().min(1).optional(),
  report_interval_seconds: z.number().positive().default(MONITOR_DEFAULTS.REPORT_INTERVAL_SECONDS),
  check_certificates: z.boolean().default(false),
  webhook_timeout_seconds: z.number().positive().default(MONITOR_DEFAULTS.WEBHOOK_TIMEOUT_SECONDS),
});

// Each trigger is a single-key object, e.g. { "response_time_ms": 5000 }
const TriggerFileSchema = z.union([
  z
    .object({ consecutive_failures: z.number().int().min(1) })
    .strict()
    .transform((t): AlertTrigger => ({ type: TRIGGER_TYPES.CONSECUTIVE_FAILURES, count: t.consecutive_failures })),
  z
    .object({ response_time_ms: z.number().int().min(0) })
    .strict()
    .transform((t): AlertTrigger => ({ type: TRIGGER_TYPES.RESPONSE_TIME_MS, thresholdMs: t.response_time_ms })),
  z
    .object({ health_score_below: z.number().min(0).max(1) })
    .strict()
    .transform((t): AlertTrigger => ({ type: TRIGGER_TYPES.HEALTH_SCORE_BELOW, score: t.health_score_below })),
  z
    .object({ cert_expiring_days: z.number().int().min(0) })
    .strict()
    .transform((t): AlertTrigger => ({ type: TRIGGER_TYPES.CERT_EXPIRING_DAYS, days: t.cert_expiring_days })),
]);

const AlertFileSchema = z.object({
  name: z.string().trim().min(1),
  webhook_url: z.string().url(),
  trigger_on: z.array(TriggerFileSchema).min(1),
  cooldown_minutes: z.number().min(0).default(MONITOR_DEFAULTS.COOLDOWN_MINUTES),
});

/**
 * Report every name that appears more than once
 */
function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Convert a positive duration in seconds to whole milliseconds, never below 1.
 * A zero timeout disables the axios timeout and a zero interval spins.
 */
export const secondsToMs = (seconds: number): number => Math.max(1, Math.round(seconds * 1000));

export const MonitorFileSchema = z
  .object({
    targets: z.array(TargetFileSchema).min(1),
    settings: SettingsFileSchema.default({}),
    alerts: z.array(AlertFileSchema).default([]),
  })
  .superRefine((file, ctx) => {
    for (const name of findDuplicates(file.targets.map((t) => t.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['targets'], message: `Duplicate target name '${name}'` });
    }
    for (const name of findDuplicates(file.alerts.map((a) => a.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['alerts'], message: `Duplicate alert name '${name}'` });
    }
  })
  .transform((file): MonitorConfig => {
    const { settings } = file;

    return {
      targets: file.targets.map((target) => ({
        name: target.name,
        url: target.url,
        method: target.method,
        headers: target.headers,
        expectedStatus: target.expected_status,
        expectedContent: target.expected_content,
        timeoutMs: secondsToMs(target.timeout_seconds ?? settings.default_timeout),
        intervalMs: secondsToMs(target.interval_seconds ?? settings.default_interval),
        followRedirects: target.follow_redirects,
      })),
      settings: {
        outputFormat: settings.output_format,
        enableColors: settings.enable_colors,
        logFile: settings.log_file,
        unhealthyAfterFailures: settings.max_consecutive_failures,
        reportIntervalMs: secondsToMs(settings.report_interval_seconds),
        checkCertificates: settings.check_certificates,
        webhookTimeoutMs: secondsToMs(settings.webhook_timeout_seconds),
      },
      alerts: file.alerts.map((alert) => ({
        name: alert.name,
        webhookUrl: alert.webhook_url,
        triggers: alert.trigger_on,
        cooldownMs: alert.cooldown_minutes * 60 * 1000,
      })),
    };
  });

/** Shape of the monitor file as written on disk */
export type MonitorFile = z.input<typeof MonitorFileSchema>;
