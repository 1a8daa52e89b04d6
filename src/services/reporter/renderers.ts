import winston from 'winston';
import { HEALTH_STATUSES, OUTPUT_FORMATS, type HealthStatus, type OutputFormat } from '../../config/index.js';
import { formatClockTime } from '../../utils/time.js';
import type { HealthSnapshot } from '../healthMonitor/HealthAggregate.js';
import type { HealthCheck } from '../prober/index.js';

export const CSV_HEADER = 'timestamp,target,success,status_code,response_time_ms,error';

export const STATUS_SUMMARY_TITLE = '📊 Status Summary';
export const FINAL_SUMMARY_TITLE = '🏁 Final Summary';

const TABLE_WIDTH = 75;

export interface RenderOptions {
  colors: boolean;
}

// Reuses winston's level palette: info=green, warn=yellow, error=red
export type Tone = 'info' | 'warn' | 'error';

const colorizer = winston.format.colorize();

export function paint(text: string, tone: Tone | null, colors: boolean): string {
  if (!colors || tone === null) return text;
  return colorizer.colorize(tone, text);
}

export function statusCodeTone(code: number): Tone {
  if (code >= 200 && code < 300) return 'info';
  if (code >= 300 && code < 400) return 'warn';
  return 'error';
}

function responseTimeTone(ms: number): Tone {
  if (ms <= 200) return 'info';
  if (ms <= 1000) return 'warn';
  return 'error';
}

function statusTone(status: HealthStatus): Tone | null {
  switch (status) {
    case HEALTH_STATUSES.HEALTHY:
      return 'info';
    case HEALTH_STATUSES.DEGRADED:
      return 'warn';
    case HEALTH_STATUSES.UNHEALTHY:
      return 'error';
    case HEALTH_STATUSES.UNKNOWN:
      return null;
  }
}

function statusLabel(status: HealthStatus): string {
  return status.charAt(0).toUpperCase() + status.slice(1);
}

/**
 * Whole milliseconds for display
 */
export function displayMs(ms: number): number {
  return Math.floor(ms);
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Escape a Prometheus label value
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export function renderPretty(check: HealthCheck, options: RenderOptions): string[] {
  const mark = check.success ? paint('✓', 'info', options.colors) : paint('✗', 'error', options.colors);
  const code =
    check.statusCode !== undefined
      ? paint(String(check.statusCode), statusCodeTone(check.statusCode), options.colors)
      : paint('ERROR', 'error', options.colors);
  const ms = displayMs(check.responseTimeMs);
  const time = paint(`${ms}ms`, responseTimeTone(ms), options.colors);

  const lines = [`[${formatClockTime(check.timestamp)}] ${mark} ${check.target} | ${code} | ${time}`];
  if (check.error !== undefined) {
    lines.push(`    Error: ${paint(check.error, 'error', options.colors)}`);
  }
  return lines;
}

export function renderJson(check: HealthCheck): string {
  return JSON.stringify({
    target: check.target,
    timestamp: check.timestamp.toISOString(),
    success: check.success,
    status_code: check.statusCode ?? null,
    response_time_ms: displayMs(check.responseTimeMs),
    error: check.error ?? null,
    cert_expires_days: check.certExpiresDays ?? null,
  });
}

export function renderCsv(check: HealthCheck): string {
  return [
    check.timestamp.toISOString(),
    escapeCsvField(check.target),
    String(check.success),
    check.statusCode !== undefined ? String(check.statusCode) : '',
    String(displayMs(check.responseTimeMs)),
    escapeCsvField(check.error ?? ''),
  ].join(',');
}

export function renderPrometheus(check: HealthCheck): string[] {
  const label = `{target="${escapeLabelValue(check.target)}"}`;
  const at = check.timestamp.getTime();
  return [
    `http_monitor_up${label} ${check.success ? 1 : 0} ${at}`,
    `http_monitor_response_time_ms${label} ${displayMs(check.responseTimeMs)} ${at}`,
  ];
}

/**
 * Render one check in the configured output format
 */
export function renderCheck(format: OutputFormat, check: HealthCheck, options: RenderOptions): string[] {
  switch (format) {
    case OUTPUT_FORMATS.PRETTY:
      return renderPretty(check, options);
    case OUTPUT_FORMATS.JSON:
      return [renderJson(check)];
    case OUTPUT_FORMATS.CSV:
      return [renderCsv(check)];
    case OUTPUT_FORMATS.PROMETHEUS:
      return renderPrometheus(check);
  }
}

function row(cells: [string, string, string, string, string]): string {
  const [target, status, uptime, avg, health] = cells;
  return `${target.padEnd(20)} ${status} ${uptime} ${avg} ${health}`.trimEnd();
}

/**
 * Human-readable table of target health. Not a machine-readable contract.
 */
export function renderStatusTable(
  snapshots: readonly HealthSnapshot[],
  options: RenderOptions & { title: string }
): string[] {
  const lines = [
    '',
    `${options.title}:`,
    row(['Target', 'Status'.padEnd(10), 'Uptime'.padEnd(11), 'Avg Response'.padEnd(17), 'Health']),
    '─'.repeat(TABLE_WIDTH),
  ];

  for (const snapshot of snapshots) {
    const uptime = snapshot.uptimePercentage !== null ? `${snapshot.uptimePercentage.toFixed(1)}%` : '-';
    const avg = snapshot.avgResponseTimeMs !== null ? `${displayMs(snapshot.avgResponseTimeMs)}ms` : '-';
    const status = paint(statusLabel(snapshot.status).padEnd(10), statusTone(snapshot.status), options.colors);

    lines.push(
      row([snapshot.name, status, uptime.padEnd(11), avg.padEnd(17), (snapshot.healthScore * 100).toFixed(1)])
    );
  }

  return lines;
}
