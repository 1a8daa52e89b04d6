import * as dotenv from 'dotenv';
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  EnvConfigSchema,
  MonitorFileSchema,
  type EnvConfig,
  type MonitorConfig,
  type MonitorFile,
} from './schema.js';

// Load environment variables
dotenv.config();

/**
 * Raised for any configuration problem. Fatal before monitoring starts.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Render zod issues as `path: message`
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/**
 * Build configuration object from environment variables
 */
function buildConfigFromEnv(): unknown {
  const env = process.env;

  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
    monitorConfigPath: env['MONITOR_CONFIG_PATH'] || 'monitor.yml',
    api: {
      enabled: parseBoolean(env['API_ENABLED'], false),
      port: parseNumber(env['API_PORT'], 9464),
    },
  };
}

/**
 * Validate and load configuration
 */
function loadConfig(): EnvConfig {
  const result = EnvConfigSchema.safeParse(buildConfigFromEnv());
  if (!result.success) {
    throw new ConfigError('Environment validation failed', formatIssues(result.error));
  }
  return result.data;
}

// Singleton config instance
let configInstance: EnvConfig | null = null;

/**
 * Get the environment configuration (lazy loaded)
 */
export function getConfig(): EnvConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration from environment (useful for testing)
 */
export function reloadConfig(): EnvConfig {
  configInstance = loadConfig();
  return configInstance;
}

/**
 * Validate an already-decoded monitor file
 */
export function parseMonitorConfig(raw: unknown): MonitorConfig {
  const result = MonitorFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Monitor configuration validation failed', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Read, decode and validate a YAML monitor file (JSON files load too)
 */
export async function loadMonitorConfig(path: string): Promise<MonitorConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read monitor configuration '${path}': ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Monitor configuration '${path}' is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseMonitorConfig(raw);
}

/**
 * Starter monitor file written by `init`
 */
export function exampleMonitorConfig(): MonitorFile {
  return {
    targets: [
      {
        name: 'Production API',
        url: 'https://api.example.com/health',
        method: 'GET',
        headers: {},
        expected_status: [200],
        expected_content: '"status":"ok"',
        timeout_seconds: 5,
        interval_seconds: 30,
      },
      {
        name: 'Main Website',
        url: 'https://example.com',
        method: 'GET',
        headers: {},
        expected_status: [200, 301, 302],
        timeout_seconds: 10,
        interval_seconds: 60,
      },
    ],
    settings: {
      default_interval: 60,
      default_timeout: 10,
      max_consecutive_failures: 3,
      output_format: 'pretty',
      enable_colors: true,
      report_interval_seconds: 30,
    },
    alerts: [
      {
        name: 'Slack Alerts',
        webhook_url: 'https://hooks.slack.com/services/YOUR/WEBHOOK/URL',
        trigger_on: [{ consecutive_failures: 3 }, { response_time_ms: 5000 }, { cert_expiring_days: 7 }],
        cooldown_minutes: 30,
      },
    ],
  };
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
