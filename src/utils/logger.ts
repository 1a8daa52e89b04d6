import winston from 'winston';
import { getConfig, type LogLevel } from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

// Custom log format
const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const componentStr = typeof component === 'string' ? `[${component}]` : '';
  const metaStr = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)}${metaStr}`;
});

function consoleFormat(colors: boolean): winston.Logform.Format {
  return colors
    ? combine(colorize({ all: true }), timestamp({ format: TIMESTAMP_FORMAT }), logFormat)
    : combine(timestamp({ format: TIMESTAMP_FORMAT }), logFormat);
}

// Diagnostics go to stderr so that check lines and tables own stdout
const consoleTransport = new winston.transports.Console({
  format: consoleFormat(true),
  stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
});

// Create the base logger
function createLogger(): winston.Logger {
  const config = getConfig();

  return winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), timestamp({ format: TIMESTAMP_FORMAT }), logFormat),
    transports: [consoleTransport],
    // Don't exit on handled exceptions
    exitOnError: false,
  });
}

// Singleton logger instance
let loggerInstance: winston.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

/**
 * Apply runtime choices from the CLI or the monitor file
 */
export function configureLogger(options: { level?: LogLevel; colors?: boolean }): void {
  const base = getLogger();
  if (options.level) {
    base.level = options.level;
  }
  if (options.colors !== undefined) {
    consoleTransport.format = consoleFormat(options.colors);
  }
}

/**
 * Logger interface for type safety
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(options: { component: string }): Logger;
}

/**
 * Wrapper class that implements the Logger interface
 */
export class ComponentLogger implements Logger {
  private logger: winston.Logger;
  private component: string;

  constructor(component: string) {
    this.component = component;
    this.logger = getLogger().child({ component });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  child(options: { component: string }): Logger {
    return new ComponentLogger(`${this.component}:${options.component}`);
  }
}

/**
 * Create a typed logger for a component
 */
export function logger(component: string): Logger {
  return new ComponentLogger(component);
}

/**
 * Render an error for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
