/**
 * File Logger
 *
 * Mirrors the console diagnostics into a JSON log file when the monitor
 * file sets `settings.log_file`. Uses winston's built-in file transport.
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { getLogger, logger } from './logger.js';

const log = logger('FileLogger');

/**
 * File logger configuration
 */
export interface FileLoggerConfig {
  filePath: string;
  maxSizeBytes: number;
  maxFiles: number;
}

const DEFAULT_CONFIG: Omit<FileLoggerConfig, 'filePath'> = {
  maxSizeBytes: 20 * 1024 * 1024, // 20MB
  maxFiles: 7,
};

/**
 * JSON format for file logging
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

let activeTransport: winston.transports.FileTransportInstance | null = null;

/**
 * Attach a file transport to the shared logger. Replaces any earlier one.
 */
export function initializeFileLogging(config: Pick<FileLoggerConfig, 'filePath'> & Partial<FileLoggerConfig>): string {
  const cfg: FileLoggerConfig = { ...DEFAULT_CONFIG, ...config };
  const resolved = path.resolve(cfg.filePath);
  const logDir = path.dirname(resolved);

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const base = getLogger();
  if (activeTransport) {
    base.remove(activeTransport);
  }

  activeTransport = new winston.transports.File({
    dirname: logDir,
    filename: path.basename(resolved),
    format: jsonFormat,
    maxsize: cfg.maxSizeBytes,
    maxFiles: cfg.maxFiles,
  });
  base.add(activeTransport);

  log.info('File logging initialized', { path: resolved });
  return resolved;
}

/**
 * Detach the file transport, if one is active
 */
export function closeFileLogging(): void {
  if (!activeTransport) return;
  getLogger().remove(activeTransport);
  activeTransport.close?.();
  activeTransport = null;
}
