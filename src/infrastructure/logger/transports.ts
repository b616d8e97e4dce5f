/**
 * Logger Transports
 *
 * Winston formats and transports for the connection manager.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

// =============================================================================
// LEVELS
// =============================================================================

export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
} as const;

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'gray',
});

// =============================================================================
// FORMATS
// =============================================================================

/**
 * JSON format for structured logging
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Console format with colors and readable output
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
    const componentStr = component ? `[${String(component)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} ${componentStr} ${String(message)}${metaStr}`;
  })
);

// =============================================================================
// TRANSPORT FACTORY
// =============================================================================

export interface TransportOptions {
  logDir: string;
  level: string;
  retentionDays: number;
  logToConsole: boolean;
  logToFile: boolean;
}

/**
 * Creates all transports based on configuration.
 * Always returns at least one transport so winston never writes into the void.
 */
export function createTransports(options: TransportOptions): winston.transport[] {
  const transports: winston.transport[] = [];

  if (options.logToConsole) {
    transports.push(
      new winston.transports.Console({
        level: options.level,
        format: consoleFormat,
      })
    );
  }

  if (options.logToFile) {
    ensureDirectory(options.logDir);

    // Combined log (all levels)
    transports.push(
      new DailyRotateFile({
        dirname: options.logDir,
        filename: 'combined-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        level: options.level,
        format: jsonFormat,
        maxFiles: `${options.retentionDays}d`,
        maxSize: '100m',
        zippedArchive: true,
      })
    );

    // Error log (error level only)
    transports.push(
      new DailyRotateFile({
        dirname: options.logDir,
        filename: 'error-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: jsonFormat,
        maxFiles: `${options.retentionDays}d`,
        maxSize: '50m',
        zippedArchive: true,
      })
    );
  }

  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

/**
 * Creates a transport for component-specific logs
 */
export function createComponentTransport(
  options: TransportOptions,
  componentName: string
): winston.transport | null {
  if (!options.logToFile) {
    return null;
  }

  const componentLogDir = path.join(options.logDir, 'components');
  ensureDirectory(componentLogDir);

  return new DailyRotateFile({
    dirname: componentLogDir,
    filename: `${componentName}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    level: options.level,
    format: jsonFormat,
    maxFiles: `${options.retentionDays}d`,
    maxSize: '50m',
    zippedArchive: true,
  });
}

// =============================================================================
// HELPERS
// =============================================================================

function ensureDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
