/**
 * Structured Logger
 *
 * Logging infrastructure with:
 * - Structured JSON logging for analysis
 * - Daily file rotation
 * - Component-specific loggers
 * - Sensitive data sanitization
 */

import winston from 'winston';
import { getEnvConfig } from '../../config/env.js';
import { sanitizeObject } from '../../utils/formatting.js';
import {
  LOG_LEVELS,
  createTransports,
  createComponentTransport,
  type TransportOptions,
} from './transports.js';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = keyof typeof LOG_LEVELS;

export interface LogMeta {
  component?: string;
  [key: string]: unknown;
}

// =============================================================================
// SENSITIVE KEYS (for sanitization)
// =============================================================================

const SENSITIVE_KEYS = ['password', 'apiKey', 'token', 'secret', 'authorization', 'credential'];

const FALLBACK_OPTIONS: TransportOptions = {
  logDir: './data/logs',
  level: 'info',
  retentionDays: 14,
  logToConsole: true,
  logToFile: false,
};

// =============================================================================
// LOGGER CLASS
// =============================================================================

class Logger {
  private mainLogger: winston.Logger;
  private componentLoggers: Map<string, winston.Logger> = new Map();
  private options: TransportOptions;
  private initialized = false;

  constructor() {
    this.options = this.resolveOptions(false);
    this.mainLogger = this.createWinstonLogger(createTransports(this.options));
  }

  /**
   * Initializes the logger with configuration, enabling file transports.
   * Should be called after environment validation.
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }

    this.options = this.resolveOptions(true);
    this.mainLogger = this.createWinstonLogger(createTransports(this.options));

    // Component loggers are rebuilt lazily with the new options
    this.componentLoggers.clear();

    this.initialized = true;
    this.info('Logger initialized', { options: this.options });
  }

  /**
   * Gets a component-specific logger
   */
  getComponentLogger(componentName: string): ComponentLogger {
    return new ComponentLogger(() => this.resolveComponentLogger(componentName));
  }

  // ---------------------------------------------------------------------------
  // Logging Methods
  // ---------------------------------------------------------------------------

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  trace(message: string, meta?: LogMeta): void {
    this.log('trace', message, meta);
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.mainLogger.log(level, message, sanitizedMeta);
  }

  private resolveComponentLogger(componentName: string): winston.Logger {
    const existing = this.componentLoggers.get(componentName);
    if (existing) {
      return existing;
    }

    const transport = createComponentTransport(this.options, componentName);
    const transports: winston.transport[] = transport
      ? [transport, ...createTransports({ ...this.options, logToFile: false })]
      : createTransports(this.options);

    const componentLogger = this.createWinstonLogger(transports, { component: componentName });
    this.componentLoggers.set(componentName, componentLogger);
    return componentLogger;
  }

  private createWinstonLogger(
    transports: winston.transport[],
    defaultMeta?: Record<string, unknown>
  ): winston.Logger {
    return winston.createLogger({
      levels: LOG_LEVELS,
      level: this.options.level,
      defaultMeta,
      transports,
      exitOnError: false,
    });
  }

  /**
   * Reads logging options from the environment. File logging stays off until
   * `initialize()` so that importing a module never creates log directories.
   */
  private resolveOptions(allowFileLogging: boolean): TransportOptions {
    try {
      const env = getEnvConfig();
      return {
        logDir: env.LOG_DIR,
        level: env.LOG_LEVEL,
        retentionDays: env.LOG_RETENTION_DAYS,
        logToConsole: env.LOG_TO_CONSOLE,
        logToFile: allowFileLogging && env.LOG_TO_FILE,
      };
    } catch (error) {
      console.error('Invalid logging configuration, using defaults:', error);
      return FALLBACK_OPTIONS;
    }
  }
}

// =============================================================================
// COMPONENT LOGGER CLASS
// =============================================================================

/**
 * Logger instance for a specific component.
 * Automatically adds component name to all log entries.
 */
export class ComponentLogger {
  constructor(private resolve: () => winston.Logger) {}

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log('trace', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.resolve().log(level, message, sanitizedMeta);
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const logger = new Logger();

export const getComponentLogger = (name: string) => logger.getComponentLogger(name);
export const initializeLogger = () => logger.initialize();
