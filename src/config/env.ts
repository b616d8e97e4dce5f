/**
 * Environment Configuration with Zod Validation
 *
 * Validates all environment variables on first use and provides
 * a type-safe configuration object.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { CONNECTION_PRIORITIES, RETRY_STRATEGIES } from '../connection/types.js';

// Load .env file
dotenv.config();

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/** `true`/`false`/`1`/`0`; z.coerce.boolean() would read "false" as true */
const envBoolean = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue)
    .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_DIR: z.string().default('./data/logs'),
  LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(14),
  LOG_TO_CONSOLE: envBoolean('true'),
  LOG_TO_FILE: envBoolean('false'),

  // Orchestrator
  STATE_FILE_PATH: z.string().min(1).default('./data/connection-state.json'),
  MAX_CONCURRENT_CONNECTIONS: z.coerce.number().int().positive().default(5),
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(500),
  CHECKPOINT_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  STABILITY_REPORT_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0),
  SERIALIZE_CONNECT_ATTEMPTS: envBoolean('false'),

  // Default per-device connection config
  DEFAULT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
  DEFAULT_INITIAL_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1_000),
  DEFAULT_MAX_RETRY_DELAY_MS: z.coerce.number().int().positive().default(60_000),
  DEFAULT_RETRY_STRATEGY: z.enum(RETRY_STRATEGIES).default('exponential'),
  DEFAULT_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DEFAULT_HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  DEFAULT_PRIORITY: z.enum(CONNECTION_PRIORITIES).default('medium'),
  DEFAULT_MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().positive().default(3),
});

// =============================================================================
// VALIDATION & EXPORT
// =============================================================================

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

/**
 * Validates and returns the environment configuration.
 * Caches the result for subsequent calls.
 *
 * @throws {Error} If any environment variable is invalid
 */
export function getEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  // Additional validation: retry delay bounds
  if (result.data.DEFAULT_INITIAL_RETRY_DELAY_MS > result.data.DEFAULT_MAX_RETRY_DELAY_MS) {
    throw new Error(
      'DEFAULT_INITIAL_RETRY_DELAY_MS must not exceed DEFAULT_MAX_RETRY_DELAY_MS'
    );
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Resets the cached configuration.
 * Useful for testing or when environment variables change.
 */
export function resetEnvConfig(): void {
  cachedConfig = null;
}
