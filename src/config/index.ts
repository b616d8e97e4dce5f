/**
 * Configuration Module
 *
 * Combines validated environment variables and static defaults into the
 * options an orchestrator is built from.
 */

import { getEnvConfig, type EnvConfig } from './env.js';
import { DEFAULT_HEALTH_CHARACTERISTIC_ID } from './constants.js';
import type { ConnectionConfig } from '../connection/types.js';

// =============================================================================
// AGGREGATED CONFIG TYPE
// =============================================================================

export interface AppConfig {
  env: EnvConfig;

  orchestrator: {
    maxConcurrentConnections: number;
    tickIntervalMs: number;
    checkpointIntervalMs: number;
    reportIntervalMs: number;
    retryJitterRatio: number;
    serializeConnectAttempts: boolean;
  };

  stateFilePath: string;

  defaultConnectionConfig: ConnectionConfig;
}

/**
 * Builds the application config from the environment.
 */
export function getAppConfig(): AppConfig {
  const env = getEnvConfig();

  return {
    env,
    orchestrator: {
      maxConcurrentConnections: env.MAX_CONCURRENT_CONNECTIONS,
      tickIntervalMs: env.SCHEDULER_TICK_MS,
      checkpointIntervalMs: env.CHECKPOINT_INTERVAL_MS,
      reportIntervalMs: env.STABILITY_REPORT_INTERVAL_MS,
      retryJitterRatio: env.RETRY_JITTER_RATIO,
      serializeConnectAttempts: env.SERIALIZE_CONNECT_ATTEMPTS,
    },
    stateFilePath: env.STATE_FILE_PATH,
    defaultConnectionConfig: {
      maxRetries: env.DEFAULT_MAX_RETRIES,
      initialRetryDelayMs: env.DEFAULT_INITIAL_RETRY_DELAY_MS,
      maxRetryDelayMs: env.DEFAULT_MAX_RETRY_DELAY_MS,
      retryStrategy: env.DEFAULT_RETRY_STRATEGY,
      connectionTimeoutMs: env.DEFAULT_CONNECTION_TIMEOUT_MS,
      healthCheckIntervalMs: env.DEFAULT_HEALTH_CHECK_INTERVAL_MS,
      priority: env.DEFAULT_PRIORITY,
      maxConsecutiveFailures: env.DEFAULT_MAX_CONSECUTIVE_FAILURES,
      healthCharacteristicId: DEFAULT_HEALTH_CHARACTERISTIC_ID,
    },
  };
}

export { getEnvConfig, resetEnvConfig, type EnvConfig } from './env.js';
export * from './constants.js';
