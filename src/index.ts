/**
 * linkkeeper
 *
 * Connection lifecycle manager for short-range wireless peripherals:
 * per-device state machines, retry backoff, priority admission against a
 * concurrency budget, liveness probing, health analytics and durable state.
 */

import { getAppConfig } from './config/index.js';
import { initializeLogger, logger } from './infrastructure/logger/index.js';
import { ConnectionOrchestrator } from './orchestrator/orchestrator.js';
import { JsonStateStore } from './persistence/state-store.js';
import type { ConnectionTransport } from './connection/transport.js';
import type { OrchestratorOptions } from './orchestrator/types.js';

// =============================================================================
// PUBLIC API
// =============================================================================

export * from './core/types.js';
export * from './core/errors.js';
export * from './core/events.js';
export * from './connection/types.js';
export * from './connection/transport.js';
export * from './connection/retry-scheduler.js';
export { ManagedConnection, type StateChange, type RetryDelayFn } from './connection/managed-connection.js';
export * from './orchestrator/index.js';
export * from './analytics/index.js';
export * from './persistence/state-store.js';
export { getAppConfig, type AppConfig } from './config/index.js';
export { initializeLogger, getComponentLogger } from './infrastructure/logger/index.js';

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Builds an orchestrator from environment configuration, persisting to
 * `STATE_FILE_PATH`. `overrides` take precedence over the environment.
 */
export function createConnectionManager(
  transport: ConnectionTransport,
  overrides: OrchestratorOptions = {}
): ConnectionOrchestrator {
  const config = getAppConfig();
  initializeLogger();

  const orchestrator = new ConnectionOrchestrator(transport, {
    ...config.orchestrator,
    defaultConfig: config.defaultConnectionConfig,
    store: new JsonStateStore(config.stateFilePath),
    ...overrides,
  });

  logger.info('Connection manager created', {
    env: config.env.NODE_ENV,
    stateFilePath: config.stateFilePath,
    maxConcurrentConnections: overrides.maxConcurrentConnections ?? config.orchestrator.maxConcurrentConnections,
  });

  return orchestrator;
}
