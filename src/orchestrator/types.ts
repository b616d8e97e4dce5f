/**
 * Orchestrator Types
 *
 * Construction options and operation arguments for the connection orchestrator.
 */

import type { Clock, RandomSource } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import type { ConnectionConfigPatch } from '../connection/types.js';
import type { StateStore } from '../persistence/state-store.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface OrchestratorOptions {
  /** Slot budget for connecting/connected/degraded/reconnecting devices */
  maxConcurrentConnections?: number;

  /** Scheduling loop period while started */
  tickIntervalMs?: number;

  /** Periodic checkpoint period while started */
  checkpointIntervalMs?: number;

  /** Period of the fleet-wide stability_report event while started */
  reportIntervalMs?: number;

  /** Overrides merged over the built-in default connection config */
  defaultConfig?: ConnectionConfigPatch;

  /** Snapshot storage; checkpoints are skipped without one */
  store?: StateStore;

  eventBus?: EventBus;

  clock?: Clock;

  /** Used for retry jitter only */
  random?: RandomSource;

  /** Spread of retry delays, 0 disables jitter */
  retryJitterRatio?: number;

  /** Shared-adapter mode: one connect attempt in flight across all devices */
  serializeConnectAttempts?: boolean;
}

export interface ResolvedOrchestratorOptions {
  maxConcurrentConnections: number;
  tickIntervalMs: number;
  checkpointIntervalMs: number;
  reportIntervalMs: number;
  retryJitterRatio: number;
  serializeConnectAttempts: boolean;
}

export interface PauseOptions {
  /** Resume automatically after this long; open-ended when omitted */
  durationMs?: number;
}
