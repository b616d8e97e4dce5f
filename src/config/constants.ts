/**
 * Constants Configuration
 *
 * Static defaults and thresholds used throughout the connection manager.
 */

import type { ConnectionConfig, ConnectionPriority } from '../connection/types.js';

// =============================================================================
// CONNECTION DEFAULTS
// =============================================================================

/**
 * GATT Device Name characteristic, readable on practically every peripheral
 */
export const DEFAULT_HEALTH_CHARACTERISTIC_ID = '00002a00-0000-1000-8000-00805f9b34fb';

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  maxRetries: 5,
  initialRetryDelayMs: 1_000,
  maxRetryDelayMs: 60_000,
  retryStrategy: 'exponential',
  connectionTimeoutMs: 30_000,
  healthCheckIntervalMs: 30_000,
  priority: 'medium',
  maxConsecutiveFailures: 3,
  healthCharacteristicId: DEFAULT_HEALTH_CHARACTERISTIC_ID,
};

// =============================================================================
// ORCHESTRATOR DEFAULTS
// =============================================================================

export const ORCHESTRATOR_DEFAULTS = {
  MAX_CONCURRENT_CONNECTIONS: 5,
  TICK_INTERVAL_MS: 500,
  CHECKPOINT_INTERVAL_MS: 60_000,
  STABILITY_REPORT_INTERVAL_MS: 60_000,
  RETRY_JITTER_RATIO: 0,
} as const;

/**
 * Admission order, lower rank is admitted first
 */
export const PRIORITY_RANK: Record<ConnectionPriority, number> = {
  high: 0,
  medium: 1,
  low: 2,
};

// =============================================================================
// HEALTH SCORING
// =============================================================================

export const HEALTH_SCORE_WEIGHTS = {
  SUCCESS_RATE: 0.4,
  CONNECTION_SPEED: 0.2,
  FAILURE_FREEDOM: 0.2,
  UPTIME: 0.2,
} as const;

/** Connected time at which the uptime sub-score saturates (one hour) */
export const UPTIME_CEILING_MS = 3_600_000;

export const RECOMMENDATION_THRESHOLDS = {
  /** Success rate below which signal quality is questioned */
  LOW_SUCCESS_RATE: 0.5,

  /** Average connect time as a fraction of the timeout that suggests tuning */
  SLOW_CONNECT_RATIO: 0.75,

  /** Share of failed liveness probes that flags an unstable link */
  PROBE_FAILURE_RATIO: 0.25,

  /** Probes needed before the probe failure ratio is trusted */
  MIN_PROBES: 4,

  /** Time queued for a slot before contention is reported */
  SLOT_WAIT_WARNING_MS: 60_000,
} as const;

// =============================================================================
// PERSISTENCE
// =============================================================================

export const STATE_SNAPSHOT_VERSION = 1;
