/**
 * Connection Types
 *
 * Per-device configuration, lifecycle states and accumulated metrics.
 */

import { z } from 'zod';
import type { DeviceAddress, Timestamp } from '../core/types.js';

// =============================================================================
// CONNECTION STATE
// =============================================================================

/**
 * Lifecycle state of a managed device link
 */
export enum ConnectionState {
  /** Idle, eligible for admission */
  DISCONNECTED = 'disconnected',

  /** Connect attempt in flight */
  CONNECTING = 'connecting',

  /** Link up and passing liveness probes */
  CONNECTED = 'connected',

  /** Link up but the last liveness probe failed */
  DEGRADED = 'degraded',

  /** Link lost, waiting out the retry delay (holds its slot) */
  RECONNECTING = 'reconnecting',

  /** Retries exhausted; requires an explicit reset */
  FAILED = 'failed',

  /** Excluded from admission until enabled */
  DISABLED = 'disabled',

  /** Excluded from admission until resumed */
  PAUSED = 'paused',
}

/**
 * States that occupy one slot of the concurrency budget
 */
export const SLOT_HOLDING_STATES: ReadonlySet<ConnectionState> = new Set([
  ConnectionState.CONNECTING,
  ConnectionState.CONNECTED,
  ConnectionState.DEGRADED,
  ConnectionState.RECONNECTING,
]);

/**
 * States with a live transport link
 */
export const LINKED_STATES: ReadonlySet<ConnectionState> = new Set([
  ConnectionState.CONNECTED,
  ConnectionState.DEGRADED,
]);

// =============================================================================
// CONFIGURATION
// =============================================================================

export const RETRY_STRATEGIES = ['exponential', 'linear', 'fixed'] as const;
export type RetryStrategy = (typeof RETRY_STRATEGIES)[number];

export const CONNECTION_PRIORITIES = ['high', 'medium', 'low'] as const;
export type ConnectionPriority = (typeof CONNECTION_PRIORITIES)[number];

const connectionConfigShape = z.object({
  maxRetries: z.number().int().nonnegative(),
  initialRetryDelayMs: z.number().int().positive(),
  maxRetryDelayMs: z.number().int().positive(),
  retryStrategy: z.enum(RETRY_STRATEGIES),
  connectionTimeoutMs: z.number().int().positive(),
  healthCheckIntervalMs: z.number().int().positive(),
  priority: z.enum(CONNECTION_PRIORITIES),
  maxConsecutiveFailures: z.number().int().positive(),
  healthCharacteristicId: z.string().min(1),
});

export const connectionConfigSchema = connectionConfigShape.refine(
  config => config.initialRetryDelayMs <= config.maxRetryDelayMs,
  {
    message: 'initialRetryDelayMs must not exceed maxRetryDelayMs',
    path: ['initialRetryDelayMs'],
  }
);

/** Overrides accepted at registration and by reconfigure */
export const connectionConfigPatchSchema = connectionConfigShape.partial().strict();

/**
 * Per-device connection configuration
 */
export type ConnectionConfig = z.infer<typeof connectionConfigSchema>;
export type ConnectionConfigPatch = Partial<ConnectionConfig>;

// =============================================================================
// METRICS
// =============================================================================

/**
 * Accumulated per-device connection metrics
 */
export interface ConnectionMetrics {
  totalAttempts: number;
  successfulConnections: number;
  failedConnections: number;

  /** Connect failures since the last success */
  consecutiveFailures: number;

  /** Sum of all closed connected sessions */
  totalConnectedMs: number;

  /** Length of the most recently closed session */
  lastConnectionDurationMs: number;

  lastConnectedAt: Timestamp | null;
  lastFailureAt: Timestamp | null;

  /** Retry attempts since the link was last established */
  retryCount: number;

  /** Mean time from attempt start to established link */
  averageConnectTimeMs: number;
  lastConnectTimeMs: number | null;

  healthChecksPassed: number;
  healthChecksFailed: number;
  consecutiveHealthFailures: number;
}

export const connectionMetricsSchema = z.object({
  totalAttempts: z.number().int().nonnegative(),
  successfulConnections: z.number().int().nonnegative(),
  failedConnections: z.number().int().nonnegative(),
  consecutiveFailures: z.number().int().nonnegative(),
  totalConnectedMs: z.number().nonnegative(),
  lastConnectionDurationMs: z.number().nonnegative(),
  lastConnectedAt: z.number().nullable(),
  lastFailureAt: z.number().nullable(),
  retryCount: z.number().int().nonnegative(),
  averageConnectTimeMs: z.number().nonnegative(),
  lastConnectTimeMs: z.number().nonnegative().nullable(),
  healthChecksPassed: z.number().int().nonnegative(),
  healthChecksFailed: z.number().int().nonnegative(),
  consecutiveHealthFailures: z.number().int().nonnegative(),
}) satisfies z.ZodType<ConnectionMetrics>;

export function createEmptyMetrics(): ConnectionMetrics {
  return {
    totalAttempts: 0,
    successfulConnections: 0,
    failedConnections: 0,
    consecutiveFailures: 0,
    totalConnectedMs: 0,
    lastConnectionDurationMs: 0,
    lastConnectedAt: null,
    lastFailureAt: null,
    retryCount: 0,
    averageConnectTimeMs: 0,
    lastConnectTimeMs: null,
    healthChecksPassed: 0,
    healthChecksFailed: 0,
    consecutiveHealthFailures: 0,
  };
}

// =============================================================================
// STATUS SNAPSHOT
// =============================================================================

/**
 * Read-only view of a managed device
 */
export interface ConnectionStatus {
  address: DeviceAddress;
  state: ConnectionState;
  config: ConnectionConfig;
  metrics: ConnectionMetrics;

  /** Live session length, 0 when not linked */
  currentSessionMs: number;

  /** When the next connect attempt may start (reconnecting only) */
  nextAttemptAt: Timestamp | null;

  /** When the device joined the admission queue, null if not queued */
  eligibleSince: Timestamp | null;

  /** Timed pause expiry, null for open-ended pauses */
  pausedUntil: Timestamp | null;
}
