/**
 * Connection Analytics
 *
 * Derives a 0-100 health score and rule-based recommendations per device,
 * plus fleet-wide aggregates. Stateless: every report is recomputed from the
 * current ManagedConnection metrics.
 *
 * Score weights:
 * - Success rate: 40%
 * - Connection speed: 20%
 * - Failure freedom: 20%
 * - Uptime: 20%
 */

import {
  HEALTH_SCORE_WEIGHTS,
  RECOMMENDATION_THRESHOLDS,
  UPTIME_CEILING_MS,
} from '../config/constants.js';
import { ConnectionState, type ConnectionConfig, type ConnectionMetrics } from '../connection/types.js';
import type { ManagedConnection } from '../connection/managed-connection.js';
import type { DeviceAddress, Timestamp } from '../core/types.js';
import { occupiedSlots } from '../orchestrator/admission.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Sub-scores, each in [0, 1], and the weighted total in [0, 100]
 */
export interface HealthScoreBreakdown {
  successRate: number;
  speed: number;
  failureFreedom: number;
  uptime: number;
  total: number;
}

export interface DeviceHealthInput {
  state: ConnectionState;
  config: ConnectionConfig;
  metrics: ConnectionMetrics;

  /** Cumulative connected time including the live session */
  connectedMs: number;

  /** Time spent queued for admission, null when not queued */
  waitingMs: number | null;
}

export interface DeviceReport {
  address: DeviceAddress;
  state: ConnectionState;
  healthScore: number;
  breakdown: HealthScoreBreakdown;
  recommendations: string[];
}

export interface AggregateReport {
  deviceCount: number;
  averageSuccessRate: number;
  averageConnectTimeMs: number;
  averageHealthScore: number;
  stateCounts: Record<ConnectionState, number>;
  occupiedSlots: number;
  maxConcurrentConnections: number;
  recommendations: string[];
}

export interface AnalyticsReport {
  generatedAt: Timestamp;
  devices: DeviceReport[];
  aggregate: AggregateReport;
}

export interface ReportContext {
  now: Timestamp;
  maxConcurrentConnections: number;
}

// =============================================================================
// RECOMMENDATION TEXT
// =============================================================================

export const RECOMMENDATION_NO_DATA = 'no data';

export const RECOMMENDATIONS = {
  FAILED: 'device exhausted its retries; reset it once the cause is resolved',
  LOW_SUCCESS_RATE: 'investigate signal quality or retry configuration',
  SLOW_CONNECT: 'average connect time is close to the timeout; consider raising connectionTimeoutMs',
  LINK_INSTABILITY: 'repeated connect failures suggest an unstable link; check device range and power',
  PROBE_FAILURES: 'liveness probes fail often; lengthen healthCheckIntervalMs or check link stability',
  PRIORITY_CONTENTION:
    'device has waited over a minute for a connection slot; raise its priority or maxConcurrentConnections',
  CAPABILITY_EXHAUSTED:
    'all connection slots are in use with devices waiting; raise maxConcurrentConnections',
  FLEET_LOW_SUCCESS_RATE: 'fleet-wide success rate is below 50%; check the adapter and radio environment',
} as const;

// =============================================================================
// SCORING
// =============================================================================

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function successRate(metrics: ConnectionMetrics): number {
  return metrics.totalAttempts === 0 ? 0 : metrics.successfulConnections / metrics.totalAttempts;
}

/**
 * Calculates the health score (0-100) for one device
 */
export function calculateHealthScore(input: DeviceHealthInput): HealthScoreBreakdown {
  const { metrics, config } = input;

  if (metrics.totalAttempts === 0) {
    return { successRate: 0, speed: 0, failureFreedom: 0, uptime: 0, total: 0 };
  }

  const rate = successRate(metrics);

  // Faster than the timeout scores higher; no successful connect scores 0
  const speed =
    metrics.successfulConnections === 0
      ? 0
      : clamp(1 - metrics.averageConnectTimeMs / config.connectionTimeoutMs, 0, 1);

  const failureFreedom =
    1 - Math.min(metrics.consecutiveFailures / config.maxConsecutiveFailures, 1);

  const uptime = Math.min(input.connectedMs / UPTIME_CEILING_MS, 1);

  const weighted =
    HEALTH_SCORE_WEIGHTS.SUCCESS_RATE * rate +
    HEALTH_SCORE_WEIGHTS.CONNECTION_SPEED * speed +
    HEALTH_SCORE_WEIGHTS.FAILURE_FREEDOM * failureFreedom +
    HEALTH_SCORE_WEIGHTS.UPTIME * uptime;

  return {
    successRate: rate,
    speed,
    failureFreedom,
    uptime,
    total: clamp(roundToTenth(100 * weighted), 0, 100),
  };
}

/**
 * Rule-based recommendations, most severe first
 */
export function buildRecommendations(input: DeviceHealthInput): string[] {
  const { metrics, config, state } = input;

  if (metrics.totalAttempts === 0) {
    return [RECOMMENDATION_NO_DATA];
  }

  const recommendations: string[] = [];
  const t = RECOMMENDATION_THRESHOLDS;

  if (state === ConnectionState.FAILED) {
    recommendations.push(RECOMMENDATIONS.FAILED);
  }

  if (successRate(metrics) < t.LOW_SUCCESS_RATE) {
    recommendations.push(RECOMMENDATIONS.LOW_SUCCESS_RATE);
  }

  if (
    metrics.successfulConnections > 0 &&
    metrics.averageConnectTimeMs > config.connectionTimeoutMs * t.SLOW_CONNECT_RATIO
  ) {
    recommendations.push(RECOMMENDATIONS.SLOW_CONNECT);
  }

  if (metrics.consecutiveFailures >= config.maxConsecutiveFailures) {
    recommendations.push(RECOMMENDATIONS.LINK_INSTABILITY);
  }

  const probes = metrics.healthChecksPassed + metrics.healthChecksFailed;
  if (probes >= t.MIN_PROBES && metrics.healthChecksFailed / probes > t.PROBE_FAILURE_RATIO) {
    recommendations.push(RECOMMENDATIONS.PROBE_FAILURES);
  }

  if (input.waitingMs !== null && input.waitingMs > t.SLOT_WAIT_WARNING_MS) {
    recommendations.push(RECOMMENDATIONS.PRIORITY_CONTENTION);
  }

  return recommendations;
}

// =============================================================================
// ANALYTICS ENGINE
// =============================================================================

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function emptyStateCounts(): Record<ConnectionState, number> {
  return {
    [ConnectionState.DISCONNECTED]: 0,
    [ConnectionState.CONNECTING]: 0,
    [ConnectionState.CONNECTED]: 0,
    [ConnectionState.DEGRADED]: 0,
    [ConnectionState.RECONNECTING]: 0,
    [ConnectionState.FAILED]: 0,
    [ConnectionState.DISABLED]: 0,
    [ConnectionState.PAUSED]: 0,
  };
}

export class AnalyticsEngine {
  /**
   * Scoring input for one managed device at `now`
   */
  describe(connection: ManagedConnection, now: Timestamp): DeviceHealthInput {
    const { eligibleSince } = connection;
    const queued = connection.state === ConnectionState.DISCONNECTED && eligibleSince !== null;

    return {
      state: connection.state,
      config: connection.config,
      metrics: connection.getMetrics(),
      connectedMs: connection.connectedMs(now),
      waitingMs: queued ? now - eligibleSince : null,
    };
  }

  analyzeDevice(connection: ManagedConnection, now: Timestamp): DeviceReport {
    const input = this.describe(connection, now);
    const breakdown = calculateHealthScore(input);

    return {
      address: connection.address,
      state: connection.state,
      healthScore: breakdown.total,
      breakdown,
      recommendations: buildRecommendations(input),
    };
  }

  generateReport(connections: readonly ManagedConnection[], context: ReportContext): AnalyticsReport {
    const devices = connections.map(c => this.analyzeDevice(c, context.now));

    const stateCounts = emptyStateCounts();
    for (const connection of connections) {
      stateCounts[connection.state]++;
    }

    const active = connections.filter(c => c.state !== ConnectionState.DISABLED);
    const activeReports = devices.filter(d => d.state !== ConnectionState.DISABLED);
    const activeMetrics = active.map(c => c.getMetrics());

    const averageSuccessRate = average(
      activeMetrics.filter(m => m.totalAttempts > 0).map(m => successRate(m))
    );
    const averageConnectTimeMs = average(
      activeMetrics.filter(m => m.successfulConnections > 0).map(m => m.averageConnectTimeMs)
    );
    const averageHealthScore = roundToTenth(average(activeReports.map(d => d.healthScore)));

    const occupied = occupiedSlots(connections);
    const recommendations: string[] = [];

    if (
      occupied >= context.maxConcurrentConnections &&
      active.some(c => c.state === ConnectionState.DISCONNECTED)
    ) {
      recommendations.push(RECOMMENDATIONS.CAPABILITY_EXHAUSTED);
    }

    if (
      activeMetrics.some(m => m.totalAttempts > 0) &&
      averageSuccessRate < RECOMMENDATION_THRESHOLDS.LOW_SUCCESS_RATE
    ) {
      recommendations.push(RECOMMENDATIONS.FLEET_LOW_SUCCESS_RATE);
    }

    return {
      generatedAt: context.now,
      devices,
      aggregate: {
        deviceCount: connections.length,
        averageSuccessRate,
        averageConnectTimeMs,
        averageHealthScore,
        stateCounts,
        occupiedSlots: occupied,
        maxConcurrentConnections: context.maxConcurrentConnections,
        recommendations,
      },
    };
  }
}
