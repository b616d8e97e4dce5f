/**
 * Managed Connection
 *
 * Per-device state machine, retry counter, scheduling bookkeeping and
 * accumulated metrics. Holds no transport resources: the orchestrator makes
 * every transport call and reports the outcome here.
 *
 * Every in-flight connect attempt or probe is stamped with the device epoch.
 * Cancelling operations bump the epoch, so a late result can be recognised
 * and discarded by comparing epochs.
 */

import { InvalidStateTransitionError } from '../core/errors.js';
import type { DeviceAddress, Timestamp } from '../core/types.js';
import {
  ConnectionState,
  LINKED_STATES,
  SLOT_HOLDING_STATES,
  createEmptyMetrics,
  type ConnectionConfig,
  type ConnectionMetrics,
  type ConnectionStatus,
} from './types.js';

// =============================================================================
// TRANSITION TABLE
// =============================================================================

const ALLOWED_TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  [ConnectionState.DISCONNECTED]: [
    ConnectionState.CONNECTING,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.CONNECTING]: [
    ConnectionState.CONNECTED,
    ConnectionState.RECONNECTING,
    ConnectionState.FAILED,
    ConnectionState.DISCONNECTED,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.CONNECTED]: [
    ConnectionState.DEGRADED,
    ConnectionState.RECONNECTING,
    ConnectionState.DISCONNECTED,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.DEGRADED]: [
    ConnectionState.CONNECTED,
    ConnectionState.RECONNECTING,
    ConnectionState.DISCONNECTED,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.RECONNECTING]: [
    ConnectionState.CONNECTING,
    ConnectionState.FAILED,
    ConnectionState.DISCONNECTED,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.FAILED]: [
    ConnectionState.DISCONNECTED,
    ConnectionState.DISABLED,
    ConnectionState.PAUSED,
  ],
  [ConnectionState.DISABLED]: [ConnectionState.DISCONNECTED, ConnectionState.PAUSED],
  [ConnectionState.PAUSED]: [ConnectionState.DISCONNECTED, ConnectionState.DISABLED],
};

// =============================================================================
// TYPES
// =============================================================================

export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
}

/** Maps a 0-indexed retry attempt to the delay before it */
export type RetryDelayFn = (attempt: number, config: ConnectionConfig) => number;

export type ConnectFailureOutcome =
  | { kind: 'retry'; changes: StateChange[]; delayMs: number }
  | { kind: 'exhausted'; changes: StateChange[] };

export interface RestoredConnection {
  state: ConnectionState;
  metrics: ConnectionMetrics;
  pausedUntil: Timestamp | null;
}

interface PreAttemptSnapshot {
  state: ConnectionState;
  eligibleSince: Timestamp | null;
  nextAttemptAt: Timestamp | null;
}

// =============================================================================
// MANAGED CONNECTION
// =============================================================================

export class ManagedConnection {
  readonly address: DeviceAddress;

  /** Registration order, last tie-breaker for admission */
  readonly sequence: number;

  private currentState: ConnectionState = ConnectionState.DISCONNECTED;
  private currentConfig: ConnectionConfig;
  private metrics: ConnectionMetrics;
  private currentEpoch = 0;

  /** Backoff waits scheduled since the current retry sequence began */
  private backoffStep: number;

  nextAttemptAt: Timestamp | null = null;
  eligibleSince: Timestamp | null;
  nextHealthCheckAt: Timestamp | null = null;
  connectedSince: Timestamp | null = null;
  pausedUntil: Timestamp | null = null;

  connectInFlight = false;
  probeInFlight = false;

  private attemptStartedAt: Timestamp | null = null;
  private preAttempt: PreAttemptSnapshot | null = null;

  constructor(
    address: DeviceAddress,
    config: ConnectionConfig,
    sequence: number,
    now: Timestamp,
    restored?: RestoredConnection
  ) {
    this.address = address;
    this.currentConfig = config;
    this.sequence = sequence;
    this.metrics = restored ? { ...restored.metrics } : createEmptyMetrics();
    this.backoffStep = this.metrics.retryCount;

    if (restored) {
      this.currentState = restored.state;
      if (restored.state === ConnectionState.PAUSED) {
        this.pausedUntil = restored.pausedUntil;
      }
    }

    this.eligibleSince = this.currentState === ConnectionState.DISCONNECTED ? now : null;
  }

  // ===========================================================================
  // ACCESSORS
  // ===========================================================================

  get state(): ConnectionState {
    return this.currentState;
  }

  get config(): ConnectionConfig {
    return this.currentConfig;
  }

  get epoch(): number {
    return this.currentEpoch;
  }

  get retryCount(): number {
    return this.metrics.retryCount;
  }

  get isLinked(): boolean {
    return LINKED_STATES.has(this.currentState);
  }

  /**
   * Cumulative connected time including the live session
   */
  connectedMs(now: Timestamp): number {
    return this.metrics.totalConnectedMs + this.currentSessionMs(now);
  }

  currentSessionMs(now: Timestamp): number {
    return this.connectedSince === null ? 0 : Math.max(0, now - this.connectedSince);
  }

  canTransition(to: ConnectionState): boolean {
    return ALLOWED_TRANSITIONS[this.currentState].includes(to);
  }

  // ===========================================================================
  // CONNECT ATTEMPTS
  // ===========================================================================

  /**
   * Moves an admitted device to CONNECTING. Returns the epoch the attempt runs under.
   */
  beginAttempt(now: Timestamp): { change: StateChange; epoch: number } {
    this.preAttempt = {
      state: this.currentState,
      eligibleSince: this.eligibleSince,
      nextAttemptAt: this.nextAttemptAt,
    };

    const change = this.transition(ConnectionState.CONNECTING, now);
    this.attemptStartedAt = now;
    this.connectInFlight = true;
    return { change, epoch: this.currentEpoch };
  }

  recordConnectSuccess(now: Timestamp): { change: StateChange; connectTimeMs: number } {
    const connectTimeMs = Math.max(0, now - (this.attemptStartedAt ?? now));
    const m = this.metrics;

    m.totalAttempts++;
    m.successfulConnections++;
    m.averageConnectTimeMs =
      (m.averageConnectTimeMs * (m.successfulConnections - 1) + connectTimeMs) /
      m.successfulConnections;
    m.lastConnectTimeMs = connectTimeMs;
    m.lastConnectedAt = now;
    m.consecutiveFailures = 0;
    m.retryCount = 0;
    m.consecutiveHealthFailures = 0;
    this.backoffStep = 0;

    this.finishAttempt();
    const change = this.transition(ConnectionState.CONNECTED, now);
    this.nextHealthCheckAt = now + this.currentConfig.healthCheckIntervalMs;

    return { change, connectTimeMs };
  }

  /**
   * Applies a failed or timed-out attempt. At the retry bound the device fails
   * instead of scheduling another attempt.
   */
  recordConnectFailure(now: Timestamp, delayFor: RetryDelayFn): ConnectFailureOutcome {
    const m = this.metrics;
    m.totalAttempts++;
    m.failedConnections++;
    m.consecutiveFailures++;
    m.lastFailureAt = now;
    this.finishAttempt();

    if (m.retryCount >= this.currentConfig.maxRetries) {
      return { kind: 'exhausted', changes: [this.transition(ConnectionState.FAILED, now)] };
    }

    m.retryCount++;
    const delayMs = this.nextBackoff(delayFor);
    const change = this.transition(ConnectionState.RECONNECTING, now);
    this.nextAttemptAt = now + delayMs;

    return { kind: 'retry', changes: [change], delayMs };
  }

  /**
   * Undoes an attempt that never reached the device (adapter unavailable).
   * No attempt or retry is counted.
   */
  abandonAttempt(now: Timestamp): StateChange {
    const previous = this.preAttempt ?? {
      state: ConnectionState.DISCONNECTED,
      eligibleSince: now,
      nextAttemptAt: null,
    };
    this.finishAttempt();

    const change = this.transition(previous.state, now);
    this.eligibleSince = previous.eligibleSince;
    this.nextAttemptAt = previous.nextAttemptAt;
    return change;
  }

  // ===========================================================================
  // LIVENESS
  // ===========================================================================

  recordHealthSuccess(now: Timestamp): StateChange | null {
    this.metrics.healthChecksPassed++;
    this.metrics.consecutiveHealthFailures = 0;
    this.probeInFlight = false;
    this.nextHealthCheckAt = now + this.currentConfig.healthCheckIntervalMs;

    if (this.currentState === ConnectionState.DEGRADED) {
      return this.transition(ConnectionState.CONNECTED, now);
    }
    return null;
  }

  /**
   * Probe could not run (adapter unavailable); try again next interval
   * without counting a result.
   */
  deferHealthCheck(now: Timestamp): void {
    this.probeInFlight = false;
    if (this.isLinked) {
      this.nextHealthCheckAt = now + this.currentConfig.healthCheckIntervalMs;
    }
  }

  /**
   * The first failure degrades a connected device; reaching
   * maxConsecutiveFailures moves it on to RECONNECTING.
   */
  recordHealthFailure(
    now: Timestamp,
    delayFor: RetryDelayFn
  ): { changes: StateChange[]; reconnecting: boolean } {
    const m = this.metrics;
    m.healthChecksFailed++;
    m.consecutiveHealthFailures++;
    this.probeInFlight = false;

    const changes: StateChange[] = [];
    if (this.currentState === ConnectionState.CONNECTED) {
      changes.push(this.transition(ConnectionState.DEGRADED, now));
    }

    if (m.consecutiveHealthFailures >= this.currentConfig.maxConsecutiveFailures) {
      changes.push(this.scheduleReconnect(now, delayFor));
      return { changes, reconnecting: true };
    }

    this.nextHealthCheckAt = now + this.currentConfig.healthCheckIntervalMs;
    return { changes, reconnecting: false };
  }

  /**
   * Unsolicited link loss. Returns null when the device had no live link.
   */
  recordLinkLost(now: Timestamp, delayFor: RetryDelayFn): StateChange | null {
    if (!this.isLinked) {
      return null;
    }
    return this.scheduleReconnect(now, delayFor);
  }

  // ===========================================================================
  // EXPLICIT OPERATIONS
  // ===========================================================================

  disable(now: Timestamp): StateChange {
    this.assertNotIn(ConnectionState.DISABLED, ConnectionState.DISABLED);
    this.cancelWork();
    return this.transition(ConnectionState.DISABLED, now);
  }

  enable(now: Timestamp): StateChange {
    this.assertIn(ConnectionState.DISABLED, ConnectionState.DISCONNECTED);
    this.metrics.retryCount = 0;
    this.backoffStep = 0;
    return this.transition(ConnectionState.DISCONNECTED, now);
  }

  pause(now: Timestamp, until: Timestamp | null): StateChange {
    this.assertNotIn(ConnectionState.PAUSED, ConnectionState.PAUSED);
    this.cancelWork();
    const change = this.transition(ConnectionState.PAUSED, now);
    this.pausedUntil = until;
    return change;
  }

  resume(now: Timestamp): StateChange {
    this.assertIn(ConnectionState.PAUSED, ConnectionState.DISCONNECTED);
    return this.transition(ConnectionState.DISCONNECTED, now);
  }

  reset(now: Timestamp): StateChange {
    this.assertIn(ConnectionState.FAILED, ConnectionState.DISCONNECTED);
    this.metrics.retryCount = 0;
    this.metrics.consecutiveFailures = 0;
    this.backoffStep = 0;
    return this.transition(ConnectionState.DISCONNECTED, now);
  }

  /**
   * Orchestrator shutdown: drops any live or pending link back to DISCONNECTED.
   * Returns null for devices resting in a stable state.
   */
  shutdown(now: Timestamp): StateChange | null {
    this.cancelWork();
    if (!SLOT_HOLDING_STATES.has(this.currentState)) {
      return null;
    }
    return this.transition(ConnectionState.DISCONNECTED, now);
  }

  /**
   * Invalidates in-flight work without changing state (deregistration).
   */
  cancelWork(): void {
    this.currentEpoch++;
    this.connectInFlight = false;
    this.probeInFlight = false;
    this.attemptStartedAt = null;
    this.preAttempt = null;
  }

  applyConfig(config: ConnectionConfig): void {
    this.currentConfig = config;
  }

  // ===========================================================================
  // SNAPSHOTS
  // ===========================================================================

  getMetrics(): ConnectionMetrics {
    return { ...this.metrics };
  }

  snapshot(now: Timestamp): ConnectionStatus {
    return {
      address: this.address,
      state: this.currentState,
      config: { ...this.currentConfig },
      metrics: this.getMetrics(),
      currentSessionMs: this.currentSessionMs(now),
      nextAttemptAt: this.nextAttemptAt,
      eligibleSince: this.eligibleSince,
      pausedUntil: this.pausedUntil,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private scheduleReconnect(now: Timestamp, delayFor: RetryDelayFn): StateChange {
    const change = this.transition(ConnectionState.RECONNECTING, now);
    this.nextAttemptAt = now + this.nextBackoff(delayFor);
    return change;
  }

  /**
   * A link loss opens the sequence at the first delay without spending a
   * retry, so later failures continue one step further along the curve.
   */
  private nextBackoff(delayFor: RetryDelayFn): number {
    return delayFor(this.backoffStep++, this.currentConfig);
  }

  private finishAttempt(): void {
    this.connectInFlight = false;
    this.attemptStartedAt = null;
    this.preAttempt = null;
  }

  private assertIn(required: ConnectionState, to: ConnectionState): void {
    if (this.currentState !== required) {
      throw new InvalidStateTransitionError(this.address, this.currentState, to);
    }
  }

  private assertNotIn(forbidden: ConnectionState, to: ConnectionState): void {
    if (this.currentState === forbidden) {
      throw new InvalidStateTransitionError(this.address, this.currentState, to);
    }
  }

  /**
   * Single mutation point for the state field; keeps session and queue
   * bookkeeping consistent with the state being entered.
   */
  private transition(to: ConnectionState, now: Timestamp): StateChange {
    const from = this.currentState;
    if (!this.canTransition(to)) {
      throw new InvalidStateTransitionError(this.address, from, to);
    }

    const wasLinked = LINKED_STATES.has(from);
    const willBeLinked = LINKED_STATES.has(to);

    if (wasLinked && !willBeLinked && this.connectedSince !== null) {
      const sessionMs = Math.max(0, now - this.connectedSince);
      this.metrics.totalConnectedMs += sessionMs;
      this.metrics.lastConnectionDurationMs = sessionMs;
      this.connectedSince = null;
    }
    if (!wasLinked && willBeLinked) {
      this.connectedSince = now;
    }

    if (!willBeLinked) {
      this.nextHealthCheckAt = null;
    }
    if (to !== ConnectionState.RECONNECTING) {
      this.nextAttemptAt = null;
    }
    if (to !== ConnectionState.PAUSED) {
      this.pausedUntil = null;
    }
    this.eligibleSince = to === ConnectionState.DISCONNECTED ? now : null;

    this.currentState = to;
    return { from, to };
  }
}
