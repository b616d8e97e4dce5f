/**
 * Connection Orchestrator
 *
 * Owns every ManagedConnection, enforces the concurrency budget and drives
 * each device's state machine from a single scheduling loop. Connect attempts
 * and liveness probes run as independent promises; the loop never waits on
 * one device before progressing another.
 */

import { z } from 'zod';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { formatDuration } from '../utils/formatting.js';
import { EventBus, type ConnectionEvent, type ConnectionEventListener, type DisconnectReason } from '../core/events.js';
import {
  AlreadyRegisteredError,
  CapabilityUnavailableError,
  ConfigurationError,
  ConnectionRefusedError,
  ConnectionTimeoutError,
  MaxRetriesExceededError,
  NotFoundError,
  getErrorMessage,
  isRecoverableError,
  wrapError,
} from '../core/errors.js';
import { systemClock, type Clock, type DeviceAddress, type RandomSource, type Timestamp } from '../core/types.js';
import {
  DEFAULT_CONNECTION_CONFIG,
  ORCHESTRATOR_DEFAULTS,
  STATE_SNAPSHOT_VERSION,
} from '../config/constants.js';
import {
  ManagedConnection,
  type RetryDelayFn,
  type StateChange,
} from '../connection/managed-connection.js';
import { applyJitter, computeRetryDelay, retryPolicyFromConfig } from '../connection/retry-scheduler.js';
import type { ConnectionTransport } from '../connection/transport.js';
import {
  connectionConfigPatchSchema,
  connectionConfigSchema,
  type ConnectionConfig,
  type ConnectionConfigPatch,
  type ConnectionStatus,
} from '../connection/types.js';
import { AnalyticsEngine, type AnalyticsReport } from '../analytics/index.js';
import {
  collapseState,
  restoredState,
  type StateSnapshot,
  type StateStore,
} from '../persistence/state-store.js';
import { withTimeout } from '../utils/async.js';
import { HealthChecker, type ProbeResult } from './health.js';
import { occupiedSlots, selectForAdmission } from './admission.js';
import type { OrchestratorOptions, PauseOptions, ResolvedOrchestratorOptions } from './types.js';

const logger = getComponentLogger('Orchestrator');

// =============================================================================
// OPTION VALIDATION
// =============================================================================

const optionsSchema = z.object({
  maxConcurrentConnections: z
    .number()
    .int()
    .positive()
    .default(ORCHESTRATOR_DEFAULTS.MAX_CONCURRENT_CONNECTIONS),
  tickIntervalMs: z.number().int().positive().default(ORCHESTRATOR_DEFAULTS.TICK_INTERVAL_MS),
  checkpointIntervalMs: z
    .number()
    .int()
    .positive()
    .default(ORCHESTRATOR_DEFAULTS.CHECKPOINT_INTERVAL_MS),
  reportIntervalMs: z
    .number()
    .int()
    .positive()
    .default(ORCHESTRATOR_DEFAULTS.STABILITY_REPORT_INTERVAL_MS),
  retryJitterRatio: z.number().min(0).max(1).default(ORCHESTRATOR_DEFAULTS.RETRY_JITTER_RATIO),
  serializeConnectAttempts: z.boolean().default(false),
});

const pauseDurationSchema = z.number().int().positive();

type ConnectFailure = { reason: 'timeout' | 'refused'; message: string };

type TransportOperation = 'connect' | 'disconnect' | 'probe';

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
}

/**
 * Validates a partial config and merges it over `base`.
 */
export function mergeConnectionConfig(base: ConnectionConfig, patch: unknown): ConnectionConfig {
  const patchResult = connectionConfigPatchSchema.safeParse(patch ?? {});
  if (!patchResult.success) {
    throw new ConfigurationError('Invalid connection config', {
      issues: describeIssues(patchResult.error),
    });
  }

  const overrides = Object.fromEntries(
    Object.entries(patchResult.data).filter(([, value]) => value !== undefined)
  );

  const merged = connectionConfigSchema.safeParse({ ...base, ...overrides });
  if (!merged.success) {
    throw new ConfigurationError('Invalid connection config', {
      issues: describeIssues(merged.error),
    });
  }

  return merged.data;
}

// =============================================================================
// CONNECTION ORCHESTRATOR
// =============================================================================

export class ConnectionOrchestrator {
  private readonly connections = new Map<DeviceAddress, ManagedConnection>();
  private readonly controllers = new Map<DeviceAddress, AbortController>();
  private readonly pending = new Set<Promise<void>>();

  private readonly options: ResolvedOrchestratorOptions;
  private readonly defaultConfig: ConnectionConfig;
  private readonly store: StateStore | null;
  private readonly eventBus: EventBus;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly healthChecker: HealthChecker;
  private readonly analytics = new AnalyticsEngine();

  private sequence = 0;
  private isRunning = false;
  private kickScheduled = false;
  private tickInterval: NodeJS.Timeout | null = null;
  private checkpointInterval: NodeJS.Timeout | null = null;
  private reportInterval: NodeJS.Timeout | null = null;
  private unsubscribeTransport: (() => void) | null = null;

  constructor(
    private readonly transport: ConnectionTransport,
    options: OrchestratorOptions = {}
  ) {
    const parsed = optionsSchema.safeParse({
      maxConcurrentConnections: options.maxConcurrentConnections,
      tickIntervalMs: options.tickIntervalMs,
      checkpointIntervalMs: options.checkpointIntervalMs,
      reportIntervalMs: options.reportIntervalMs,
      retryJitterRatio: options.retryJitterRatio,
      serializeConnectAttempts: options.serializeConnectAttempts,
    });
    if (!parsed.success) {
      throw new ConfigurationError('Invalid orchestrator options', {
        issues: describeIssues(parsed.error),
      });
    }

    this.options = parsed.data;
    this.defaultConfig = mergeConnectionConfig(DEFAULT_CONNECTION_CONFIG, options.defaultConfig);
    this.store = options.store ?? null;
    this.eventBus = options.eventBus ?? new EventBus();
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.healthChecker = new HealthChecker(transport, this.clock);
  }

  // ===========================================================================
  // REGISTRATION
  // ===========================================================================

  register(address: DeviceAddress, config?: ConnectionConfigPatch): ConnectionStatus {
    if (typeof address !== 'string' || address.length === 0) {
      throw new ConfigurationError('Device address must be a non-empty string', { address });
    }
    if (this.connections.has(address)) {
      throw new AlreadyRegisteredError(address);
    }

    const resolved = mergeConnectionConfig(this.defaultConfig, config);
    const now = this.clock();
    const connection = new ManagedConnection(address, resolved, this.sequence++, now);
    this.connections.set(address, connection);

    this.publish({ type: 'device_registered', address, timestamp: now, config: resolved, restored: false });
    logger.info('Device registered', { address, priority: resolved.priority });

    this.scheduleCheckpoint();
    this.kick();
    return connection.snapshot(now);
  }

  /**
   * Cancels pending work, drops any live link and forgets the device,
   * including its persisted record.
   */
  deregister(address: DeviceAddress): Promise<void> {
    const connection = this.getConnection(address);
    const now = this.clock();
    const wasLinked = connection.isLinked;
    const sessionMs = connection.currentSessionMs(now);

    this.abortWork(address);
    connection.cancelWork();
    this.connections.delete(address);

    if (wasLinked) {
      this.publishDisconnected(address, now, 'deregistered', sessionMs);
    }
    this.publish({ type: 'device_deregistered', address, timestamp: now });
    logger.info('Device deregistered', { address });

    this.kick();
    return this.finishDeregister(address, wasLinked);
  }

  // ===========================================================================
  // EXPLICIT CONTROL
  // ===========================================================================

  disable(address: DeviceAddress): Promise<ConnectionStatus> {
    const connection = this.getConnection(address);
    const now = this.clock();
    const wasLinked = connection.isLinked;
    const sessionMs = connection.currentSessionMs(now);

    const change = connection.disable(now);
    this.abortWork(address);

    this.publishStateChange(address, change, now);
    if (wasLinked) {
      this.publishDisconnected(address, now, 'disabled', sessionMs);
    }
    this.publish({ type: 'disabled', address, timestamp: now });
    logger.info('Device disabled', { address });

    this.scheduleCheckpoint();
    this.kick();
    return this.finishWithTeardown(connection, wasLinked);
  }

  enable(address: DeviceAddress): ConnectionStatus {
    const connection = this.getConnection(address);
    const now = this.clock();

    this.publishStateChange(address, connection.enable(now), now);
    this.publish({ type: 'enabled', address, timestamp: now });
    logger.info('Device enabled', { address });

    this.scheduleCheckpoint();
    this.kick();
    return connection.snapshot(now);
  }

  /**
   * Suspends the device. The retry counter is kept; a timed pause resumes
   * itself once `durationMs` has elapsed.
   */
  pause(address: DeviceAddress, options: PauseOptions = {}): Promise<ConnectionStatus> {
    const connection = this.getConnection(address);

    if (options.durationMs !== undefined && !pauseDurationSchema.safeParse(options.durationMs).success) {
      throw new ConfigurationError('Pause duration must be a positive integer', {
        address,
        durationMs: options.durationMs,
      });
    }

    const now = this.clock();
    const until = options.durationMs === undefined ? null : now + options.durationMs;
    const wasLinked = connection.isLinked;
    const sessionMs = connection.currentSessionMs(now);

    const change = connection.pause(now, until);
    this.abortWork(address);

    this.publishStateChange(address, change, now);
    if (wasLinked) {
      this.publishDisconnected(address, now, 'paused', sessionMs);
    }
    this.publish({ type: 'paused', address, timestamp: now, until });
    logger.info('Device paused', { address, until });

    this.scheduleCheckpoint();
    this.kick();
    return this.finishWithTeardown(connection, wasLinked);
  }

  resume(address: DeviceAddress): ConnectionStatus {
    const connection = this.getConnection(address);
    const now = this.clock();

    this.applyResume(connection, now, false);
    this.scheduleCheckpoint();
    this.kick();
    return connection.snapshot(now);
  }

  /**
   * Returns a failed device to the admission queue with a cleared retry counter.
   */
  reset(address: DeviceAddress): ConnectionStatus {
    const connection = this.getConnection(address);
    const now = this.clock();

    this.publishStateChange(address, connection.reset(now), now);
    this.publish({ type: 'device_reset', address, timestamp: now });
    logger.info('Device reset', { address });

    this.scheduleCheckpoint();
    this.kick();
    return connection.snapshot(now);
  }

  reconfigure(address: DeviceAddress, patch: ConnectionConfigPatch): ConnectionStatus {
    const connection = this.getConnection(address);
    const config = mergeConnectionConfig(connection.config, patch);
    const now = this.clock();

    connection.applyConfig(config);
    this.publish({ type: 'device_reconfigured', address, timestamp: now, config });
    logger.info('Device reconfigured', { address });

    this.scheduleCheckpoint();
    this.kick();
    return connection.snapshot(now);
  }

  /**
   * Reports an unsolicited link loss. Ignored unless the device is linked.
   */
  notifyDisconnected(address: DeviceAddress): void {
    const connection = this.getConnection(address);
    this.handleLinkLost(connection, this.clock());
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  status(address: DeviceAddress): ConnectionStatus {
    return this.getConnection(address).snapshot(this.clock());
  }

  /**
   * Every device in registration order
   */
  statusAll(): ConnectionStatus[] {
    const now = this.clock();
    return [...this.connections.values()].map(c => c.snapshot(now));
  }

  generateAnalyticsReport(): AnalyticsReport {
    return this.analytics.generateReport([...this.connections.values()], {
      now: this.clock(),
      maxConcurrentConnections: this.options.maxConcurrentConnections,
    });
  }

  /**
   * Publishes the current analytics report as a stability_report event.
   * Runs on `reportIntervalMs` while started.
   */
  publishStabilityReport(): AnalyticsReport {
    const report = this.generateAnalyticsReport();
    this.publish({ type: 'stability_report', timestamp: report.generatedAt, report });
    logger.debug('Stability report published', {
      devices: report.aggregate.deviceCount,
      averageHealthScore: report.aggregate.averageHealthScore,
    });
    return report;
  }

  subscribe(listener: ConnectionEventListener): () => void {
    return this.eventBus.subscribe(listener);
  }

  get events(): EventBus {
    return this.eventBus;
  }

  get running(): boolean {
    return this.isRunning;
  }

  get slotsInUse(): number {
    return occupiedSlots(this.connections.values());
  }

  // ===========================================================================
  // SCHEDULING
  // ===========================================================================

  /**
   * One scheduling pass. Resolves once the attempts and probes it launched
   * have settled; rejects with the first CapabilityUnavailableError among them.
   */
  async tick(): Promise<void> {
    const launched = this.schedulePass();
    if (launched.length === 0) {
      return;
    }

    const results = await Promise.allSettled(launched);
    for (const result of results) {
      if (result.status === 'rejected') {
        throw wrapError(result.reason);
      }
    }
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.unsubscribeTransport =
      this.transport.onDisconnect?.(address => {
        if (this.connections.has(address)) {
          this.notifyDisconnected(address);
        }
      }) ?? null;

    this.tickInterval = setInterval(() => this.runLoopTick(), this.options.tickIntervalMs);
    if (this.store) {
      this.checkpointInterval = setInterval(
        () => this.scheduleCheckpoint(),
        this.options.checkpointIntervalMs
      );
    }
    this.reportInterval = setInterval(() => {
      this.publishStabilityReport();
    }, this.options.reportIntervalMs);

    logger.info('Orchestrator started', {
      devices: this.connections.size,
      maxConcurrentConnections: this.options.maxConcurrentConnections,
    });

    this.runLoopTick();
  }

  /**
   * Checkpoints, cancels all in-flight work, drops live links and waits for
   * outstanding tasks to settle.
   */
  async stop(): Promise<void> {
    this.isRunning = false;
    this.stopPeriodicTasks();

    try {
      await this.checkpoint();
    } catch (error) {
      logger.error('Final checkpoint failed', { error: getErrorMessage(error) });
    }

    const now = this.clock();
    const links: DeviceAddress[] = [];

    for (const connection of this.connections.values()) {
      const wasLinked = connection.isLinked;
      const sessionMs = connection.currentSessionMs(now);

      this.abortWork(connection.address);
      const change = connection.shutdown(now);
      if (change) {
        this.publishStateChange(connection.address, change, now);
      }
      if (wasLinked) {
        this.publishDisconnected(connection.address, now, 'shutdown', sessionMs);
        links.push(connection.address);
      }
    }

    const results = await Promise.allSettled(links.map(address => this.teardownLink(address)));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn('Disconnect during shutdown failed', { error: getErrorMessage(result.reason) });
      }
    }

    await Promise.allSettled([...this.pending]);
    logger.info('Orchestrator stopped', { devices: this.connections.size, disconnected: links.length });
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  /**
   * Writes the current snapshot. A no-op without a store.
   */
  async checkpoint(): Promise<void> {
    if (!this.store) {
      return;
    }

    const snapshot = this.buildSnapshot(this.clock());
    await this.store.save(snapshot);
    logger.debug('Checkpoint written', { devices: snapshot.devices.length });
  }

  /**
   * Re-registers devices from the stored snapshot. Addresses already
   * registered are skipped.
   */
  async restore(): Promise<ConnectionStatus[]> {
    if (!this.store) {
      return [];
    }

    const snapshot = await this.store.load();
    if (!snapshot) {
      logger.info('No saved state to restore');
      return [];
    }

    const now = this.clock();
    const restored: ConnectionStatus[] = [];

    for (const record of snapshot.devices) {
      if (this.connections.has(record.address)) {
        logger.debug('Skipping restore of registered device', { address: record.address });
        continue;
      }

      const connection = new ManagedConnection(record.address, record.config, this.sequence++, now, {
        state: restoredState(record.state),
        metrics: record.metrics,
        pausedUntil: record.pausedUntil,
      });
      this.connections.set(record.address, connection);

      this.publish({
        type: 'device_registered',
        address: record.address,
        timestamp: now,
        config: record.config,
        restored: true,
      });
      restored.push(connection.snapshot(now));
    }

    logger.info('State restored', { devices: restored.length, savedAt: snapshot.savedAt });
    this.kick();
    return restored;
  }

  // ===========================================================================
  // SCHEDULING INTERNALS
  // ===========================================================================

  private schedulePass(): Promise<void>[] {
    const now = this.clock();
    this.expirePauses(now);

    const tasks: Promise<void>[] = [];

    for (const connection of this.connections.values()) {
      if (this.healthChecker.isDue(connection, now)) {
        tasks.push(this.launchProbe(connection));
      }
    }

    const admitted = selectForAdmission(this.connections.values(), now, {
      maxConcurrentConnections: this.options.maxConcurrentConnections,
      serializeConnectAttempts: this.options.serializeConnectAttempts,
    });
    for (const connection of admitted) {
      tasks.push(this.launchConnect(connection, now));
    }

    return tasks;
  }

  private expirePauses(now: Timestamp): void {
    for (const connection of this.connections.values()) {
      if (connection.pausedUntil !== null && connection.pausedUntil <= now) {
        this.applyResume(connection, now, true);
        this.scheduleCheckpoint();
      }
    }
  }

  private runLoopTick(): void {
    this.tick().catch((error: unknown) => this.logBackgroundFailure('Scheduling pass failed', error));
  }

  /**
   * Recoverable failures are retried by the next pass or interval and only warn.
   */
  private logBackgroundFailure(message: string, error: unknown): void {
    const meta = { error: getErrorMessage(error) };
    if (isRecoverableError(error)) {
      logger.warn(message, meta);
    } else {
      logger.error(message, meta);
    }
  }

  /**
   * Requests an immediate pass after a slot frees or is requested.
   */
  private kick(): void {
    if (!this.isRunning || this.kickScheduled) {
      return;
    }

    this.kickScheduled = true;
    setImmediate(() => {
      this.kickScheduled = false;
      if (this.isRunning) {
        this.runLoopTick();
      }
    });
  }

  private stopPeriodicTasks(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    if (this.reportInterval) {
      clearInterval(this.reportInterval);
      this.reportInterval = null;
    }
    if (this.checkpointInterval) {
      clearInterval(this.checkpointInterval);
      this.checkpointInterval = null;
    }
    if (this.unsubscribeTransport) {
      this.unsubscribeTransport();
      this.unsubscribeTransport = null;
    }
  }

  private track(task: Promise<void>): Promise<void> {
    this.pending.add(task);
    const forget = (): void => {
      this.pending.delete(task);
    };
    task.then(forget, forget);
    return task;
  }

  // ===========================================================================
  // CONNECT ATTEMPTS
  // ===========================================================================

  private launchConnect(connection: ManagedConnection, now: Timestamp): Promise<void> {
    const { address } = connection;
    const retryCount = connection.retryCount;
    const { change, epoch } = connection.beginAttempt(now);

    const controller = new AbortController();
    this.controllers.set(address, controller);

    this.publishStateChange(address, change, now);
    this.publish({ type: 'connection_attempt', address, timestamp: now, retryCount });
    logger.debug('Connect attempt started', { address, retryCount });

    return this.track(this.runConnect(connection, epoch, controller));
  }

  private async runConnect(
    connection: ManagedConnection,
    epoch: number,
    controller: AbortController
  ): Promise<void> {
    const { address } = connection;
    const timeoutMs = connection.config.connectionTimeoutMs;
    let failure: ConnectFailure | null = null;

    // The signal goes to the transport only: a link that comes up after
    // cancellation must still be seen so it can be torn down.
    const attempt = this.transport.connect(address, timeoutMs, controller.signal);
    try {
      const linked = await withTimeout(
        attempt,
        timeoutMs,
        () => new ConnectionTimeoutError(address, timeoutMs)
      );
      if (!linked) {
        failure = { reason: 'refused', message: new ConnectionRefusedError(address).message };
      }
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        this.handleCapabilityLoss(connection, epoch, 'connect', error);
        throw error;
      }
      if (error instanceof ConnectionTimeoutError) {
        controller.abort();
        this.watchTimedOutAttempt(address, attempt);
      }
      failure = {
        reason: error instanceof ConnectionTimeoutError ? 'timeout' : 'refused',
        message: getErrorMessage(error),
      };
    } finally {
      this.releaseController(address, controller);
    }

    if (!this.isCurrent(connection, epoch)) {
      if (failure === null) {
        await this.discardLateLink(address);
      }
      return;
    }

    const now = this.clock();

    if (failure === null) {
      const { change, connectTimeMs } = connection.recordConnectSuccess(now);
      this.publishStateChange(address, change, now);
      this.publish({ type: 'connection_success', address, timestamp: now, connectTimeMs });
      logger.info('Device connected', { address, connectTimeMs });
    } else {
      this.applyConnectFailure(connection, failure, now);
    }

    this.kick();
  }

  private applyConnectFailure(
    connection: ManagedConnection,
    failure: ConnectFailure,
    now: Timestamp
  ): void {
    const { address } = connection;
    const outcome = connection.recordConnectFailure(now, this.delayFor);
    const retryCount = connection.retryCount;

    this.publish({
      type: 'connection_failed',
      address,
      timestamp: now,
      reason: failure.reason,
      message: failure.message,
      retryCount,
      nextRetryDelayMs: outcome.kind === 'retry' ? outcome.delayMs : null,
    });
    for (const change of outcome.changes) {
      this.publishStateChange(address, change, now);
    }

    if (outcome.kind === 'retry') {
      logger.warn('Connect attempt failed', {
        address,
        reason: failure.reason,
        retryCount,
        retryIn: formatDuration(outcome.delayMs),
      });
      return;
    }

    this.publish({ type: 'max_retries_exceeded', address, timestamp: now, retryCount });
    logger.error('Device failed', {
      address,
      error: new MaxRetriesExceededError(address, connection.config.maxRetries).message,
    });
  }

  /**
   * A transport may ignore the abort and still bring the link up after the
   * attempt timed out; such a link is torn down once it appears.
   */
  private watchTimedOutAttempt(address: DeviceAddress, attempt: Promise<boolean>): void {
    attempt
      .then(linked => (linked ? this.discardLateLink(address) : undefined))
      .catch((error: unknown) => {
        logger.debug('Timed-out connect settled with an error', { address, error: getErrorMessage(error) });
      });
  }

  /**
   * A connect that succeeded after its attempt was cancelled
   */
  private async discardLateLink(address: DeviceAddress): Promise<void> {
    const current = this.connections.get(address);
    if (current && (current.isLinked || current.connectInFlight)) {
      return;
    }

    logger.debug('Tearing down link from cancelled attempt', { address });
    try {
      await this.transport.disconnect(address);
    } catch (error) {
      logger.warn('Failed to tear down late link', { address, error: getErrorMessage(error) });
    }
  }

  private readonly delayFor: RetryDelayFn = (attempt, config) => {
    const delayMs = computeRetryDelay(attempt, retryPolicyFromConfig(config));
    if (this.options.retryJitterRatio <= 0) {
      return delayMs;
    }

    const ceilingMs =
      config.retryStrategy === 'fixed' ? Number.POSITIVE_INFINITY : config.maxRetryDelayMs;
    return applyJitter(delayMs, this.options.retryJitterRatio, ceilingMs, this.random);
  };

  // ===========================================================================
  // LIVENESS
  // ===========================================================================

  private launchProbe(connection: ManagedConnection): Promise<void> {
    connection.probeInFlight = true;
    const controller = new AbortController();
    this.controllers.set(connection.address, controller);

    return this.track(this.runProbe(connection, connection.epoch, controller));
  }

  private async runProbe(
    connection: ManagedConnection,
    epoch: number,
    controller: AbortController
  ): Promise<void> {
    const { address } = connection;
    let result: ProbeResult;

    try {
      result = await this.healthChecker.probe(address, connection.config, controller.signal);
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        this.handleCapabilityLoss(connection, epoch, 'probe', error);
      }
      throw error;
    } finally {
      this.releaseController(address, controller);
    }

    if (!this.isCurrent(connection, epoch)) {
      return;
    }

    const now = this.clock();

    if (result.healthy) {
      const change = connection.recordHealthSuccess(now);
      this.publish({ type: 'health_check_success', address, timestamp: now, latencyMs: result.latencyMs });
      if (change) {
        this.publishStateChange(address, change, now);
        logger.info('Device recovered', { address });
      }
      return;
    }

    if (result.linkLost) {
      connection.probeInFlight = false;
      this.handleLinkLost(connection, now);
      return;
    }

    const sessionMs = connection.currentSessionMs(now);
    const { changes, reconnecting } = connection.recordHealthFailure(now, this.delayFor);

    this.publish({
      type: 'health_check_failed',
      address,
      timestamp: now,
      message: result.message,
      consecutiveFailures: connection.getMetrics().consecutiveHealthFailures,
    });
    for (const change of changes) {
      this.publishStateChange(address, change, now);
    }

    if (!reconnecting) {
      logger.warn('Liveness probe failed', { address, error: result.message });
      return;
    }

    this.publishDisconnected(address, now, 'health_check', sessionMs);
    logger.warn('Device unresponsive, reconnecting', { address, nextAttemptAt: connection.nextAttemptAt });

    this.kick();
    await this.teardownLink(address);
  }

  /**
   * Applies a link loss to a linked device. Returns false if it had no link.
   */
  private handleLinkLost(connection: ManagedConnection, now: Timestamp): boolean {
    if (!connection.isLinked) {
      return false;
    }

    const { address } = connection;
    const sessionMs = connection.currentSessionMs(now);

    this.abortWork(address);
    connection.cancelWork();
    const change = connection.recordLinkLost(now, this.delayFor);
    if (!change) {
      return false;
    }

    this.publishStateChange(address, change, now);
    this.publishDisconnected(address, now, 'link_lost', sessionMs);
    logger.warn('Link lost', { address, session: formatDuration(sessionMs), nextAttemptAt: connection.nextAttemptAt });

    this.kick();
    return true;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private getConnection(address: DeviceAddress): ManagedConnection {
    const connection = this.connections.get(address);
    if (!connection) {
      throw new NotFoundError(address);
    }
    return connection;
  }

  private isCurrent(connection: ManagedConnection, epoch: number): boolean {
    return this.connections.get(connection.address) === connection && connection.epoch === epoch;
  }

  private abortWork(address: DeviceAddress): void {
    const controller = this.controllers.get(address);
    if (controller) {
      this.controllers.delete(address);
      controller.abort();
    }
  }

  private releaseController(address: DeviceAddress, controller: AbortController): void {
    if (this.controllers.get(address) === controller) {
      this.controllers.delete(address);
    }
  }

  private applyResume(connection: ManagedConnection, now: Timestamp, automatic: boolean): void {
    this.publishStateChange(connection.address, connection.resume(now), now);
    this.publish({ type: 'resumed', address: connection.address, timestamp: now, automatic });
    logger.info('Device resumed', { address: connection.address, automatic });
  }

  /**
   * Issues transport.disconnect. A CapabilityUnavailableError is published
   * and rethrown; any other failure is logged.
   */
  private async teardownLink(address: DeviceAddress): Promise<void> {
    try {
      await this.transport.disconnect(address);
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        this.publish({
          type: 'capability_unavailable',
          address,
          timestamp: this.clock(),
          operation: 'disconnect',
          message: error.message,
        });
        throw error;
      }
      logger.warn('Disconnect failed', { address, error: getErrorMessage(error) });
    }
  }

  private async finishWithTeardown(
    connection: ManagedConnection,
    wasLinked: boolean
  ): Promise<ConnectionStatus> {
    if (wasLinked) {
      await this.teardownLink(connection.address);
    }
    return connection.snapshot(this.clock());
  }

  private async finishDeregister(address: DeviceAddress, wasLinked: boolean): Promise<void> {
    try {
      if (wasLinked) {
        await this.teardownLink(address);
      }
    } finally {
      if (this.store) {
        await this.store.remove(address);
      }
    }
  }

  private handleCapabilityLoss(
    connection: ManagedConnection,
    epoch: number,
    operation: TransportOperation,
    error: CapabilityUnavailableError
  ): void {
    const { address } = connection;
    const now = this.clock();

    if (this.isCurrent(connection, epoch)) {
      if (operation === 'connect') {
        this.publishStateChange(address, connection.abandonAttempt(now), now);
      } else {
        connection.deferHealthCheck(now);
      }
    }

    this.publish({ type: 'capability_unavailable', address, timestamp: now, operation, message: error.message });
    logger.error('Transport capability unavailable', { address, operation, error: getErrorMessage(error) });
  }

  private scheduleCheckpoint(): void {
    if (!this.store) {
      return;
    }

    this.checkpoint().catch((error: unknown) => this.logBackgroundFailure('Checkpoint failed', error));
  }

  private buildSnapshot(now: Timestamp): StateSnapshot {
    return {
      version: STATE_SNAPSHOT_VERSION,
      savedAt: now,
      devices: [...this.connections.values()].map(connection => ({
        address: connection.address,
        config: { ...connection.config },
        state: collapseState(connection.state),
        metrics: { ...connection.getMetrics(), totalConnectedMs: connection.connectedMs(now) },
        pausedUntil: connection.pausedUntil,
      })),
    };
  }

  private publish(event: ConnectionEvent): void {
    this.eventBus.publish(event);
  }

  private publishStateChange(address: DeviceAddress, change: StateChange, now: Timestamp): void {
    this.publish({ type: 'state_changed', address, timestamp: now, from: change.from, to: change.to });
  }

  private publishDisconnected(
    address: DeviceAddress,
    now: Timestamp,
    reason: DisconnectReason,
    sessionMs: number
  ): void {
    this.publish({ type: 'disconnected', address, timestamp: now, reason, sessionMs });
  }
}
