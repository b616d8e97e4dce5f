/**
 * Health Checker
 *
 * Liveness probes for devices with an established link. The checker only
 * talks to the transport and classifies the outcome; the orchestrator applies
 * the result to the owning ManagedConnection.
 */

import { getComponentLogger } from '../infrastructure/logger/index.js';
import { CapabilityUnavailableError, HealthCheckFailedError, getErrorMessage } from '../core/errors.js';
import { withTimeout } from '../utils/async.js';
import type { Clock, DeviceAddress, Timestamp } from '../core/types.js';
import type { ConnectionTransport } from '../connection/transport.js';
import type { ConnectionConfig } from '../connection/types.js';
import type { ManagedConnection } from '../connection/managed-connection.js';

// =============================================================================
// TYPES
// =============================================================================

const logger = getComponentLogger('HealthChecker');

export type ProbeResult =
  | { healthy: true; latencyMs: number }
  | { healthy: false; linkLost: boolean; message: string; latencyMs: number };

/**
 * Probe timeout: half the probe interval, at least 1 ms
 */
export function probeTimeoutMs(healthCheckIntervalMs: number): number {
  return Math.max(1, Math.floor(healthCheckIntervalMs / 2));
}

// =============================================================================
// HEALTH CHECKER CLASS
// =============================================================================

export class HealthChecker {
  constructor(
    private readonly transport: ConnectionTransport,
    private readonly clock: Clock
  ) {}

  /**
   * Whether a probe should be launched for this device now
   */
  isDue(connection: ManagedConnection, now: Timestamp): boolean {
    return (
      connection.isLinked &&
      !connection.probeInFlight &&
      connection.nextHealthCheckAt !== null &&
      connection.nextHealthCheckAt <= now
    );
  }

  /**
   * Runs one liveness probe. Resolves with the classified outcome; rejects
   * only with CapabilityUnavailableError.
   */
  async probe(
    address: DeviceAddress,
    config: ConnectionConfig,
    signal?: AbortSignal
  ): Promise<ProbeResult> {
    const start = this.clock();

    try {
      const linked = await this.transport.isConnected(address);
      if (!linked) {
        return {
          healthy: false,
          linkLost: true,
          message: 'transport reports link down',
          latencyMs: this.clock() - start,
        };
      }

      const timeoutMs = probeTimeoutMs(config.healthCheckIntervalMs);
      await withTimeout(
        this.transport.readCharacteristic(address, config.healthCharacteristicId),
        timeoutMs,
        () => new HealthCheckFailedError(address, `probe timed out after ${timeoutMs}ms`),
        signal
      );

      const latencyMs = this.clock() - start;
      logger.trace('Probe passed', { address, latencyMs });
      return { healthy: true, latencyMs };
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        throw error;
      }

      const message = getErrorMessage(error);
      logger.debug('Probe failed', { address, error: message });
      return { healthy: false, linkLost: false, message, latencyMs: this.clock() - start };
    }
  }
}
