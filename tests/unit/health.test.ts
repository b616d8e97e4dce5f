/**
 * Health Checker Tests
 */

import { describe, it, expect } from '@jest/globals';
import { HealthChecker, probeTimeoutMs } from '../../src/orchestrator/health.js';
import { ManagedConnection } from '../../src/connection/managed-connection.js';
import { DEFAULT_CONNECTION_CONFIG } from '../../src/config/constants.js';
import { CapabilityUnavailableError } from '../../src/core/errors.js';
import type { ConnectionTransport } from '../../src/connection/transport.js';
import { FakeTransport } from '../helpers/fake-transport.js';
import { ManualClock } from '../helpers/manual-clock.js';

const config = { ...DEFAULT_CONNECTION_CONFIG, healthCheckIntervalMs: 40 };

describe('HealthChecker', () => {
  it('should derive the probe timeout from the interval', () => {
    expect(probeTimeoutMs(30_000)).toBe(15_000);
    expect(probeTimeoutMs(3)).toBe(1);
    expect(probeTimeoutMs(1)).toBe(1);
  });

  it('should only mark linked devices with an elapsed interval as due', () => {
    const clock = new ManualClock(0);
    const checker = new HealthChecker(new FakeTransport(), clock.now);
    const connection = new ManagedConnection('AA:BB', config, 0, 0);

    expect(checker.isDue(connection, 1_000)).toBe(false);

    connection.beginAttempt(0);
    connection.recordConnectSuccess(0);
    expect(checker.isDue(connection, 39)).toBe(false);
    expect(checker.isDue(connection, 40)).toBe(true);

    connection.probeInFlight = true;
    expect(checker.isDue(connection, 40)).toBe(false);
  });

  it('should pass when the characteristic is readable', async () => {
    const transport = new FakeTransport();
    await transport.connect('AA:BB', 100);
    const checker = new HealthChecker(transport, new ManualClock().now);

    await expect(checker.probe('AA:BB', config)).resolves.toEqual({ healthy: true, latencyMs: 0 });
  });

  it('should report a lost link without reading', async () => {
    const transport = new FakeTransport();
    const checker = new HealthChecker(transport, new ManualClock().now);

    const result = await checker.probe('AA:BB', config);

    expect(result).toEqual({
      healthy: false,
      linkLost: true,
      message: 'transport reports link down',
      latencyMs: 0,
    });
    expect(transport.readCalls).toHaveLength(0);
  });

  it('should fail a read that errors', async () => {
    const transport = new FakeTransport().setProbe('AA:BB', 'fail');
    await transport.connect('AA:BB', 100);
    const checker = new HealthChecker(transport, new ManualClock().now);

    const result = await checker.probe('AA:BB', config);

    expect(result).toEqual({
      healthy: false,
      linkLost: false,
      message: 'characteristic read failed',
      latencyMs: 0,
    });
  });

  it('should fail a read that outlives the probe timeout', async () => {
    const hanging: ConnectionTransport = {
      connect: async () => true,
      disconnect: async () => undefined,
      readCharacteristic: () => new Promise<Uint8Array>(() => undefined),
      isConnected: () => true,
    };
    const checker = new HealthChecker(hanging, new ManualClock().now);

    const result = await checker.probe('AA:BB', config);

    expect(result.healthy).toBe(false);
    expect(result.healthy === false && result.linkLost).toBe(false);
  });

  it('should rethrow an unavailable adapter', async () => {
    const transport = new FakeTransport().setProbe('AA:BB', 'unavailable');
    await transport.connect('AA:BB', 100);
    const checker = new HealthChecker(transport, new ManualClock().now);

    await expect(checker.probe('AA:BB', config)).rejects.toBeInstanceOf(CapabilityUnavailableError);
  });
});
