/**
 * Entry Point Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createConnectionManager } from '../../src/index.js';
import { resetEnvConfig } from '../../src/config/index.js';
import { FakeTransport } from '../helpers/fake-transport.js';
import { MemoryStateStore } from '../helpers/memory-store.js';

describe('createConnectionManager', () => {
  beforeEach(() => {
    process.env.MAX_CONCURRENT_CONNECTIONS = '2';
    process.env.DEFAULT_PRIORITY = 'low';
    resetEnvConfig();
  });

  afterEach(() => {
    delete process.env.MAX_CONCURRENT_CONNECTIONS;
    delete process.env.DEFAULT_PRIORITY;
    resetEnvConfig();
  });

  it('should build an orchestrator from the environment', () => {
    const manager = createConnectionManager(new FakeTransport(), { store: new MemoryStateStore() });

    const status = manager.register('AA:BB');

    expect(status.config.priority).toBe('low');
    expect(manager.generateAnalyticsReport().aggregate.maxConcurrentConnections).toBe(2);
    expect(manager.running).toBe(false);
  });

  it('should let overrides win over the environment', () => {
    const manager = createConnectionManager(new FakeTransport(), {
      store: new MemoryStateStore(),
      maxConcurrentConnections: 1,
      defaultConfig: { priority: 'high' },
    });

    expect(manager.register('AA:BB').config.priority).toBe('high');
    expect(manager.generateAnalyticsReport().aggregate.maxConcurrentConnections).toBe(1);
  });
});
