/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

const MANAGED_KEYS = [
  'MAX_CONCURRENT_CONNECTIONS',
  'SCHEDULER_TICK_MS',
  'RETRY_JITTER_RATIO',
  'SERIALIZE_CONNECT_ATTEMPTS',
  'STATE_FILE_PATH',
  'DEFAULT_INITIAL_RETRY_DELAY_MS',
  'DEFAULT_MAX_RETRY_DELAY_MS',
  'DEFAULT_RETRY_STRATEGY',
  'DEFAULT_PRIORITY',
  'DEFAULT_MAX_RETRIES',
] as const;

describe('Configuration Module', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of MANAGED_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(async () => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    const { resetEnvConfig } = await import('../../src/config/env.js');
    resetEnvConfig();
  });

  describe('Environment Validation', () => {
    it('should load defaults', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();

      const config = getEnvConfig();

      expect(config.NODE_ENV).toBe('test');
      expect(config.MAX_CONCURRENT_CONNECTIONS).toBe(5);
      expect(config.SCHEDULER_TICK_MS).toBe(500);
      expect(config.SERIALIZE_CONNECT_ATTEMPTS).toBe(false);
      expect(config.DEFAULT_RETRY_STRATEGY).toBe('exponential');
      expect(config.LOG_TO_CONSOLE).toBe(false);
    });

    it('should parse numeric and boolean values', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();
      process.env.MAX_CONCURRENT_CONNECTIONS = '2';
      process.env.RETRY_JITTER_RATIO = '0.25';
      process.env.SERIALIZE_CONNECT_ATTEMPTS = '1';

      const config = getEnvConfig();

      expect(config.MAX_CONCURRENT_CONNECTIONS).toBe(2);
      expect(config.RETRY_JITTER_RATIO).toBe(0.25);
      expect(config.SERIALIZE_CONNECT_ATTEMPTS).toBe(true);
    });

    it('should read "false" as false', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();
      process.env.SERIALIZE_CONNECT_ATTEMPTS = 'false';

      expect(getEnvConfig().SERIALIZE_CONNECT_ATTEMPTS).toBe(false);
    });

    it('should reject invalid values', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();
      process.env.MAX_CONCURRENT_CONNECTIONS = '0';
      process.env.DEFAULT_RETRY_STRATEGY = 'random';

      expect(() => getEnvConfig()).toThrow(/Environment validation failed/);
    });

    it('should reject an initial delay above the maximum', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();
      process.env.DEFAULT_INITIAL_RETRY_DELAY_MS = '5000';
      process.env.DEFAULT_MAX_RETRY_DELAY_MS = '1000';

      expect(() => getEnvConfig()).toThrow(
        'DEFAULT_INITIAL_RETRY_DELAY_MS must not exceed DEFAULT_MAX_RETRY_DELAY_MS'
      );
    });

    it('should cache until reset', async () => {
      const { getEnvConfig, resetEnvConfig } = await import('../../src/config/env.js');
      resetEnvConfig();

      const first = getEnvConfig();
      process.env.MAX_CONCURRENT_CONNECTIONS = '9';

      expect(getEnvConfig()).toBe(first);
      resetEnvConfig();
      expect(getEnvConfig().MAX_CONCURRENT_CONNECTIONS).toBe(9);
    });
  });

  describe('App Config', () => {
    it('should map the environment into orchestrator options', async () => {
      const { getAppConfig, resetEnvConfig, DEFAULT_HEALTH_CHARACTERISTIC_ID } = await import(
        '../../src/config/index.js'
      );
      resetEnvConfig();
      process.env.MAX_CONCURRENT_CONNECTIONS = '3';
      process.env.STATE_FILE_PATH = '/tmp/test-state.json';
      process.env.DEFAULT_PRIORITY = 'high';
      process.env.DEFAULT_MAX_RETRIES = '0';

      const config = getAppConfig();

      expect(config.orchestrator.maxConcurrentConnections).toBe(3);
      expect(config.orchestrator.checkpointIntervalMs).toBe(60_000);
      expect(config.orchestrator.reportIntervalMs).toBe(60_000);
      expect(config.stateFilePath).toBe('/tmp/test-state.json');
      expect(config.defaultConnectionConfig).toEqual({
        maxRetries: 0,
        initialRetryDelayMs: 1_000,
        maxRetryDelayMs: 60_000,
        retryStrategy: 'exponential',
        connectionTimeoutMs: 30_000,
        healthCheckIntervalMs: 30_000,
        priority: 'high',
        maxConsecutiveFailures: 3,
        healthCharacteristicId: DEFAULT_HEALTH_CHARACTERISTIC_ID,
      });
    });
  });

  describe('Constants', () => {
    it('should rank priorities high to low', async () => {
      const { PRIORITY_RANK } = await import('../../src/config/constants.js');

      expect(PRIORITY_RANK.high).toBeLessThan(PRIORITY_RANK.medium);
      expect(PRIORITY_RANK.medium).toBeLessThan(PRIORITY_RANK.low);
    });
  });
});
