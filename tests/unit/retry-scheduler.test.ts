/**
 * Retry Scheduler Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  applyJitter,
  computeRetryDelay,
  retryPolicyFromConfig,
  type RetryPolicy,
} from '../../src/connection/retry-scheduler.js';
import { DEFAULT_CONNECTION_CONFIG } from '../../src/config/constants.js';
import { RETRY_STRATEGIES } from '../../src/connection/types.js';

const policy = (strategy: RetryPolicy['strategy']): RetryPolicy => ({
  strategy,
  initialDelayMs: 1_000,
  maxDelayMs: 8_000,
});

describe('Retry Scheduler', () => {
  describe('computeRetryDelay', () => {
    it('should double exponential delays up to the ceiling', () => {
      const delays = [0, 1, 2, 3, 4, 5].map(n => computeRetryDelay(n, policy('exponential')));
      expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 8_000, 8_000]);
    });

    it('should grow linear delays by the initial delay', () => {
      const delays = [0, 1, 2, 7, 8, 20].map(n => computeRetryDelay(n, policy('linear')));
      expect(delays).toEqual([1_000, 2_000, 3_000, 8_000, 8_000, 8_000]);
    });

    it('should keep fixed delays constant', () => {
      const delays = [0, 1, 10].map(n => computeRetryDelay(n, policy('fixed')));
      expect(delays).toEqual([1_000, 1_000, 1_000]);
    });

    it('should treat negative and fractional attempts as whole attempts from zero', () => {
      expect(computeRetryDelay(-3, policy('exponential'))).toBe(1_000);
      expect(computeRetryDelay(1.7, policy('exponential'))).toBe(2_000);
    });

    it('should be non-decreasing and bounded for every strategy', () => {
      for (const strategy of RETRY_STRATEGIES) {
        let previous = 0;
        for (let n = 0; n < 40; n++) {
          const delay = computeRetryDelay(n, policy(strategy));
          expect(delay).toBeGreaterThanOrEqual(previous);
          expect(delay).toBeLessThanOrEqual(8_000);
          previous = delay;
        }
      }
    });

    it('should not overflow for very large attempts', () => {
      expect(computeRetryDelay(5_000, policy('exponential'))).toBe(8_000);
    });
  });

  describe('applyJitter', () => {
    it('should leave the delay untouched when the ratio is zero', () => {
      expect(applyJitter(4_000, 0, 8_000, () => 0.99)).toBe(4_000);
    });

    it('should spread the delay within the ratio', () => {
      expect(applyJitter(4_000, 0.25, 8_000, () => 0)).toBe(3_000);
      expect(applyJitter(4_000, 0.25, 8_000, () => 0.5)).toBe(4_000);
      expect(applyJitter(4_000, 0.25, 8_000, () => 1)).toBe(5_000);
    });

    it('should clamp to the ceiling', () => {
      expect(applyJitter(8_000, 0.5, 8_000, () => 1)).toBe(8_000);
    });
  });

  describe('retryPolicyFromConfig', () => {
    it('should map config fields to the policy', () => {
      expect(retryPolicyFromConfig(DEFAULT_CONNECTION_CONFIG)).toEqual({
        strategy: 'exponential',
        initialDelayMs: 1_000,
        maxDelayMs: 60_000,
      });
    });
  });
});
