/**
 * Retry Scheduler
 *
 * Pure backoff calculation: (attempt, strategy, parameters) -> delay.
 */

import type { RandomSource } from '../core/types.js';
import type { ConnectionConfig, RetryStrategy } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RetryPolicy {
  strategy: RetryStrategy;
  initialDelayMs: number;
  maxDelayMs: number;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

/**
 * Calculates the delay before retry attempt `attempt` (0-indexed, counted
 * since the disconnect that started the retries).
 *
 * `fixed` ignores both the attempt number and `maxDelayMs`.
 */
export function computeRetryDelay(attempt: number, policy: RetryPolicy): number {
  const n = Math.max(0, Math.floor(attempt));

  switch (policy.strategy) {
    case 'exponential':
      return Math.min(policy.initialDelayMs * Math.pow(2, n), policy.maxDelayMs);
    case 'linear':
      return Math.min(policy.initialDelayMs * (n + 1), policy.maxDelayMs);
    case 'fixed':
      return policy.initialDelayMs;
  }
}

/**
 * Spreads a delay uniformly within ±ratio to desynchronize devices that fail together.
 * The result never exceeds `ceilingMs` and is never negative.
 */
export function applyJitter(
  delayMs: number,
  ratio: number,
  ceilingMs: number,
  random: RandomSource = Math.random
): number {
  if (ratio <= 0) {
    return delayMs;
  }

  const jitterRange = delayMs * ratio;
  const jittered = delayMs + (random() * 2 - 1) * jitterRange;

  return Math.round(Math.min(Math.max(jittered, 0), ceilingMs));
}

/**
 * Builds the retry policy carried by a connection config.
 */
export function retryPolicyFromConfig(config: ConnectionConfig): RetryPolicy {
  return {
    strategy: config.retryStrategy,
    initialDelayMs: config.initialRetryDelayMs,
    maxDelayMs: config.maxRetryDelayMs,
  };
}
