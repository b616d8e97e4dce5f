/**
 * Admission Control
 *
 * Chooses which eligible devices start a connect attempt on this pass,
 * ordered by priority, then time queued, then registration order.
 */

import { PRIORITY_RANK } from '../config/constants.js';
import { ConnectionState, SLOT_HOLDING_STATES } from '../connection/types.js';
import type { ManagedConnection } from '../connection/managed-connection.js';
import type { Timestamp } from '../core/types.js';

export interface AdmissionLimits {
  maxConcurrentConnections: number;

  /** At most one connect attempt in flight across all devices */
  serializeConnectAttempts: boolean;
}

export function isEligible(connection: ManagedConnection, now: Timestamp): boolean {
  if (connection.connectInFlight) {
    return false;
  }

  switch (connection.state) {
    case ConnectionState.DISCONNECTED:
      return true;
    case ConnectionState.RECONNECTING:
      return connection.nextAttemptAt !== null && connection.nextAttemptAt <= now;
    default:
      return false;
  }
}

function queuedSince(connection: ManagedConnection): Timestamp {
  if (connection.state === ConnectionState.RECONNECTING) {
    return connection.nextAttemptAt ?? 0;
  }
  return connection.eligibleSince ?? 0;
}

export function compareForAdmission(a: ManagedConnection, b: ManagedConnection): number {
  return (
    PRIORITY_RANK[a.config.priority] - PRIORITY_RANK[b.config.priority] ||
    queuedSince(a) - queuedSince(b) ||
    a.sequence - b.sequence
  );
}

/**
 * Reconnecting devices already hold their slot and are admitted without
 * consuming a free one.
 */
export function selectForAdmission(
  connections: Iterable<ManagedConnection>,
  now: Timestamp,
  limits: AdmissionLimits
): ManagedConnection[] {
  const all = [...connections];

  let occupied = occupiedSlots(all);
  let inFlight = all.filter(c => c.connectInFlight).length;

  const candidates = all.filter(c => isEligible(c, now)).sort(compareForAdmission);
  const admitted: ManagedConnection[] = [];

  for (const candidate of candidates) {
    if (limits.serializeConnectAttempts && inFlight > 0) {
      break;
    }

    if (candidate.state === ConnectionState.RECONNECTING) {
      admitted.push(candidate);
      inFlight++;
      continue;
    }

    if (occupied < limits.maxConcurrentConnections) {
      admitted.push(candidate);
      occupied++;
      inFlight++;
    }
  }

  return admitted;
}

/**
 * Number of devices currently holding a slot
 */
export function occupiedSlots(connections: Iterable<ManagedConnection>): number {
  let count = 0;
  for (const connection of connections) {
    if (SLOT_HOLDING_STATES.has(connection.state)) {
      count++;
    }
  }
  return count;
}
