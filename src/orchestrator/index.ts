/**
 * Orchestrator Module
 *
 * Components:
 * - ConnectionOrchestrator: owns devices and runs the scheduling loop
 * - HealthChecker: liveness probes
 * - Admission: priority + FIFO slot allocation
 */

export * from './types.js';

export { ConnectionOrchestrator, mergeConnectionConfig } from './orchestrator.js';

export { HealthChecker, probeTimeoutMs, type ProbeResult } from './health.js';

export {
  selectForAdmission,
  compareForAdmission,
  isEligible,
  occupiedSlots,
  type AdmissionLimits,
} from './admission.js';
