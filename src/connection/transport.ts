/**
 * Transport Capability
 *
 * The radio layer this library drives. Implementations perform the actual
 * connect/read/disconnect operations; everything here is transport-agnostic.
 *
 * An implementation throws `CapabilityUnavailableError` when the adapter
 * itself is unreachable. Any other rejection from `connect` counts as a
 * refused connection, and any rejection from `readCharacteristic` as a
 * failed liveness probe.
 */

import type { DeviceAddress } from '../core/types.js';

export type DisconnectListener = (address: DeviceAddress) => void;

export interface ConnectionTransport {
  /**
   * Opens a link. Resolves `true` on success, `false` when the device refused.
   * The signal is aborted when the attempt is cancelled or times out.
   */
  connect(address: DeviceAddress, timeoutMs: number, signal?: AbortSignal): Promise<boolean>;

  disconnect(address: DeviceAddress): Promise<void>;

  readCharacteristic(address: DeviceAddress, characteristicId: string): Promise<Uint8Array>;

  isConnected(address: DeviceAddress): Promise<boolean> | boolean;

  /**
   * Optional hook for unsolicited link loss. Returns an unsubscribe function.
   */
  onDisconnect?(listener: DisconnectListener): () => void;
}
