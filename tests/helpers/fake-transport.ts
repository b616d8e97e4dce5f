/**
 * In-process transport stand-in. Each address follows a scripted sequence of
 * connect outcomes, then falls back to its default behavior.
 */

import { CapabilityUnavailableError } from '../../src/core/errors.js';
import type { ConnectionTransport, DisconnectListener } from '../../src/connection/transport.js';

export type ConnectBehavior =
  /** Resolves true and marks the link up */
  | 'succeed'
  /** Resolves false */
  | 'refuse'
  /** Rejects with a plain Error */
  | 'reject'
  /** Never settles unless the signal aborts */
  | 'hang'
  /** Settles when the test calls resolveConnect/rejectConnect */
  | 'defer'
  /** Rejects with CapabilityUnavailableError */
  | 'unavailable';

export type ProbeBehavior = 'ok' | 'fail' | 'unavailable';

interface Deferred {
  resolve: (linked: boolean) => void;
  reject: (error: unknown) => void;
}

export class FakeTransport implements ConnectionTransport {
  readonly connectCalls: string[] = [];
  readonly disconnectCalls: string[] = [];
  readonly readCalls: Array<{ address: string; characteristicId: string }> = [];

  inFlight = 0;
  maxInFlight = 0;
  disconnectUnavailable = false;

  /** When false, 'hang' and 'defer' connects ignore their abort signal */
  honorAbort = true;

  private readonly scripts = new Map<string, ConnectBehavior[]>();
  private readonly defaults = new Map<string, ConnectBehavior>();
  private readonly probes = new Map<string, ProbeBehavior>();
  private readonly deferred = new Map<string, Deferred>();
  private readonly linked = new Set<string>();
  private readonly listeners = new Set<DisconnectListener>();

  script(address: string, ...behaviors: ConnectBehavior[]): this {
    this.scripts.set(address, [...(this.scripts.get(address) ?? []), ...behaviors]);
    return this;
  }

  setDefault(address: string, behavior: ConnectBehavior): this {
    this.defaults.set(address, behavior);
    return this;
  }

  setProbe(address: string, behavior: ProbeBehavior): this {
    this.probes.set(address, behavior);
    return this;
  }

  isLinked(address: string): boolean {
    return this.linked.has(address);
  }

  hasPending(address: string): boolean {
    return this.deferred.has(address);
  }

  resolveConnect(address: string, linked = true): void {
    const pending = this.deferred.get(address);
    if (!pending) {
      throw new Error(`No deferred connect for ${address}`);
    }
    this.deferred.delete(address);
    pending.resolve(linked);
  }

  /** Simulates the peer dropping the link */
  dropLink(address: string): void {
    this.linked.delete(address);
    for (const listener of this.listeners) {
      listener(address);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  // ---------------------------------------------------------------------------
  // ConnectionTransport
  // ---------------------------------------------------------------------------

  connect(address: string, _timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    this.connectCalls.push(address);
    const behavior = this.nextBehavior(address);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    const outcome = new Promise<boolean>((resolve, reject) => {
      switch (behavior) {
        case 'succeed':
          resolve(true);
          return;
        case 'refuse':
          resolve(false);
          return;
        case 'reject':
          reject(new Error('peer rejected connection'));
          return;
        case 'unavailable':
          reject(new CapabilityUnavailableError('adapter powered off'));
          return;
        case 'defer':
          this.deferred.set(address, { resolve, reject });
          break;
        case 'hang':
          break;
      }
      if (this.honorAbort) {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }
    });

    return outcome.then(
      linked => {
        this.inFlight--;
        if (linked) {
          this.linked.add(address);
        }
        return linked;
      },
      (error: unknown) => {
        this.inFlight--;
        throw error;
      }
    );
  }

  async disconnect(address: string): Promise<void> {
    this.disconnectCalls.push(address);
    if (this.disconnectUnavailable) {
      throw new CapabilityUnavailableError('adapter powered off');
    }
    this.linked.delete(address);
  }

  async readCharacteristic(address: string, characteristicId: string): Promise<Uint8Array> {
    this.readCalls.push({ address, characteristicId });
    const behavior = this.probes.get(address) ?? 'ok';

    if (behavior === 'unavailable') {
      throw new CapabilityUnavailableError('adapter powered off');
    }
    if (behavior === 'fail') {
      throw new Error('characteristic read failed');
    }
    return Uint8Array.from([0x01]);
  }

  isConnected(address: string): boolean {
    return this.linked.has(address);
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private nextBehavior(address: string): ConnectBehavior {
    const queue = this.scripts.get(address);
    const next = queue?.shift();
    return next ?? this.defaults.get(address) ?? 'succeed';
  }
}
