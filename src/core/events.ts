/**
 * Typed Event System
 *
 * Lifecycle events are a closed set of tagged variants, fanned out to
 * subscribers over an explicit publish/subscribe channel. Delivery is
 * at-most-once with no replay; a subscriber that throws is logged and does
 * not stop delivery to the others.
 */

import { EventEmitter } from 'events';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import { getErrorMessage } from './errors.js';
import type { DeviceAddress, Timestamp } from './types.js';
import type { ConnectionConfig, ConnectionState } from '../connection/types.js';
import type { AnalyticsReport } from '../analytics/index.js';

const logger = getComponentLogger('EventBus');

// =============================================================================
// EVENT PAYLOADS
// =============================================================================

interface EventBase {
  /** Device the event concerns */
  address: DeviceAddress;

  /** When the event occurred */
  timestamp: Timestamp;
}

export interface ConnectionAttemptEvent extends EventBase {
  type: 'connection_attempt';

  /** Retry counter at the start of the attempt (0 = first try) */
  retryCount: number;
}

export interface ConnectionSuccessEvent extends EventBase {
  type: 'connection_success';
  connectTimeMs: number;
}

export interface ConnectionFailedEvent extends EventBase {
  type: 'connection_failed';
  reason: 'timeout' | 'refused';
  message: string;

  /** Retry counter after the failure was applied */
  retryCount: number;

  /** Null when no further retry is scheduled */
  nextRetryDelayMs: number | null;
}

export type DisconnectReason =
  | 'link_lost'
  | 'health_check'
  | 'disabled'
  | 'paused'
  | 'deregistered'
  | 'shutdown';

export interface DisconnectedEvent extends EventBase {
  type: 'disconnected';
  reason: DisconnectReason;
  sessionMs: number;
}

export interface HealthCheckSuccessEvent extends EventBase {
  type: 'health_check_success';
  latencyMs: number;
}

export interface HealthCheckFailedEvent extends EventBase {
  type: 'health_check_failed';
  message: string;
  consecutiveFailures: number;
}

export interface StateChangedEvent extends EventBase {
  type: 'state_changed';
  from: ConnectionState;
  to: ConnectionState;
}

export interface MaxRetriesExceededEvent extends EventBase {
  type: 'max_retries_exceeded';
  retryCount: number;
}

export interface DisabledEvent extends EventBase {
  type: 'disabled';
}

export interface EnabledEvent extends EventBase {
  type: 'enabled';
}

export interface PausedEvent extends EventBase {
  type: 'paused';

  /** Automatic resume time, null for open-ended pauses */
  until: Timestamp | null;
}

export interface ResumedEvent extends EventBase {
  type: 'resumed';
  automatic: boolean;
}

export interface DeviceRegisteredEvent extends EventBase {
  type: 'device_registered';
  config: ConnectionConfig;
  restored: boolean;
}

export interface DeviceDeregisteredEvent extends EventBase {
  type: 'device_deregistered';
}

export interface DeviceResetEvent extends EventBase {
  type: 'device_reset';
}

export interface DeviceReconfiguredEvent extends EventBase {
  type: 'device_reconfigured';
  config: ConnectionConfig;
}

export interface CapabilityUnavailableEvent extends EventBase {
  type: 'capability_unavailable';
  operation: 'connect' | 'disconnect' | 'probe';
  message: string;
}

/**
 * Fleet-wide summary published on an interval while the loop runs.
 * Not tied to one device, so it carries no address.
 */
export interface StabilityReportEvent {
  type: 'stability_report';
  timestamp: Timestamp;
  report: AnalyticsReport;
}

// =============================================================================
// EVENT UNION
// =============================================================================

export type ConnectionEvent =
  | ConnectionAttemptEvent
  | ConnectionSuccessEvent
  | ConnectionFailedEvent
  | DisconnectedEvent
  | HealthCheckSuccessEvent
  | HealthCheckFailedEvent
  | StateChangedEvent
  | MaxRetriesExceededEvent
  | DisabledEvent
  | EnabledEvent
  | PausedEvent
  | ResumedEvent
  | DeviceRegisteredEvent
  | DeviceDeregisteredEvent
  | DeviceResetEvent
  | DeviceReconfiguredEvent
  | CapabilityUnavailableEvent
  | StabilityReportEvent;

export type ConnectionEventType = ConnectionEvent['type'];

export type ConnectionEventOf<K extends ConnectionEventType> = Extract<ConnectionEvent, { type: K }>;

/**
 * Map of event names to their payload types
 */
export type ConnectionEventMap = { [K in ConnectionEventType]: ConnectionEventOf<K> };

export type ConnectionEventListener = (event: ConnectionEvent) => void;

// =============================================================================
// TYPED EVENT EMITTER
// =============================================================================

/**
 * Strongly typed EventEmitter
 */
export class TypedEventEmitter<TEventMap extends Record<string, unknown>> {
  private emitter = new EventEmitter();

  on<K extends keyof TEventMap & string>(event: K, listener: (payload: TEventMap[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEventMap & string>(event: K, listener: (payload: TEventMap[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEventMap & string>(event: K, listener: (payload: TEventMap[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEventMap & string>(event?: K): this {
    if (event === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(event);
    }
    return this;
  }

  emit<K extends keyof TEventMap & string>(event: K, payload: TEventMap[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  listenerCount<K extends keyof TEventMap & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  setMaxListeners(n: number): this {
    this.emitter.setMaxListeners(n);
    return this;
  }
}

// =============================================================================
// EVENT BUS
// =============================================================================

export class EventBus {
  private readonly emitter = new TypedEventEmitter<ConnectionEventMap>();
  private readonly subscribers = new Set<ConnectionEventListener>();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  /**
   * Receives every event. Returns the unsubscribe function.
   */
  subscribe(listener: ConnectionEventListener): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  /**
   * Receives one event type with a narrowed payload. Returns the unsubscribe function.
   */
  on<K extends ConnectionEventType>(
    type: K,
    listener: (event: ConnectionEventOf<K>) => void
  ): () => void {
    const guarded = (event: ConnectionEventOf<K>): void => this.deliver(listener, event);
    this.emitter.on(type, guarded);
    return () => {
      this.emitter.off(type, guarded);
    };
  }

  publish(event: ConnectionEvent): void {
    for (const subscriber of [...this.subscribers]) {
      this.deliver(subscriber, event);
    }
    this.emitter.emit(event.type, event);
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  clear(): void {
    this.subscribers.clear();
    this.emitter.removeAllListeners();
  }

  private deliver<E extends ConnectionEvent>(listener: (event: E) => void, event: E): void {
    try {
      listener(event);
    } catch (error) {
      logger.error('Event subscriber threw', {
        event: event.type,
        address: 'address' in event ? event.address : undefined,
        error: getErrorMessage(error),
      });
    }
  }
}
