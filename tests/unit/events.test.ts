/**
 * Event Bus Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { EventBus, type ConnectionEvent } from '../../src/core/events.js';
import { ConnectionState } from '../../src/connection/types.js';

const stateChanged: ConnectionEvent = {
  type: 'state_changed',
  address: 'AA:BB',
  timestamp: 1,
  from: ConnectionState.DISCONNECTED,
  to: ConnectionState.CONNECTING,
};

const enabled: ConnectionEvent = { type: 'enabled', address: 'AA:BB', timestamp: 2 };

describe('EventBus', () => {
  it('should fan out every event to all subscribers', () => {
    const bus = new EventBus();
    const first = jest.fn<(event: ConnectionEvent) => void>();
    const second = jest.fn<(event: ConnectionEvent) => void>();
    bus.subscribe(first);
    bus.subscribe(second);

    bus.publish(stateChanged);
    bus.publish(enabled);

    expect(first.mock.calls.map(([e]) => e.type)).toEqual(['state_changed', 'enabled']);
    expect(second).toHaveBeenCalledTimes(2);
    expect(bus.subscriberCount).toBe(2);
  });

  it('should deliver typed events to listeners of that type only', () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('state_changed', event => seen.push(`${event.from}->${event.to}`));

    bus.publish(enabled);
    bus.publish(stateChanged);

    expect(seen).toEqual(['disconnected->connecting']);
  });

  it('should stop delivery after unsubscribe', () => {
    const bus = new EventBus();
    const listener = jest.fn<(event: ConnectionEvent) => void>();
    const typed = jest.fn<(event: ConnectionEvent) => void>();
    const unsubscribe = bus.subscribe(listener);
    const off = bus.on('enabled', typed);

    unsubscribe();
    off();
    bus.publish(enabled);

    expect(listener).not.toHaveBeenCalled();
    expect(typed).not.toHaveBeenCalled();
  });

  it('should keep delivering when a subscriber throws', () => {
    const bus = new EventBus();
    const after = jest.fn<(event: ConnectionEvent) => void>();
    bus.subscribe(() => {
      throw new Error('listener failure');
    });
    bus.subscribe(after);

    expect(() => bus.publish(enabled)).not.toThrow();
    expect(after).toHaveBeenCalledWith(enabled);
  });

  it('should not replay events to late subscribers', () => {
    const bus = new EventBus();
    bus.publish(enabled);

    const late = jest.fn<(event: ConnectionEvent) => void>();
    bus.subscribe(late);

    expect(late).not.toHaveBeenCalled();
  });
});
