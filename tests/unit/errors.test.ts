/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  CapabilityUnavailableError,
  ConnectionManagerError,
  ConnectionTimeoutError,
  MaxRetriesExceededError,
  NotFoundError,
  PersistenceError,
  getErrorMessage,
  isRecoverableError,
  wrapError,
} from '../../src/core/errors.js';

describe('Errors', () => {
  it('should mark link and storage failures as recoverable', () => {
    expect(isRecoverableError(new ConnectionTimeoutError('AA:BB', 20))).toBe(true);
    expect(isRecoverableError(new PersistenceError('Failed to write state file'))).toBe(true);
  });

  it('should mark terminal and adapter failures as not recoverable', () => {
    expect(isRecoverableError(new CapabilityUnavailableError('adapter powered off'))).toBe(false);
    expect(isRecoverableError(new MaxRetriesExceededError('AA:BB', 3))).toBe(false);
    expect(isRecoverableError(new NotFoundError('AA:BB'))).toBe(false);
    expect(isRecoverableError(new Error('plain failure'))).toBe(false);
    expect(isRecoverableError('not an error')).toBe(false);
  });

  it('should serialize code, context and recoverability', () => {
    const error = new ConnectionTimeoutError('AA:BB', 20);

    expect(error.toJSON()).toMatchObject({
      name: 'ConnectionTimeoutError',
      code: 'CONNECTION_TIMEOUT',
      message: 'Connection to AA:BB timed out after 20ms',
      context: { address: 'AA:BB', timeoutMs: 20 },
      recoverable: true,
    });
    expect(error.toString()).toBe('[CONNECTION_TIMEOUT] Connection to AA:BB timed out after 20ms');
  });

  it('should wrap foreign errors and pass known ones through', () => {
    const known = new CapabilityUnavailableError('adapter powered off');
    expect(wrapError(known)).toBe(known);

    const wrapped = wrapError(new TypeError('bad input'), 'TRANSPORT_ERROR');
    expect(wrapped).toBeInstanceOf(ConnectionManagerError);
    expect(wrapped.code).toBe('TRANSPORT_ERROR');
    expect(wrapped.message).toBe('bad input');
    expect(wrapped.context.originalName).toBe('TypeError');

    expect(wrapError('text').message).toBe('text');
  });

  it('should extract messages from any thrown value', () => {
    expect(getErrorMessage(new Error('plain failure'))).toBe('plain failure');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(new CapabilityUnavailableError('adapter powered off'))).toBe(
      '[CAPABILITY_UNAVAILABLE] Transport capability unavailable: adapter powered off'
    );
  });

  it('should keep the class name for instanceof checks', () => {
    const error = new PersistenceError('State file is not valid JSON');
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toBeInstanceOf(ConnectionManagerError);
    expect(error.name).toBe('PersistenceError');
  });
});
