/**
 * Custom Error Classes
 *
 * Error taxonomy for the connection lifecycle manager.
 * Each error class includes context information and is serializable.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

/**
 * Base error class for all custom errors.
 * Includes context object for additional debugging information.
 */
export class ConnectionManagerError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'ConnectionManagerError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = recoverable;

    // Maintains proper stack trace in Node.js
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serializes the error for logging or transmission.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// =============================================================================
// CALLER INPUT ERRORS
// =============================================================================

/**
 * Thrown when registering an address that is already managed.
 */
export class AlreadyRegisteredError extends ConnectionManagerError {
  constructor(address: string) {
    super(`Device already registered: ${address}`, 'ALREADY_REGISTERED', { address });
    this.name = 'AlreadyRegisteredError';
  }
}

/**
 * Thrown for operations on an address that is not managed.
 */
export class NotFoundError extends ConnectionManagerError {
  constructor(address: string) {
    super(`Device not registered: ${address}`, 'NOT_FOUND', { address });
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a connection config (or environment) is invalid.
 */
export class ConfigurationError extends ConnectionManagerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context, false);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when an explicit operation asks for a transition the state machine forbids.
 */
export class InvalidStateTransitionError extends ConnectionManagerError {
  constructor(address: string, from: string, to: string) {
    super(`Invalid transition for ${address}: ${from} -> ${to}`, 'INVALID_STATE_TRANSITION', {
      address,
      from,
      to,
    });
    this.name = 'InvalidStateTransitionError';
  }
}

// =============================================================================
// LINK ERRORS
// =============================================================================

/**
 * A connect attempt exceeded its timeout.
 * Recovered by the retry machinery, surfaced only as an event.
 */
export class ConnectionTimeoutError extends ConnectionManagerError {
  constructor(address: string, timeoutMs: number) {
    super(`Connection to ${address} timed out after ${timeoutMs}ms`, 'CONNECTION_TIMEOUT', {
      address,
      timeoutMs,
    }, true);
    this.name = 'ConnectionTimeoutError';
  }
}

/**
 * The transport reported a failed connect.
 */
export class ConnectionRefusedError extends ConnectionManagerError {
  constructor(address: string, reason?: string) {
    super(`Connection to ${address} refused${reason ? `: ${reason}` : ''}`, 'CONNECTION_REFUSED', {
      address,
      reason,
    }, true);
    this.name = 'ConnectionRefusedError';
  }
}

/**
 * A liveness probe failed or timed out.
 */
export class HealthCheckFailedError extends ConnectionManagerError {
  constructor(address: string, reason: string) {
    super(`Health check failed for ${address}: ${reason}`, 'HEALTH_CHECK_FAILED', {
      address,
      reason,
    }, true);
    this.name = 'HealthCheckFailedError';
  }
}

/**
 * Terminal per-device condition; reported through state and events, never fatal.
 */
export class MaxRetriesExceededError extends ConnectionManagerError {
  constructor(address: string, maxRetries: number) {
    super(`Device ${address} exceeded ${maxRetries} retries`, 'MAX_RETRIES_EXCEEDED', {
      address,
      maxRetries,
    }, false);
    this.name = 'MaxRetriesExceededError';
  }
}

/**
 * The transport itself is unreachable (adapter missing, powered off).
 * Does not consume a retry attempt and is surfaced to the caller.
 */
export class CapabilityUnavailableError extends ConnectionManagerError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`Transport capability unavailable: ${reason}`, 'CAPABILITY_UNAVAILABLE', {
      reason,
      ...context,
    }, false);
    this.name = 'CapabilityUnavailableError';
  }
}

// =============================================================================
// PERSISTENCE ERRORS
// =============================================================================

/**
 * Error thrown when the state file cannot be read, parsed or written.
 */
export class PersistenceError extends ConnectionManagerError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PERSISTENCE_ERROR', context, true);
    this.name = 'PersistenceError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Type guard to check if an error is a ConnectionManagerError.
 */
export function isConnectionManagerError(error: unknown): error is ConnectionManagerError {
  return error instanceof ConnectionManagerError;
}

/**
 * Type guard to check if an error is recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
  if (isConnectionManagerError(error)) {
    return error.recoverable;
  }
  return false;
}

/**
 * Wraps an unknown error in a ConnectionManagerError if it isn't already one.
 */
export function wrapError(error: unknown, defaultCode = 'UNKNOWN_ERROR'): ConnectionManagerError {
  if (isConnectionManagerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ConnectionManagerError(error.message, defaultCode, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new ConnectionManagerError(String(error), defaultCode);
}

/**
 * Extracts a user-friendly message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (isConnectionManagerError(error)) {
    return error.toString();
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
