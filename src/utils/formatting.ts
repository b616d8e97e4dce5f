/**
 * Formatting Utilities
 *
 * Helpers for log output and human-readable reports.
 */

// =============================================================================
// DURATIONS
// =============================================================================

/**
 * Formats milliseconds as a compact duration (e.g. `1m 30s`).
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

// =============================================================================
// SANITIZATION
// =============================================================================

/**
 * Replaces string values of sensitive keys with `[REDACTED]`, recursing into nested objects.
 */
export function sanitizeObject(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = ['password', 'apiKey', 'token', 'secret']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(
      sk => lowerKey.includes(sk.toLowerCase())
    );

    if (isSensitive && typeof value === 'string') {
      result[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      result[key] = sanitizeObject(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
