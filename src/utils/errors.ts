/**
 * Missing or invalid configuration. Fatal at start-up, never recovered at runtime.
 */
export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A conditional update found the row in a different state than expected,
 * e.g. a token already rotated or revoked by a concurrent request.
 */
export class ConcurrencyConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConcurrencyConflictError';
  }
}

export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
