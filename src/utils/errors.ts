export type TrackerErrorKind = 'timeout' | 'network' | 'http' | 'invalid-response';

/**
 * Failure talking to the tracker. Thrown only inside the tracker service and
 * converted to a failed `TrackerResult` at its public boundary.
 */
export class TrackerError extends Error {
  constructor(
    message: string,
    readonly kind: TrackerErrorKind,
    readonly status: number | null = null
  ) {
    super(message);
    this.name = 'TrackerError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Tracker error bodies look like `{ errorMessages: [...], errors: { field: msg } }`.
 * Returns the readable part, or null when the body has neither.
 */
export function parseTrackerErrorBody(body: string): string | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  if (!data || typeof data !== 'object') return null;

  const messages = 'errorMessages' in data ? data.errorMessages : undefined;
  if (Array.isArray(messages) && messages.length > 0) {
    return messages.map(String).join('; ');
  }

  const errors = 'errors' in data ? data.errors : undefined;
  if (errors && typeof errors === 'object') {
    const parts = Object.entries(errors).map(([field, msg]) => `${field}: ${String(msg)}`);
    if (parts.length > 0) return parts.join('; ');
  }

  return null;
}

export function classifyFetchError(error: unknown, timeoutMs: number): TrackerError {
  if (error instanceof TrackerError) return error;
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TrackerError(`Request timed out after ${timeoutMs}ms`, 'timeout');
  }
  return new TrackerError(errorMessage(error), 'network');
}
