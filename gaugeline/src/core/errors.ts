/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Transient and permanent errors are request-level and handled where a batch
 * is fetched. Only FatalError ends a run.
 */

export type ErrorKind = 'transient' | 'permanent';

export class RequestError extends Error {
  readonly kind: ErrorKind;
  readonly url: string;
  readonly status: number | null;

  constructor(
    kind: ErrorKind,
    message: string,
    url: string,
    status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.url = url;
    this.status = status;
  }
}

/** Retryable: 5xx, 429, connection failures, timeouts. */
export class TransientError extends RequestError {
  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super('transient', message, url, status, options);
  }
}

/** Not retryable: other 4xx, malformed payloads. */
export class PermanentError extends RequestError {
  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super('permanent', message, url, status, options);
  }
}

export class FatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

/**
 * Map any thrown value onto the retry taxonomy.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof RequestError) return error.kind;
  if (error instanceof Error) {
    // fetch() rejects with TypeError on DNS failures, resets and refused connections
    if (error.name === 'TypeError') return 'transient';
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return 'transient';
  }
  return 'permanent';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
