// services/signal-relay/src/errors.ts

/** Error carrying the HTTP status and machine code the error middleware answers with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpError';
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}

/**
 * Failure of a single send to the messaging API.
 *
 * `retryable` covers network errors, timeouts, 5xx and 429 answers; anything
 * else is terminal for the task. `retryAfterMs` is the wait the API asked for.
 */
export class DeliveryError extends Error {
  readonly retryable: boolean;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    opts: { retryable: boolean; status?: number; retryAfterMs?: number; cause?: unknown },
  ) {
    super(message, { cause: opts.cause });
    this.name = 'DeliveryError';
    this.retryable = opts.retryable;
    this.status = opts.status;
    this.retryAfterMs = opts.retryAfterMs;
  }
}

export function isRetryable(err: unknown): boolean {
  // unknown throwables (a bug in a client, a rejected promise) are not retried
  return err instanceof DeliveryError && err.retryable;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
