/**
 * Error taxonomy shared by the job engine, the GitHub client and the HTTP API.
 */

/**
 * Bad or missing scope input. Raised before any job is registered or any
 * network call is made.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Unknown job_id: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

/**
 * The API rejected the credential. Fatal to the whole job, never retried.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Quota exhausted until `resetEpoch` (seconds). Recovered by the backoff in
 * utils/retry and never surfaced as a job failure.
 */
export class RateLimitError extends Error {
  constructor(public readonly resetEpoch: number) {
    super(`Rate limit exhausted until ${new Date(resetEpoch * 1000).toISOString()}`);
    this.name = 'RateLimitError';
  }
}

/**
 * The request never produced a response (DNS, socket, timeout).
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Any other non-2xx answer. Scoped to the repository being processed.
 */
export class ApiResponseError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    detail?: string
  ) {
    super(`HTTP ${status} for ${url}${detail ? `: ${detail}` : ''}`);
    this.name = 'ApiResponseError';
  }
}

export class WorkerFault extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkerFault';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
