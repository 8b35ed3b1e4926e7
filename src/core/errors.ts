/**
 * Error taxonomy shared by the enumerator and the CLI
 */

export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  API = 'API',
  NETWORK = 'NETWORK',
  IO = 'IO',
}

export class TrailscoutError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TrailscoutError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Missing or malformed input. Raised before any request is made.
 */
export class ConfigurationError extends TrailscoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION, message, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * - rate_limited: HTTP 429, retried until attempts run out
 * - server_error: HTTP 5xx, retried until attempts run out
 * - rejected: any other non-2xx status, never retried
 * - invalid_response: a 2xx body that is not the expected JSON
 */
export type ApiErrorKind = 'rate_limited' | 'rejected' | 'server_error' | 'invalid_response';

export class ApiError extends TrailscoutError {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    kind: ApiErrorKind,
    message: string,
    details: { status?: number; retryAfterMs?: number; url?: string } = {}
  ) {
    super(ErrorCode.API, message, { kind, status: details.status, url: details.url });
    this.name = 'ApiError';
    this.kind = kind;
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * Timeouts and connection failures
 */
export class NetworkError extends TrailscoutError {
  constructor(message: string, url: string, cause?: unknown) {
    super(ErrorCode.NETWORK, message, { url }, { cause });
    this.name = 'NetworkError';
  }
}

export class IoError extends TrailscoutError {
  constructor(message: string, path: string, cause?: unknown) {
    super(ErrorCode.IO, message, { path }, { cause });
    this.name = 'IoError';
  }
}

export const EXIT_CODES: Record<ErrorCode, number> = {
  [ErrorCode.CONFIGURATION]: 2,
  [ErrorCode.API]: 3,
  [ErrorCode.NETWORK]: 4,
  [ErrorCode.IO]: 5,
};

/**
 * Process exit status for an error reaching the CLI boundary
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof TrailscoutError ? EXIT_CODES[error.code] : 1;
}

/**
 * Whether a failed request may be attempted again
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof NetworkError) {
    return true;
  }
  return error instanceof ApiError && (error.kind === 'rate_limited' || error.kind === 'server_error');
}
