/** Stable machine-readable error codes shared by every package */
export type RiskScanErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'SESSION_NOT_FOUND'
  | 'EXCHANGE_FAILED'
  | 'REMOTE_API_ERROR'
  | 'NO_IDENTITY'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND';

/**
 * Base class for expected failures. Controllers translate these into
 * `{ error: code, message, details }` with `httpStatus`; anything that is not
 * a RiskScanError is treated as a bug.
 */
export class RiskScanError extends Error {
  readonly code: RiskScanErrorCode;
  readonly httpStatus: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: RiskScanErrorCode,
    message: string,
    httpStatus: number,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
  }
}

/** Missing or placeholder credentials. Fatal; fix the environment. */
export class ConfigurationError extends RiskScanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
  }
}

/** Unknown, expired or already-consumed authorization state. */
export class SessionNotFoundError extends RiskScanError {
  constructor(message = 'Invalid or expired state; restart the login') {
    super('SESSION_NOT_FOUND', message, 400);
  }
}

/**
 * Token or profile call failed. `status` is null when no response arrived
 * (timeout, connection refused).
 */
export class ExchangeError extends RiskScanError {
  readonly status: number | null;
  readonly body: unknown;

  constructor(message: string, status: number | null, body: unknown) {
    super('EXCHANGE_FAILED', message, 502, { status, body });
    this.status = status;
    this.body = body;
  }
}

/** Content-list call failed; nothing from the call was persisted. */
export class RemoteApiError extends RiskScanError {
  readonly status: number | null;
  readonly body: unknown;

  constructor(message: string, status: number | null, body: unknown) {
    super('REMOTE_API_ERROR', message, 502, { status, body });
    this.status = status;
    this.body = body;
  }
}

export class NoIdentityError extends RiskScanError {
  constructor(message = 'No connected account; complete the login flow first') {
    super('NO_IDENTITY', message, 409);
  }
}

export class ValidationError extends RiskScanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class NotFoundError extends RiskScanError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export function isRiskScanError(err: unknown): err is RiskScanError {
  return err instanceof RiskScanError;
}
