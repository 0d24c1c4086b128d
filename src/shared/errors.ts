/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "INVALID_RESPONSE")
 * - `statusCode`    HTTP-compatible status code, kept for callers that surface errors over HTTP
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * The two failure kinds a pipeline call can end with.
 * "Nothing found" is never one of them.
 */
export type GiveawayErrorKind = 'timeout' | 'invalid_response';

/**
 * The request could not be completed by the transport.
 */
export class TimeoutError extends AppError {
  public readonly kind = 'timeout' satisfies GiveawayErrorKind;
  public readonly url: string;

  constructor(message: string, url: string, statusCode = 504) {
    super(message, 'TIMEOUT', statusCode);
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      url: this.url,
    };
  }
}

/**
 * A response (or an input URL) was obtained but did not contain what the
 * parser required. `field` names the missing or malformed payload key when
 * the failure comes from the structured payload.
 */
export class InvalidResponseError extends AppError {
  public readonly kind = 'invalid_response' satisfies GiveawayErrorKind;
  public readonly url?: string;
  public readonly field?: string;

  constructor(
    message: string,
    details: { url?: string; field?: string } = {},
    statusCode = 502,
  ) {
    super(message, 'INVALID_RESPONSE', statusCode);
    this.url = details.url;
    this.field = details.field;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      url: this.url,
      field: this.field,
    };
  }
}

export type TransportFailureReason = 'unreachable' | 'undecodable';

/**
 * Raised by a `TextFetcher` implementation. `unreachable` covers
 * connection failures and timeouts; `undecodable` means a body arrived
 * but was not valid text.
 */
export class TransportError extends AppError {
  public readonly reason: TransportFailureReason;
  public readonly url: string;

  constructor(
    message: string,
    reason: TransportFailureReason,
    url: string,
    statusCode = 502,
  ) {
    super(message, 'TRANSPORT_ERROR', statusCode);
    this.reason = reason;
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      url: this.url,
    };
  }
}

export type GiveawayError = TimeoutError | InvalidResponseError;

/**
 * Maps a transport failure onto the pipeline's two failure kinds.
 * Anything that is not a `TransportError` is treated as the transport
 * failing to complete the request.
 */
export function toGiveawayError(error: unknown, url: string): GiveawayError {
  if (error instanceof TimeoutError || error instanceof InvalidResponseError) {
    return error;
  }
  if (error instanceof TransportError && error.reason === 'undecodable') {
    return new InvalidResponseError(`Response body of ${url} is not valid text`, { url });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TimeoutError(`Request to ${url} did not complete: ${message}`, url);
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs).
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
