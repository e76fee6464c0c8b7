/**
 * Gateway error taxonomy
 *
 * Every failure surfaced by the client is one of these subtypes so callers can
 * pattern-match on the class and decide between retrying and correcting input.
 */

export class GatewayError extends Error {
  readonly statusCode?: number;
  readonly retryable: boolean = false;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'GatewayError';
    this.statusCode = statusCode;
  }
}

/** HTTP 401: bad or mismatched public key. Fix configuration, never retry. */
export class AuthenticationError extends GatewayError {
  constructor(message: string, statusCode = 401) {
    super(message, statusCode);
    this.name = 'AuthenticationError';
  }
}

/**
 * HTTP 400 or a local guard failure.
 * `errorType` carries the gateway's sub-type (e.g. "missing_field") when it sends one.
 */
export class ValidationError extends GatewayError {
  readonly errorType?: string;
  readonly fields: string[];

  constructor(
    message: string,
    options: { errorType?: string; statusCode?: number; fields?: string[] } = {}
  ) {
    super(message, options.statusCode);
    this.name = 'ValidationError';
    this.errorType = options.errorType;
    this.fields = options.fields ?? [];
  }
}

/** HTTP 404: unknown transaction id. Do not retry with the same id. */
export class NotFoundError extends GatewayError {
  constructor(message: string, statusCode = 404) {
    super(message, statusCode);
    this.name = 'NotFoundError';
  }
}

/** HTTP 5xx. Safe to retry after backoff. */
export class ProcessingError extends GatewayError {
  override readonly retryable = true;

  constructor(message: string, statusCode = 500) {
    super(message, statusCode);
    this.name = 'ProcessingError';
  }
}

/** The request never reached the gateway, so no charge can have happened. */
export class NetworkError extends GatewayError {
  override readonly retryable = true;

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = 'NetworkError';
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/** Malformed credentials or a missing secret. Raised before any transaction begins. */
export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Local payload codec failure. Always raised before the network call. */
export class EncryptionError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'EncryptionError';
  }
}

/**
 * Raised by a Transport when the request could not be delivered
 * (timeout, connection refused, DNS or TLS failure).
 */
export class TransportFailure extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = 'TransportFailure';
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof GatewayError && error.retryable;
}
