/**
 * UnifiedPush sender error types.
 *
 * Configuration errors are raised synchronously while building or before a
 * submission starts. Everything that goes wrong while talking to the server
 * is a TransportError and is delivered through the send result or callback.
 */

/**
 * Error codes for UnifiedPush errors.
 */
export enum PushErrorCode {
  // Configuration
  ConfigurationError = 'CONFIGURATION_ERROR',

  // Submission
  TransportError = 'TRANSPORT_ERROR',
  InvalidRedirect = 'INVALID_REDIRECT',
  TooManyRedirects = 'TOO_MANY_REDIRECTS',
}

/**
 * Base UnifiedPush error class.
 */
export class PushError extends Error {
  /** Error code */
  readonly code: PushErrorCode;
  /** HTTP status code of the response that caused the error, if any */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: PushErrorCode;
    message: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'PushError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or incomplete sender configuration.
 */
export class ConfigurationError extends PushError {
  constructor(message: string, cause?: Error) {
    super({
      code: PushErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Submission Errors
// ============================================================================

/**
 * Failure while performing the POST: connect, TLS, proxy or I/O.
 */
export class TransportError extends PushError {
  constructor(
    message: string,
    options: {
      cause?: Error;
      code?: PushErrorCode;
      statusCode?: number;
      details?: Record<string, unknown>;
    } = {}
  ) {
    super({
      code: options.code ?? PushErrorCode.TransportError,
      message,
      statusCode: options.statusCode,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * Redirect response without a usable Location header.
 */
export class InvalidRedirectError extends TransportError {
  constructor(statusCode: number, location: string | undefined, cause?: Error) {
    super(
      location === undefined
        ? `Redirect (${statusCode}) without a Location header`
        : `Redirect (${statusCode}) to invalid location: ${location}`,
      {
        code: PushErrorCode.InvalidRedirect,
        statusCode,
        details: { location },
        cause,
      }
    );
    this.name = 'InvalidRedirectError';
  }
}

/**
 * The redirect chain grew longer than the configured maximum.
 */
export class TooManyRedirectsError extends PushError {
  constructor(maxRedirects: number, lastUrl: string) {
    super({
      code: PushErrorCode.TooManyRedirects,
      message: `Exceeded maximum of ${maxRedirects} redirects (last location: ${lastUrl})`,
      details: { maxRedirects, lastUrl },
    });
    this.name = 'TooManyRedirectsError';
  }
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Checks if an error is a UnifiedPush error.
 */
export function isPushError(error: unknown): error is PushError {
  return error instanceof PushError;
}

/**
 * Wraps anything thrown during submission into a PushError.
 * PushErrors pass through untouched.
 */
export function toTransportError(error: unknown): PushError {
  if (isPushError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new TransportError(`Send did not succeed: ${error.message}`, { cause: error });
  }
  return new TransportError(`Send did not succeed: ${String(error)}`);
}
