/**
 * Structured error classes for the protocol library.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  HANDSHAKE_FAILED: 'HANDSHAKE_FAILED',
  FRAME_TOO_LARGE: 'FRAME_TOO_LARGE',
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  INVALID_ENCODING: 'INVALID_ENCODING',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when options fail schema validation.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Thrown when either side of the opening handshake cannot complete.
 */
export class HandshakeError extends BaseError {
  readonly code = 'HANDSHAKE_FAILED' as const;

  constructor(message: string) {
    super(`Handshake failed: ${message}`);
  }
}

/**
 * Thrown when a payload does not fit the 16-bit length form.
 */
export class FrameTooLargeError extends BaseError {
  readonly code = 'FRAME_TOO_LARGE' as const;

  constructor(readonly length: number) {
    super(`Payload of ${length} bytes exceeds the 65535-byte frame limit`);
  }
}

/**
 * Thrown when an application payload does not match its envelope.
 */
export class MalformedPayloadError extends BaseError {
  readonly code = 'MALFORMED_PAYLOAD' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when text is not valid Base64.
 */
export class EncodingError extends BaseError {
  readonly code = 'INVALID_ENCODING' as const;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when a connection cannot be used.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed') {
    super(message);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
