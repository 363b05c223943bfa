/**
 * layerline - Exceptions
 *
 * Error types raised by decorators and leaves. Inner failures are never
 * rewrapped by a decorator; these classes mark failures that originate in
 * the composition itself.
 */

/**
 * Error codes carried by every LayerlineException
 */
export enum ErrorCode {
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  TRANSFORM_FAILED = 'TRANSFORM_FAILED',
  CALLBACK_FAILED = 'CALLBACK_FAILED',
  HTTP_TRANSPORT_FAILED = 'HTTP_TRANSPORT_FAILED',
}

/**
 * Base exception class
 */
export class LayerlineException extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LayerlineException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid constructor configuration (zero retries, zero batch size, ...)
 *
 * @example
 * ```typescript
 * new RetryDecorator(client, { retries: 0 });
 * // throws ConfigurationException: retries must be a positive integer, got 0
 * ```
 */
export class ConfigurationException extends LayerlineException {
  constructor(
    public readonly option: string,
    message: string,
    public readonly received?: unknown,
  ) {
    super(ErrorCode.INVALID_CONFIGURATION, message, { option, received });
    this.name = 'ConfigurationException';
  }
}

/**
 * A caller-supplied transform or combine callback threw
 */
export class TransformException extends LayerlineException {
  constructor(message: string = 'Transform failed', cause?: unknown) {
    super(ErrorCode.TRANSFORM_FAILED, message, undefined, { cause });
    this.name = 'TransformException';
  }
}

/**
 * A caller-supplied policy callback (such as a retry predicate) threw
 */
export class CallbackException extends LayerlineException {
  constructor(
    public readonly callback: string,
    cause?: unknown,
  ) {
    super(
      ErrorCode.CALLBACK_FAILED,
      `${callback} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { callback },
      { cause },
    );
    this.name = 'CallbackException';
  }
}

/**
 * The HTTP transport failed while sending the request or reading the response
 */
export class HttpTransportException extends LayerlineException {
  constructor(
    public readonly method: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(
      ErrorCode.HTTP_TRANSPORT_FAILED,
      `${method} ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { method, url },
      { cause },
    );
    this.name = 'HttpTransportException';
  }
}

// ==================== Validation Helpers ====================

/**
 * Require a positive integer option value
 */
export function requirePositiveInteger(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationException(
      option,
      `${option} must be a positive integer, got ${value}`,
      value,
    );
  }
  return value;
}

/**
 * Require a non-negative finite number option value
 */
export function requireNonNegative(option: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationException(
      option,
      `${option} must be a non-negative number, got ${value}`,
      value,
    );
  }
  return value;
}

/**
 * Require a non-empty string option value
 */
export function requireNonEmpty(option: string, value: string): string {
  if (value.trim().length === 0) {
    throw new ConfigurationException(option, `${option} must not be empty`, value);
  }
  return value;
}
