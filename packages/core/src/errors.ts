/**
 * Error Types
 *
 * Every failure raised by pullstream derives from `PullstreamError` and
 * carries a machine-readable `code`. All of them are synchronous and local:
 * they surface to the caller of the operation that detected them.
 */

/** Machine-readable codes for pullstream failures. */
export type PullstreamErrorCode =
  | "insufficient_elements"
  | "empty_stream"
  | "moved"
  | "invalid_argument"
  | "config";

/**
 * Base class for all pullstream errors.
 */
export class PullstreamError extends Error {
  constructor(
    message: string,
    readonly code: PullstreamErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "PullstreamError";
  }
}

/**
 * A terminal operation could not be performed on the stream it was applied to.
 */
export class StreamOperationError extends PullstreamError {
  constructor(
    message: string,
    readonly operation: string,
    code: PullstreamErrorCode
  ) {
    super(message, code);
    this.name = "StreamOperationError";
  }
}

/**
 * Thrown by position lookup when the stream ends before the requested index.
 */
export class InsufficientElementsError extends StreamOperationError {
  constructor(
    operation: string,
    readonly requested: number,
    readonly available: number
  ) {
    super(
      `Stream doesn't contain enough elements to perform operation '${operation}'.`,
      operation,
      "insufficient_elements"
    );
    this.name = "InsufficientElementsError";
  }
}

/**
 * Thrown by operations that need at least one element.
 */
export class EmptyStreamError extends StreamOperationError {
  constructor(operation: string) {
    super(
      `Operation '${operation}' cannot be performed on empty stream.`,
      operation,
      "empty_stream"
    );
    this.name = "EmptyStreamError";
  }
}

/**
 * Thrown when a stream whose generator was transferred away is used again.
 */
export class MovedStreamError extends StreamOperationError {
  constructor(operation: string) {
    super(
      `Operation '${operation}' cannot be performed on a stream that was transferred.`,
      operation,
      "moved"
    );
    this.name = "MovedStreamError";
  }
}

/**
 * Thrown when a descriptor or source is built from unusable arguments.
 */
export class InvalidArgumentError extends PullstreamError {
  constructor(message: string) {
    super(message, "invalid_argument");
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a configuration file exists but cannot be loaded.
 */
export class ConfigError extends PullstreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "config", options);
    this.name = "ConfigError";
  }
}
