/**
 * Core module exports for @pullstream/core
 *
 * This package provides:
 * - Configuration (env, config files, programmatic overrides)
 * - Scoped logging
 * - The error taxonomy shared by every package
 * - Runtime safety primitives (invariant, requireArgument, unreachable)
 */

// Configuration System
export { config, defineConfig, type PullstreamConfig, type PrintConfig } from "./config.js";

// Logging
export { createLogger, type Logger } from "./logger.js";

// Errors
export {
  PullstreamError,
  StreamOperationError,
  InsufficientElementsError,
  EmptyStreamError,
  MovedStreamError,
  InvalidArgumentError,
  ConfigError,
  type PullstreamErrorCode,
} from "./errors.js";

// Runtime Safety Primitives
export { invariant, requireArgument, requireCount, unreachable } from "./safety.js";
