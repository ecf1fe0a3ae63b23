/**
 * Core module exports for @numeris/core
 *
 * This package provides:
 * - Configuration (environment, config files, programmatic)
 * - Scoped logging
 * - Error types and runtime safety primitives
 * - The `ZeroInit` construction tag and scalar formatting shared by the value types
 */

// Configuration System
export {
  config,
  defineConfig,
  DEFAULT_CONFIG,
  type NumerisConfig,
  type FormatConfig,
} from "./config.js";

// Logging
export { createLogger, setLogWriter, type Logger, type LogLevel, type LogWriter } from "./log.js";

// Errors and Runtime Safety Primitives
export { IndexOutOfRangeError, checkIndex } from "./errors.js";
export { unreachable } from "./safety.js";

// Construction tags and formatting
export { ZeroInit, isZeroInit, type ZeroInitT } from "./zero-init.js";
export { formatScalar } from "./format.js";
