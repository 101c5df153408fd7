// Error classes
export {
  SplicerError,
  ValidationError,
  ConfigError,
  TemplateLoadError,
  InvalidSyntaxError,
  MissingPlaceholderError,
  CompositionError,
  ExecutionError,
} from "./errors.js";
export type { MissingReason } from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, isLogLevel, LOG_LEVEL_NAMES } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
