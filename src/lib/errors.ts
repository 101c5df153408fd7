/**
 * Base error class for all Splicer errors
 */
export class SplicerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SplicerError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures (manifests, options)
 */
export class ValidationError extends SplicerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends SplicerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Template text could not be read from its source
 */
export class TemplateLoadError extends SplicerError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "TEMPLATE_LOAD_ERROR", { ...context, filePath });
    this.name = "TemplateLoadError";
  }
}

/**
 * Template content could not be parsed (strict mode only)
 */
export class InvalidSyntaxError extends SplicerError {
  constructor(
    message: string,
    public readonly offset: number,
    context?: Record<string, unknown>
  ) {
    super(message, "INVALID_SYNTAX", { ...context, offset });
    this.name = "InvalidSyntaxError";
  }
}

/**
 * Why a placeholder was reported missing
 */
export type MissingReason = "undeclared" | "unbound";

/**
 * A bind targeted an undeclared placeholder, or a render reached an unbound one
 */
export class MissingPlaceholderError extends SplicerError {
  constructor(
    public readonly placeholder: string,
    public readonly reason: MissingReason
  ) {
    super(
      reason === "undeclared"
        ? `Missing placeholder: ${placeholder} is not declared by the template`
        : `Missing placeholder: ${placeholder} is not bound`,
      "MISSING_PLACEHOLDER",
      { placeholder, reason }
    );
    this.name = "MissingPlaceholderError";
  }
}

/**
 * Manifest references could not be composed
 */
export class CompositionError extends SplicerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "COMPOSITION_ERROR", context);
    this.name = "CompositionError";
  }
}

/**
 * External script execution failed
 */
export class ExecutionError extends SplicerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "EXECUTION_ERROR", context);
    this.name = "ExecutionError";
  }
}
