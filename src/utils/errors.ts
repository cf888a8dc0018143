/**
 * Standard error classes for fieldcheck
 *
 * Validation failures are never thrown; these cover misconfigured
 * validators, unreadable rule files and unreachable stores.
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  STORE_CONNECTION_ERROR = "STORE_CONNECTION_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  RULE_ERROR = "RULE_ERROR",
}

export class FieldCheckError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FieldCheckError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause !== undefined ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class StoreConnectionError extends FieldCheckError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.STORE_CONNECTION_ERROR, message, details, options);
    this.name = "StoreConnectionError";
  }
}

export class ConfigError extends FieldCheckError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends FieldCheckError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * A validator or rule that cannot be built as described
 */
export class RuleError extends FieldCheckError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.RULE_ERROR, message, details, options);
    this.name = "RuleError";
  }
}

/**
 * Wrap any thrown value into a FieldCheckError
 */
export function toFieldCheckError(error: unknown): FieldCheckError {
  if (error instanceof FieldCheckError) {
    return error;
  }
  return new FieldCheckError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
