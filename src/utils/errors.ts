/**
 * Standard error classes for the parse pipeline
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  SCHEMA_PARSE_ERROR = "SCHEMA_PARSE_ERROR",
  OUTPUT_WRITE_ERROR = "OUTPUT_WRITE_ERROR",
  METADATA_ERROR = "METADATA_ERROR",
}

export interface ErrorSummary {
  code: ErrorCode;
  name: string;
  message: string;
  cause?: string;
}

export class BankFindError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "BankFindError";
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
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }

  summarize(): ErrorSummary {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
      ...(this.cause ? { cause: describeCause(this.cause) } : {}),
    };
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ConfigError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class InputReadError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

/**
 * Malformed field-definition document; fatal for that dataset's run
 */
export class SchemaParseError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_PARSE_ERROR, message, details, options);
    this.name = "SchemaParseError";
  }
}

/**
 * Destination unwritable, disk full, rename failed
 */
export class OutputWriteError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.OUTPUT_WRITE_ERROR, message, details, options);
    this.name = "OutputWriteError";
  }
}

/**
 * Column metadata that cannot be attached to or read back from a table
 */
export class MetadataError extends BankFindError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.METADATA_ERROR, message, details, options);
    this.name = "MetadataError";
  }
}

/**
 * Wrap any thrown value into a BankFindError
 */
export function toBankFindError(error: unknown): BankFindError {
  if (error instanceof BankFindError) return error;
  return new BankFindError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * True for a Node.js system error carrying the given errno code (ENOENT, EEXIST, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
