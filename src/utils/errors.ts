/**
 * Standard error classes for linesample
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  RENDER_ERROR = "RENDER_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class LineSampleError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "LineSampleError";
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
}

export class ConfigError extends LineSampleError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends LineSampleError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class RenderError extends LineSampleError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.RENDER_ERROR, message, details, options);
    this.name = "RenderError";
  }
}

/**
 * Wrap any thrown value in a LineSampleError, keeping existing ones as they are
 */
export function toLineSampleError(error: unknown): LineSampleError {
  if (error instanceof LineSampleError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LineSampleError(ErrorCode.GENERAL_ERROR, message, undefined, {
    cause: error,
  });
}
