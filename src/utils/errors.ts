/**
 * Custom Application Errors
 * Domain-specific error classes for the conversion pipeline.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type PipelineErrorCategory = "validation" | "network" | "size_limit" | "conversion";

/**
 * Any failure of a single conversion request.
 * Always terminal for the request and reported as 400.
 */
export abstract class PipelineError extends AppError {
  abstract readonly category: PipelineErrorCategory;

  constructor(message: string, cause?: unknown) {
    super(message, 400, true, cause);
  }
}

/**
 * Bad target format, missing rights confirmation or source,
 * blocked host, disallowed content type.
 */
export class ValidationError extends PipelineError {
  readonly category = "validation";
}

/**
 * Unreachable host, transport failure, non-success status.
 */
export class NetworkError extends PipelineError {
  readonly category = "network";
}

/**
 * Received bytes went over the download cap.
 */
export class SizeLimitExceededError extends PipelineError {
  readonly category = "size_limit";

  constructor(public readonly maxBytes: number) {
    super(`File is larger than the ${describeByteLimit(maxBytes)} limit.`);
  }
}

/**
 * The transcoding engine failed. The message carries its diagnostic output as-is.
 */
export class ConversionError extends PipelineError {
  readonly category = "conversion";

  constructor(public readonly diagnostic: string, cause?: unknown) {
    super(`Conversion failed: ${diagnostic}`, cause);
  }
}

const MIB = 1024 * 1024;

function describeByteLimit(bytes: number): string {
  if (bytes < MIB) return `${bytes} bytes`;
  return `${Math.round(bytes / MIB)} MB`;
}
