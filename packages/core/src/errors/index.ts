/**
 * Custom Error Classes
 *
 * The engine classifies failures; rendering them for end users is the
 * HTTP layer's job.
 */

/**
 * Base error class for all mediakit errors
 */
export class MediaKitError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MediaKitError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ValidationCode =
  | 'VALIDATION_ERROR'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_TIME_RANGE'
  | 'INVALID_COMPRESSION_LEVEL'
  | 'INVALID_FILE_COUNT'
  | 'CORRUPTED_FILE';

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends MediaKitError {
  public readonly field: string;

  constructor(field: string, message: string, code: ValidationCode = 'VALIDATION_ERROR') {
    super(
      `Validation failed for ${field}: ${message}`,
      code,
      400,
      { field, message }
    );
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Upload exceeds the configured size limit
 */
export class FileTooLargeError extends MediaKitError {
  constructor(sizeBytes: number, limitBytes: number) {
    super(
      `File is ${sizeBytes} bytes, limit is ${limitBytes} bytes`,
      'FILE_TOO_LARGE',
      413,
      { sizeBytes, limitBytes }
    );
    this.name = 'FileTooLargeError';
  }
}

/**
 * Input carries no audio stream
 */
export class NoAudioTrackError extends MediaKitError {
  constructor() {
    super('Input contains no audio track', 'NO_AUDIO_TRACK', 400);
    this.name = 'NoAudioTrackError';
  }
}

/**
 * Every duration probe tier failed
 */
export class DurationUnknownError extends MediaKitError {
  constructor(attempted: readonly string[]) {
    super(
      'Could not determine media duration',
      'DURATION_UNKNOWN',
      422,
      { attempted: [...attempted] }
    );
    this.name = 'DurationUnknownError';
  }
}

/**
 * External tool exited with a non-zero status
 */
export class ExternalToolError extends MediaKitError {
  public readonly operation: string;
  public readonly exitCode: number;

  constructor(operation: string, exitCode: number, stderr: string) {
    super(
      lastMeaningfulLine(stderr) ?? `${operation} exited with code ${exitCode}`,
      'EXTERNAL_TOOL_ERROR',
      500,
      { operation, exitCode, stderr: stderr.slice(-1000) }
    );
    this.name = 'ExternalToolError';
    this.operation = operation;
    this.exitCode = exitCode;
  }
}

/**
 * External tool was killed after exceeding its time budget
 */
export class TimeoutError extends MediaKitError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} timed out after ${timeoutMs / 1000}s`,
      'TIMEOUT',
      504,
      { operation, timeoutMs }
    );
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Tool could not be started, or talking to it failed
 */
export class ExecutionError extends MediaKitError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(
      `${operation} could not be executed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'EXECUTION_ERROR',
      500,
      { operation },
      { cause }
    );
    this.name = 'ExecutionError';
    this.operation = operation;
  }
}

/**
 * One item of a multi-step pipeline failed; the pipeline was aborted
 */
export class PipelineStepError extends MediaKitError {
  public readonly operation: string;
  public readonly index: number;

  constructor(operation: string, index: number, cause: unknown) {
    super(
      `${operation} failed at item ${index}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause instanceof MediaKitError ? cause.code : 'PROCESSING_FAILED',
      cause instanceof MediaKitError ? cause.statusCode : 500,
      { operation, index },
      { cause }
    );
    this.name = 'PipelineStepError';
    this.operation = operation;
    this.index = index;
  }
}

function lastMeaningfulLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
  return lines[lines.length - 1];
}
