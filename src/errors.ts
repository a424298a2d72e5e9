/**
 * Custom error classes for export pruning
 * Provides friendly error messages for common failure scenarios
 */

/**
 * Error codes for programmatic handling
 */
export type PruneErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'MALFORMED_RECORD'
  | 'INVALID_CONFIG'
  | 'STAGE_FAILED';

/**
 * Base error class for prune errors
 */
export class PruneError extends Error {
  constructor(
    message: string,
    public readonly code: PruneErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'PruneError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when the export root does not exist; aborts the run
 */
export class SourceNotFoundError extends PruneError {
  constructor(public readonly sourcePath: string) {
    super(
      `Could not find source path: ${sourcePath}`,
      'SOURCE_NOT_FOUND',
      'Pass the directory produced by the workspace export with --source-path'
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * A single record that could not be interpreted. Reported, never fatal.
 */
export class MalformedRecordError extends PruneError {
  constructor(
    public readonly file: string,
    public readonly line: number,
    public readonly reason: string
  ) {
    super(`${file}:${line}: ${reason}`, 'MALFORMED_RECORD');
    this.name = 'MalformedRecordError';
  }
}

/**
 * Error thrown when run settings cannot be resolved or are invalid
 */
export class InvalidConfigError extends PruneError {
  constructor(message: string, suggestion?: string) {
    super(message, 'INVALID_CONFIG', suggestion);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Wraps an unexpected failure inside a single stage
 */
export class StageFailedError extends PruneError {
  constructor(
    public readonly stage: string,
    public readonly failure: unknown
  ) {
    super(
      `Stage "${stage}" failed: ${failure instanceof Error ? failure.message : String(failure)}`,
      'STAGE_FAILED'
    );
    this.name = 'StageFailedError';
  }
}

/**
 * Type guard to check if an error is a PruneError
 */
export function isPruneError(error: unknown): error is PruneError {
  return error instanceof PruneError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isPruneError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
