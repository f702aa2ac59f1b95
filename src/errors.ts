import type { FilingSummary, RecordFailureReason } from './types.js';

/**
 * Base error for everything the filing pipeline raises on purpose.
 */
export class FilingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'FilingError';
  }
}

export type FatalFileCode =
  | 'EMPTY_INPUT'
  | 'UNREADABLE_HEADER'
  | 'MISSING_VERSION'
  | 'UNSUPPORTED_VERSION'
  | 'IO_FAILURE'
  | 'OUTPUT_FAILURE';

/**
 * Stops the processing of a whole file. Output written before the failure
 * stays in place; `summary` shows how far processing got.
 */
export class FatalFileError extends FilingError {
  summary?: FilingSummary;

  constructor(
    message: string,
    public readonly fatalCode: FatalFileCode,
  ) {
    super(message, fatalCode);
    this.name = 'FatalFileError';
  }
}

/**
 * A single record could not be turned into output. Never escapes the
 * coordinator: it becomes a skipped or fatal outcome for that record.
 */
export class RecordError extends FilingError {
  constructor(
    message: string,
    public readonly reason: RecordFailureReason,
    public readonly column?: string,
    public readonly value?: string,
  ) {
    super(message, 'RECORD_ERROR');
    this.name = 'RecordError';
  }
}

export function isFatalFileError(error: unknown): error is FatalFileError {
  return error instanceof FatalFileError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
