// Error handling utilities for data-ingestion package

export type RecordErrorKind = 'parse_error' | 'validation_error' | 'store_conflict' | 'load_failed';

export type ReasonCode =
  | 'MISSING_FIELD'
  | 'INVALID_DATE_TIME'
  | 'INVALID_QTY'
  | 'NEGATIVE_QTY'
  | 'INVALID_PRICE'
  | 'NON_POSITIVE_PRICE'
  | 'INVALID_PRODUCT'
  | 'STORE_CONFLICT'
  | 'LOAD_FAILED';

/**
 * Per-record failure. The record is excluded and reported; the batch continues.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: RecordErrorKind;

  constructor(
    readonly code: ReasonCode,
    message: string,
    readonly field?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A value that could not be read as a date/time, number or product entry. */
export class ParseError extends PipelineError {
  readonly kind = 'parse_error' as const;
}

/** A value that was read but breaks a business rule, or is missing. */
export class ValidationError extends PipelineError {
  readonly kind = 'validation_error' as const;
}

/** Scrubbed output still carries a configured PII field. Fatal. */
export class PiiLeakError extends Error {
  constructor(readonly fields: string[], readonly rowNumber: number) {
    super(`PII fields survived scrubbing in row ${rowNumber}: ${fields.join(', ')}`);
    this.name = 'PiiLeakError';
  }
}

/** Input file missing or unreadable. Fatal for the run. */
export class ExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}
