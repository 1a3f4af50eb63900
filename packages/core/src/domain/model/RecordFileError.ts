/** Machine-readable error codes raised by layout construction, record access and reading. */
export type RecordFileErrorCode =
  | 'UNKNOWN_FIELD_TYPE'
  | 'DUPLICATE_FIELD_TYPE'
  | 'DUPLICATE_RECORD_NAME'
  | 'INVALID_FIELD_REFERENCE'
  | 'EMPTY_RECORD_NAME'
  | 'INVALID_LENGTH'
  | 'FIELD_ALREADY_ATTACHED'
  | 'UNKNOWN_RECORD_TYPE'
  | 'INDEX_OUT_OF_RANGE'
  | 'FIELD_NOT_FOUND'
  | 'SOURCE_UNAVAILABLE'
  | 'LINE_LENGTH_MISMATCH'
  | 'READER_STATE'
  | 'INVALID_FILTER'
  | 'INVALID_CONFIG'
  | 'INVALID_LAYOUT';

/**
 * Broad grouping of error codes.
 *
 * - `SCHEMA`: raised while building a layout; aborts schema loading.
 * - `ACCESS`: caller misuse of a record (bad index, unknown field name).
 * - `IO`: the input cannot be read; terminates the reader.
 * - `USAGE`: invalid configuration, filter expression or reader call order.
 */
export type ErrorCategory = 'SCHEMA' | 'ACCESS' | 'IO' | 'USAGE';

const CATEGORY_BY_CODE: Readonly<Record<RecordFileErrorCode, ErrorCategory>> = {
  UNKNOWN_FIELD_TYPE: 'SCHEMA',
  DUPLICATE_FIELD_TYPE: 'SCHEMA',
  DUPLICATE_RECORD_NAME: 'SCHEMA',
  INVALID_FIELD_REFERENCE: 'SCHEMA',
  EMPTY_RECORD_NAME: 'SCHEMA',
  INVALID_LENGTH: 'SCHEMA',
  FIELD_ALREADY_ATTACHED: 'SCHEMA',
  INVALID_LAYOUT: 'SCHEMA',
  UNKNOWN_RECORD_TYPE: 'ACCESS',
  INDEX_OUT_OF_RANGE: 'ACCESS',
  FIELD_NOT_FOUND: 'ACCESS',
  SOURCE_UNAVAILABLE: 'IO',
  LINE_LENGTH_MISMATCH: 'IO',
  READER_STATE: 'USAGE',
  INVALID_FILTER: 'USAGE',
  INVALID_CONFIG: 'USAGE',
};

export interface RecordFileErrorOptions {
  /** Underlying error, e.g. the I/O failure behind `SOURCE_UNAVAILABLE`. */
  readonly cause?: unknown;
  /** Additional structured data about the error (record name, index, line number). */
  readonly metadata?: Record<string, unknown>;
}

/** Single error type of the library. Branch on `code`, not on the message. */
export class RecordFileError extends Error {
  readonly code: RecordFileErrorCode;
  readonly category: ErrorCategory;
  readonly metadata: Record<string, unknown>;

  constructor(code: RecordFileErrorCode, message: string, options?: RecordFileErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RecordFileError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.metadata = options?.metadata ?? {};
  }
}

/** Narrow an unknown thrown value to a `RecordFileError`, optionally of a given code. */
export function isRecordFileError(error: unknown, code?: RecordFileErrorCode): error is RecordFileError {
  if (!(error instanceof RecordFileError)) return false;
  return code === undefined || error.code === code;
}
