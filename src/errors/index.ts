/**
 * Table Insert Error Types
 *
 * Error classes for the table insert engine.
 * @module sql-table-insert/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Table insert error codes mapped to categories.
 */
export enum TableInsertErrorCode {
  // Input errors
  INVALID_DATA = 'TI_INVALID_DATA',

  // Configuration errors
  INVALID_CONFIG = 'TI_INVALID_CONFIG',
  QUOTING_UNSUPPORTED = 'TI_QUOTING_UNSUPPORTED',

  // Transport errors
  INT64_TRANSPORT = 'TI_INT64_TRANSPORT',

  // Bulk load errors
  BULK_LOAD_CREDENTIALS = 'TI_BULK_LOAD_CREDENTIALS',
  BULK_LOAD_FAILED = 'TI_BULK_LOAD_FAILED',
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all table insert errors.
 */
export class TableInsertError extends Error {
  /** Error code */
  readonly code: TableInsertErrorCode;
  /** Original error */
  override readonly cause?: Error;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Additional context */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: TableInsertErrorCode,
    options?: {
      cause?: Error;
      retryable?: boolean;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'TableInsertError';
    this.code = code;
    this.cause = options?.cause;
    this.retryable = options?.retryable ?? false;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a detailed error message including context.
   */
  toDetailedString(): string {
    const parts = [`${this.name} [${this.code}]: ${this.message}`];
    if (this.cause) parts.push(`Caused by: ${this.cause.message}`);
    if (this.context) parts.push(`Context: ${JSON.stringify(this.context)}`);
    return parts.join('\n');
  }
}

// ============================================================================
// Input Errors
// ============================================================================

/**
 * The data handed to an insert call cannot be loaded.
 */
export class InvalidDataError extends TableInsertError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, TableInsertErrorCode.INVALID_DATA, { context });
    this.name = 'InvalidDataError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid configuration error.
 */
export class ConfigurationError extends TableInsertError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, TableInsertErrorCode.INVALID_CONFIG, { context });
    this.name = 'ConfigurationError';
  }
}

/**
 * An identifier needs quoting but the connection has no identifier quote.
 */
export class QuotingUnsupportedError extends TableInsertError {
  /** Identifiers that would have needed quoting */
  readonly identifiers: readonly string[];

  constructor(identifiers: readonly string[]) {
    super(
      "The connection doesn't support quoted identifiers, but table/column name contains " +
        `characters that must be quoted (${identifiers.join(',')})`,
      TableInsertErrorCode.QUOTING_UNSUPPORTED,
      { context: { identifiers } }
    );
    this.name = 'QuotingUnsupportedError';
    this.identifiers = identifiers;
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * 64-bit integers do not survive the trip to the driver unchanged.
 */
export class Int64TransportError extends TableInsertError {
  constructor(message: string = 'Error converting 64-bit integers for transport to the database') {
    super(message, TableInsertErrorCode.INT64_TRANSPORT);
    this.name = 'Int64TransportError';
  }
}

// ============================================================================
// Bulk Load Errors
// ============================================================================

/**
 * Bulk load credentials or staging paths could not be confirmed.
 */
export class BulkLoadCredentialsError extends TableInsertError {
  /** Configuration fields that are missing or invalid */
  readonly missingFields: readonly string[];

  constructor(message: string, missingFields: readonly string[] = [], cause?: Error) {
    super(message, TableInsertErrorCode.BULK_LOAD_CREDENTIALS, {
      cause,
      context: missingFields.length > 0 ? { missingFields } : undefined,
    });
    this.name = 'BulkLoadCredentialsError';
    this.missingFields = missingFields;
  }
}

/**
 * The backend bulk loader reported a failure.
 */
export class BulkLoadError extends TableInsertError {
  /** Exit code of the loader process, when one was run */
  readonly exitCode?: number;
  /** Loader diagnostic output */
  readonly stderr?: string;

  constructor(
    message: string,
    options: { exitCode?: number; stderr?: string; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super(message, TableInsertErrorCode.BULK_LOAD_FAILED, {
      cause: options.cause,
      context: {
        ...options.context,
        ...(options.exitCode !== undefined ? { exitCode: options.exitCode } : {}),
      },
    });
    this.name = 'BulkLoadError';
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalises a caught value into an Error or undefined.
 */
export function toCause(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Checks whether a value is a table insert error.
 */
export function isTableInsertError(error: unknown): error is TableInsertError {
  return error instanceof TableInsertError;
}
