/**
 * Error types for calcstore.
 *
 * Every error raised by the store carries a code; CLI exit codes and hints
 * are derived from it.
 */

export const ERROR_HINTS = {
  NOT_FOUND: 'Referenced row does not exist - record it first',
  MISSING_HASH: 'No before_insert listener produced a hash for the row',
  UNKNOWN_HASH: 'Unknown calculation hash name - use one of the registered names',
  INVALID_RECORD: 'Record failed validation - check its fields',
  INVALID_CONFIG: 'Invalid configuration value - check CALCSTORE_* environment variables',
  GEOMETRY_MISMATCH: "Energy geometry must equal its calculation's geometry - omit geometryId to derive it",
  ENERGY_CONFLICT: 'Calculation already has a different energy - energy rows are immutable',
  CONVERSION_FAILED: 'QCIO document could not be converted - check the named field',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

export class StoreError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint: string = ERROR_HINTS[code],
    public readonly meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Raised when an energy would break the calculation/geometry relationship
 * or overwrite an existing energy. Nothing is written.
 */
export class ConsistencyError extends StoreError {
  constructor(
    code: Extract<ErrorCode, 'GEOMETRY_MISMATCH' | 'ENERGY_CONFLICT'>,
    message: string,
    meta?: Record<string, unknown>,
  ) {
    super(code, message, ERROR_HINTS[code], meta);
    this.name = 'ConsistencyError';
  }
}

/** Raised by the QCIO adapter; `field` is the dotted path of the offending value. */
export class ConversionError extends StoreError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super('CONVERSION_FAILED', `${field}: ${message}`, ERROR_HINTS.CONVERSION_FAILED, { field });
    this.name = 'ConversionError';
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

/**
 * Maps errors to CLI exit codes
 */
export function getExitCode(error: unknown): number {
  if (!isStoreError(error)) {return 1;}
  if (error.code === 'INVALID_CONFIG') {return 2;}
  if (error.code === 'CONVERSION_FAILED') {return 3;}
  if (error instanceof ConsistencyError) {return 4;}
  return 1;
}
