/**
 * Persistence Errors
 */

export const PersistenceErrorCode = {
  /** Connection could not be acquired from the pool */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  /** A statement failed; the surrounding transaction was rolled back */
  QUERY_ERROR: 'QUERY_ERROR',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type PersistenceErrorCode = (typeof PersistenceErrorCode)[keyof typeof PersistenceErrorCode];

/**
 * A database write or read failed. When raised from a transactional
 * operation nothing from that operation was committed.
 */
export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  /** Repository operation that failed, e.g. `saveParsedIncidents` */
  readonly operation: string;
  readonly cause: Error | undefined;

  constructor(message: string, code: PersistenceErrorCode, operation: string, cause?: Error) {
    super(message);
    this.name = 'PersistenceError';
    this.code = code;
    this.operation = operation;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PersistenceError);
    }
  }

  static fromError(error: unknown, operation: string, code?: PersistenceErrorCode): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new PersistenceError(
      `${operation} failed: ${message}`,
      code ?? PersistenceErrorCode.QUERY_ERROR,
      operation,
      error instanceof Error ? error : undefined
    );
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
