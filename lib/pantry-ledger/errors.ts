/**
 * Pantry Ledger Errors
 *
 * Every ledger failure is a LedgerError with a machine-readable code.
 * The boundary layer maps codes to responses; the core only fails cleanly.
 * Nothing here retries: a thrown LedgerError rolls back the enclosing transaction.
 */

export type LedgerErrorCode =
  | 'not_found'
  | 'invalid_amount'
  | 'inconsistent_state'
  | 'insufficient_stock'
  | 'readonly_mode';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'LedgerError';
    this.code = code;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LedgerError);
    }
  }
}

/**
 * Check if error is a LedgerError, optionally of a given code
 */
export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  if (!(error instanceof LedgerError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Check if error is a readonly_mode error
 */
export function isReadonlyModeError(error: unknown): boolean {
  return isLedgerError(error, 'readonly_mode');
}

export function notFound(entity: string, id: string): LedgerError {
  return new LedgerError('not_found', `${entity} not found: ${id}`);
}

export function invalidAmount(message: string): LedgerError {
  return new LedgerError('invalid_amount', message);
}

export function inconsistentState(message: string): LedgerError {
  return new LedgerError('inconsistent_state', message);
}
