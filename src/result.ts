export type FailureCode =
  | 'BELOW_MINIMUM'
  | 'INSUFFICIENT_FUNDS'
  | 'NO_WALLET'
  | 'PERSISTENCE'
  | 'INVALID_INPUT'
  | 'DUPLICATE_USER'
  | 'UNKNOWN_USER'
  | 'BAD_CREDENTIALS'
  | 'NOT_LOGGED_IN';

export interface Failure {
  code: FailureCode;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: FailureCode, message: string): Result<T> {
  return { ok: false, error: { code, message } };
}
