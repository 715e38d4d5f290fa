export class TradeDeskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CurrencyNotFoundError extends TradeDeskError {
  constructor(readonly code: string) {
    super(`Unknown currency '${code}'`);
  }
}

export class InvalidAmountError extends TradeDeskError {}

export class InsufficientFundsError extends TradeDeskError {
  constructor(
    readonly available: number,
    readonly required: number,
    readonly code: string,
  ) {
    super(
      `Insufficient funds: available ${available.toFixed(4)} ${code}, required ${required.toFixed(4)} ${code}`,
    );
  }
}

export class UserNotAuthenticatedError extends TradeDeskError {
  constructor(message = 'Login required') {
    super(message);
  }
}

export class RateUnavailableError extends TradeDeskError {
  constructor(
    readonly from: string,
    readonly to: string,
    reason?: string,
  ) {
    super(`Rate ${from}->${to} unavailable${reason ? `: ${reason}` : ''}`);
  }
}

export class ApiRequestError extends TradeDeskError {
  constructor(readonly reason: string) {
    super(`External API request failed: ${reason}`);
  }
}

export class PersistenceError extends TradeDeskError {}

export class ValidationError extends TradeDeskError {}

export type ProviderErrorKind = 'RateLimited' | 'AuthenticationFailed' | 'Network' | 'MalformedResponse';

const RETRYABLE: Record<ProviderErrorKind, boolean> = {
  RateLimited: false,
  AuthenticationFailed: false,
  Network: true,
  MalformedResponse: true,
};

export class ProviderError extends TradeDeskError {
  readonly retryable: boolean;

  constructor(
    readonly provider: string,
    readonly kind: ProviderErrorKind,
    message: string,
    readonly status?: number,
  ) {
    super(`${provider}: ${kind}: ${message}`);
    this.retryable = RETRYABLE[kind];
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
