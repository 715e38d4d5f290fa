import axios from 'axios';
import type { Logger } from '../logger';
import { ProviderError, ValidationError } from '../errors';

export interface FetchMeta {
  requestMs: number;
  statusCode: number;
  rawIds?: Record<string, string>;
}

export interface FetchResult {
  /** Keyed "FROM_TO", e.g. "BTC_USD" -> 59337.21 */
  rates: Record<string, number>;
  source: string;
  meta: FetchMeta;
}

export interface RateProvider {
  readonly name: string;
  fetchRates(codes: readonly string[], base: string): Promise<FetchResult>;
}

const PROVIDER_CODE = /^[A-Za-z]{2,5}$/;

export function pairKey(from: string, to: string): string {
  return `${from.toUpperCase()}_${to.toUpperCase()}`;
}

export function validateRequest(codes: readonly string[], base: string): void {
  if (!codes.length) throw new ValidationError('At least one currency code is required');
  const bad = codes.filter((c) => !PROVIDER_CODE.test(c));
  if (bad.length) throw new ValidationError(`Invalid currency codes: ${bad.join(', ')}`);
  if (!PROVIDER_CODE.test(base)) throw new ValidationError(`Invalid base currency: ${base}`);
}

/** Keeps finite positive numbers only; anything else is logged and dropped. */
export function acceptRate(value: unknown, key: string, logger: Logger): number | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(n) || n <= 0) {
    logger.warn({ pair: key, value }, 'rejected non-positive or non-numeric rate');
    return null;
  }
  return n;
}

export function classifyHttpError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 429) return new ProviderError(provider, 'RateLimited', 'too many requests', status);
    if (status === 401 || status === 403) {
      return new ProviderError(provider, 'AuthenticationFailed', `HTTP ${status}`, status);
    }
    if (status !== undefined && status < 500) {
      return new ProviderError(provider, 'MalformedResponse', `HTTP ${status}`, status);
    }
    return new ProviderError(provider, 'Network', status ? `HTTP ${status}` : err.code ?? err.message, status);
  }
  if (err instanceof SyntaxError) return new ProviderError(provider, 'MalformedResponse', err.message);
  return new ProviderError(provider, 'Network', err instanceof Error ? err.message : String(err));
}
