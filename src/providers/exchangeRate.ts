import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '../logger';
import { ProviderError } from '../errors';
import { withRetry } from './retry';
import type { RetryOptions } from './retry';
import { acceptRate, pairKey, validateRequest } from './types';
import type { FetchResult, RateProvider } from './types';

// Value of one unit of each currency in USD, served while the key is the mock sentinel.
const MOCK_USD_VALUES: Record<string, number> = {
  USD: 1.0,
  EUR: 1.08,
  GBP: 1.27,
  RUB: 0.0105,
  JPY: 0.0067,
  CHF: 1.13,
};

const latestSchema = z.union([
  z.object({
    result: z.literal('success'),
    base_code: z.string().optional(),
    conversion_rates: z.record(z.string(), z.unknown()).optional(),
    rates: z.record(z.string(), z.unknown()).optional(),
  }),
  z.object({
    result: z.literal('error'),
    'error-type': z.string().default('unknown-error'),
  }),
]);

export interface ExchangeRateOptions {
  url: string;
  apiKey: string;
  mockKey: string;
  timeoutMs: number;
  retry: RetryOptions;
  logger: Logger;
  http?: AxiosInstance;
}

export function createExchangeRateClient(baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { Accept: 'application/json', 'User-Agent': 'ratedesk/0.1' },
  });
}

export class ExchangeRateProvider implements RateProvider {
  readonly name = 'ExchangeRate-API';
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly opts: ExchangeRateOptions) {
    this.http = opts.http ?? createExchangeRateClient(opts.url, opts.timeoutMs);
    this.logger = opts.logger.child({ provider: this.name });
  }

  get isMock(): boolean {
    return this.opts.apiKey === this.opts.mockKey;
  }

  get source(): string {
    return this.isMock ? `${this.name} (mock)` : this.name;
  }

  async fetchRates(codes: readonly string[], base: string): Promise<FetchResult> {
    validateRequest(codes, base);
    if (this.isMock) return this.mockRates(codes, base);

    const started = Date.now();
    const { quotes, status } = await withRetry(
      this.name,
      async (attempt) => {
        this.logger.debug({ attempt, base }, 'requesting latest');
        const res = await this.http.get<unknown>(
          `/${encodeURIComponent(this.opts.apiKey)}/latest/${encodeURIComponent(base.toUpperCase())}`,
        );
        const parsed = latestSchema.safeParse(res.data);
        if (!parsed.success) {
          throw new ProviderError(this.name, 'MalformedResponse', 'unexpected latest body', res.status);
        }
        const body = parsed.data;
        if (body.result === 'error') throw this.apiError(body['error-type'], res.status);
        const table = body.conversion_rates ?? body.rates;
        if (!table) throw new ProviderError(this.name, 'MalformedResponse', 'no rates table', res.status);
        return { quotes: table, status: res.status };
      },
      this.opts.retry,
      this.logger,
    );

    // Quotes are units of CODE per one BASE; the cache stores CODE -> BASE.
    const rates: Record<string, number> = {};
    for (const code of codes) {
      const key = pairKey(code, base);
      if (!(code.toUpperCase() in quotes)) {
        this.logger.warn({ code }, 'rate missing from ExchangeRate-API response');
        continue;
      }
      const quote = acceptRate(quotes[code.toUpperCase()], key, this.logger);
      if (quote !== null) rates[key] = 1 / quote;
    }
    this.logger.info({ count: Object.keys(rates).length }, 'fiat rates fetched');
    return { rates, source: this.source, meta: { requestMs: Date.now() - started, statusCode: status } };
  }

  private mockRates(codes: readonly string[], base: string): FetchResult {
    this.logger.info('ExchangeRate-API key is the mock sentinel; serving fixed rates');
    const baseValue = MOCK_USD_VALUES[base.toUpperCase()] ?? 1.0;
    const rates: Record<string, number> = {};
    for (const code of codes) {
      const value = MOCK_USD_VALUES[code.toUpperCase()] ?? 1.0;
      rates[pairKey(code, base)] = value / baseValue;
    }
    return { rates, source: this.source, meta: { requestMs: 0, statusCode: 200 } };
  }

  private apiError(type: string, status: number): ProviderError {
    if (type === 'invalid-key' || type === 'inactive-account') {
      return new ProviderError(this.name, 'AuthenticationFailed', type, status);
    }
    if (type === 'quota-reached') return new ProviderError(this.name, 'RateLimited', type, status);
    return new ProviderError(this.name, 'MalformedResponse', type, status);
  }
}
