import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '../logger';
import { ProviderError } from '../errors';
import { withRetry } from './retry';
import type { RetryOptions } from './retry';
import { acceptRate, pairKey, validateRequest } from './types';
import type { FetchResult, RateProvider } from './types';

const simplePriceSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export interface CoinGeckoOptions {
  url: string;
  /** Ticker -> CoinGecko coin id, e.g. BTC -> bitcoin */
  idMap: Record<string, string>;
  timeoutMs: number;
  retry: RetryOptions;
  logger: Logger;
  http?: AxiosInstance;
}

export function createCoinGeckoClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { Accept: 'application/json', 'User-Agent': 'ratedesk/0.1' },
  });
}

export class CoinGeckoProvider implements RateProvider {
  readonly name = 'CoinGecko';
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly opts: CoinGeckoOptions) {
    this.http = opts.http ?? createCoinGeckoClient(opts.timeoutMs);
    this.logger = opts.logger.child({ provider: this.name });
  }

  async fetchRates(codes: readonly string[], base: string): Promise<FetchResult> {
    validateRequest(codes, base);
    const rawIds: Record<string, string> = {};
    for (const code of codes) {
      const id = this.opts.idMap[code.toUpperCase()];
      if (id) rawIds[code.toUpperCase()] = id;
      else this.logger.debug({ code }, 'no CoinGecko id configured; skipping');
    }
    const ids = Object.values(rawIds);
    if (!ids.length) return { rates: {}, source: this.name, meta: { requestMs: 0, statusCode: 0, rawIds } };

    const vs = base.toLowerCase();
    const started = Date.now();
    const { data, status } = await withRetry(
      this.name,
      async (attempt) => {
        this.logger.debug({ attempt, ids }, 'requesting simple/price');
        const res = await this.http.get<unknown>(this.opts.url, {
          params: { ids: ids.join(','), vs_currencies: vs },
        });
        const parsed = simplePriceSchema.safeParse(res.data);
        if (!parsed.success) {
          throw new ProviderError(this.name, 'MalformedResponse', 'unexpected simple/price body', res.status);
        }
        return { data: parsed.data, status: res.status };
      },
      this.opts.retry,
      this.logger,
    );

    const rates: Record<string, number> = {};
    for (const [code, id] of Object.entries(rawIds)) {
      const key = pairKey(code, base);
      const entry = data[id];
      if (!entry || !(vs in entry)) {
        this.logger.warn({ code, id }, 'rate missing from CoinGecko response');
        continue;
      }
      const rate = acceptRate(entry[vs], key, this.logger);
      if (rate !== null) rates[key] = rate;
    }
    this.logger.info({ count: Object.keys(rates).length }, 'crypto rates fetched');
    return { rates, source: this.name, meta: { requestMs: Date.now() - started, statusCode: status, rawIds } };
  }
}
