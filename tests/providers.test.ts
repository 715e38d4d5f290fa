import axios, { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { MOCK_API_KEY } from '../src/config';
import { ProviderError, ValidationError } from '../src/errors';
import { CoinGeckoProvider } from '../src/providers/coingecko';
import { ExchangeRateProvider } from '../src/providers/exchangeRate';
import { classifyHttpError } from '../src/providers/types';
import { silentLogger } from './helpers';

type Reply = { status: number; data: unknown };

function fakeHttp(replies: Reply[]): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = replies[Math.min(requests.length, replies.length) - 1];
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
      }
      return response;
    },
  });
  return { http, requests };
}

const retry = { attempts: 3, delayMs: 0, sleep: async () => undefined };

function coinGecko(replies: Reply[]) {
  const { http, requests } = fakeHttp(replies);
  const provider = new CoinGeckoProvider({
    url: 'https://rates.example.test/simple/price',
    idMap: { BTC: 'bitcoin', ETH: 'ethereum' },
    timeoutMs: 1000,
    retry,
    logger: silentLogger,
    http,
  });
  return { provider, requests };
}

function exchangeRate(replies: Reply[], apiKey = 'test-secret') {
  const { http, requests } = fakeHttp(replies);
  const provider = new ExchangeRateProvider({
    url: 'https://fx.example.test/v6',
    apiKey,
    mockKey: MOCK_API_KEY,
    timeoutMs: 1000,
    retry,
    logger: silentLogger,
    http,
  });
  return { provider, requests };
}

describe('CoinGeckoProvider', () => {
  it('maps coin ids back to FROM_TO pairs', async () => {
    const { provider, requests } = coinGecko([
      { status: 200, data: { bitcoin: { usd: 50000 }, ethereum: { usd: 3000 } } },
    ]);
    const result = await provider.fetchRates(['BTC', 'ETH'], 'USD');
    expect(result.rates).toEqual({ BTC_USD: 50000, ETH_USD: 3000 });
    expect(result.source).toBe('CoinGecko');
    expect(result.meta.statusCode).toBe(200);
    expect(result.meta.rawIds).toEqual({ BTC: 'bitcoin', ETH: 'ethereum' });
    expect(requests[0].params).toEqual({ ids: 'bitcoin,ethereum', vs_currencies: 'usd' });
  });

  it('skips coins that are missing or carry a non-positive price', async () => {
    const { provider } = coinGecko([{ status: 200, data: { bitcoin: { usd: 0 } } }]);
    const result = await provider.fetchRates(['BTC', 'ETH'], 'USD');
    expect(result.rates).toEqual({});
  });

  it('does not retry a rate limit', async () => {
    const { provider, requests } = coinGecko([{ status: 429, data: {} }]);
    const err = await provider.fetchRates(['BTC'], 'USD').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ kind: 'RateLimited', status: 429 });
    expect(requests).toHaveLength(1);
  });

  it('retries server errors until a reply succeeds', async () => {
    const { provider, requests } = coinGecko([
      { status: 503, data: {} },
      { status: 502, data: {} },
      { status: 200, data: { bitcoin: { usd: 42000 } } },
    ]);
    const result = await provider.fetchRates(['BTC'], 'USD');
    expect(result.rates).toEqual({ BTC_USD: 42000 });
    expect(requests).toHaveLength(3);
  });

  it('gives up after the configured attempts on a malformed body', async () => {
    const { provider, requests } = coinGecko([{ status: 200, data: ['not', 'an', 'object'] }]);
    await expect(provider.fetchRates(['BTC'], 'USD')).rejects.toMatchObject({ kind: 'MalformedResponse' });
    expect(requests).toHaveLength(3);
  });

  it('validates the request before calling out', async () => {
    const { provider, requests } = coinGecko([]);
    await expect(provider.fetchRates([], 'USD')).rejects.toBeInstanceOf(ValidationError);
    await expect(provider.fetchRates(['BTC'], 'U$D')).rejects.toBeInstanceOf(ValidationError);
    expect(requests).toHaveLength(0);
  });
});

describe('ExchangeRateProvider', () => {
  it('serves fixed rates without a request while the key is the mock sentinel', async () => {
    const { provider, requests } = exchangeRate([], MOCK_API_KEY);
    expect(provider.isMock).toBe(true);
    const result = await provider.fetchRates(['EUR', 'GBP'], 'USD');
    expect(result.rates).toEqual({ EUR_USD: 1.08, GBP_USD: 1.27 });
    expect(result.source).toBe('ExchangeRate-API (mock)');
    expect(requests).toHaveLength(0);
  });

  it('inverts quotes per base into CODE_BASE rates', async () => {
    const { provider, requests } = exchangeRate([
      { status: 200, data: { result: 'success', base_code: 'USD', conversion_rates: { USD: 1, EUR: 0.5, GBP: 0.8 } } },
    ]);
    const result = await provider.fetchRates(['EUR', 'GBP', 'CHF'], 'USD');
    expect(result.rates).toEqual({ EUR_USD: 2, GBP_USD: 1.25 });
    expect(result.source).toBe('ExchangeRate-API');
    expect(requests[0].url).toBe('/test-secret/latest/USD');
  });

  it('maps API error types to provider error kinds', async () => {
    const invalidKey = exchangeRate([{ status: 200, data: { result: 'error', 'error-type': 'invalid-key' } }]);
    await expect(invalidKey.provider.fetchRates(['EUR'], 'USD')).rejects.toMatchObject({ kind: 'AuthenticationFailed' });
    expect(invalidKey.requests).toHaveLength(1);

    const quota = exchangeRate([{ status: 200, data: { result: 'error', 'error-type': 'quota-reached' } }]);
    await expect(quota.provider.fetchRates(['EUR'], 'USD')).rejects.toMatchObject({ kind: 'RateLimited' });

    const denied = exchangeRate([{ status: 401, data: {} }]);
    await expect(denied.provider.fetchRates(['EUR'], 'USD')).rejects.toMatchObject({ kind: 'AuthenticationFailed' });
  });
});

describe('classifyHttpError', () => {
  function httpError(status: number): AxiosError {
    const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
    return new AxiosError('failed', 'ERR_BAD_RESPONSE', config, undefined, {
      data: null,
      status,
      statusText: '',
      headers: {},
      config,
    });
  }

  it('classifies by status and error type', () => {
    expect(classifyHttpError('P', httpError(403)).kind).toBe('AuthenticationFailed');
    expect(classifyHttpError('P', httpError(404)).kind).toBe('MalformedResponse');
    expect(classifyHttpError('P', httpError(500)).kind).toBe('Network');
    expect(classifyHttpError('P', new AxiosError('timeout', 'ECONNABORTED')).message).toBe('P: Network: ECONNABORTED');
    expect(classifyHttpError('P', new SyntaxError('bad json')).kind).toBe('MalformedResponse');
    expect(classifyHttpError('P', new Error('boom')).retryable).toBe(true);
  });
});
