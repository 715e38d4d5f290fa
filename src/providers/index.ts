import { MOCK_API_KEY } from '../config';
import type { AppConfig } from '../config';
import type { Logger } from '../logger';
import type { ProviderBinding } from '../rates/cache';
import { CoinGeckoProvider } from './coingecko';
import { ExchangeRateProvider } from './exchangeRate';

export function createProviderBindings(cfg: AppConfig, logger: Logger): ProviderBinding[] {
  const retry = { attempts: cfg.MAX_RETRIES, delayMs: cfg.RETRY_DELAY_MS };
  const crypto = new CoinGeckoProvider({
    url: cfg.COINGECKO_URL,
    idMap: cfg.cryptoIdMap,
    timeoutMs: cfg.REQUEST_TIMEOUT_MS,
    retry,
    logger,
  });
  const fiat = new ExchangeRateProvider({
    url: cfg.EXCHANGERATE_URL,
    apiKey: cfg.EXCHANGERATE_API_KEY,
    mockKey: MOCK_API_KEY,
    timeoutMs: cfg.REQUEST_TIMEOUT_MS,
    retry,
    logger,
  });
  if (fiat.isMock) logger.warn('EXCHANGERATE_API_KEY not set; fiat rates run in mock mode');
  return [
    { provider: crypto, codes: cfg.cryptoList },
    { provider: fiat, codes: cfg.fiatList },
  ];
}
