import { z } from 'zod';

export const MOCK_API_KEY = 'MOCK_KEY_FOR_NOW';

const configSchema = z.object({
  LOG_LEVEL: z.string().default('info'),
  DATA_DIR: z.string().min(1).default('data'),
  USERS_FILE: z.string().min(1).default('users.json'),
  PORTFOLIOS_FILE: z.string().min(1).default('portfolios.json'),
  RATES_FILE: z.string().min(1).default('rates.json'),
  HISTORY_FILE: z.string().min(1).default('rate_history.json'),
  BACKUP_ENABLED: z.string().optional(),
  BACKUP_DIR: z.string().min(1).default('backups'),
  BACKUP_KEEP: z.coerce.number().int().nonnegative().default(5),
  BASE_CURRENCY: z.string().regex(/^[A-Za-z]{2,5}$/).default('USD'),
  COMMISSION_RATE: z.coerce.number().min(0).lt(1).default(0.001),
  MIN_TRADE_AMOUNT: z.coerce.number().nonnegative().default(0.0001),
  RATES_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  UPDATE_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
  MAX_RETRIES: z.coerce.number().int().positive().default(3),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  COINGECKO_URL: z.string().url().default('https://api.coingecko.com/api/v3/simple/price'),
  EXCHANGERATE_URL: z.string().url().default('https://v6.exchangerate-api.com/v6'),
  EXCHANGERATE_API_KEY: z.string().min(1).default(MOCK_API_KEY),
  CRYPTO_CURRENCIES: z
    .string()
    .min(1)
    .default('BTC:bitcoin,ETH:ethereum,LTC:litecoin,XRP:ripple,ADA:cardano'),
  FIAT_CURRENCIES: z.string().min(1).default('EUR,GBP,RUB,JPY,CHF'),
});

export type AppConfig = z.infer<typeof configSchema> & {
  baseCurrency: string;
  backupEnabled: boolean;
  rateTtlMs: number;
  cryptoIdMap: Record<string, string>;
  cryptoList: string[];
  fiatList: string[];
  isMockFiat: boolean;
};

function parseCodeList(raw: string): string[] {
  return Array.from(
    new Set(
      raw
        .split(',')
        .map((s) => s.trim().toUpperCase())
        .filter(Boolean),
    ),
  );
}

// "BTC:bitcoin,ETH" -> { BTC: 'bitcoin', ETH: 'eth' }
function parseCryptoMap(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const item of raw.split(',')) {
    const [code, id] = item.split(':').map((s) => s.trim());
    if (!code) continue;
    out[code.toUpperCase()] = id || code.toLowerCase();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  const cryptoIdMap = parseCryptoMap(cfg.CRYPTO_CURRENCIES);
  return {
    ...cfg,
    baseCurrency: cfg.BASE_CURRENCY.toUpperCase(),
    backupEnabled: (cfg.BACKUP_ENABLED ?? 'true').toLowerCase() === 'true',
    rateTtlMs: cfg.RATES_TTL_SECONDS * 1000,
    cryptoIdMap,
    cryptoList: Object.keys(cryptoIdMap),
    fiatList: parseCodeList(cfg.FIAT_CURRENCIES),
    isMockFiat: cfg.EXCHANGERATE_API_KEY === MOCK_API_KEY,
  };
}

/**
 * Holds the active configuration. Components that must observe a reload on
 * their next call keep the holder and read `current()` each time.
 */
export class Settings {
  private cfg: AppConfig;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    initial?: AppConfig,
  ) {
    this.cfg = initial ?? loadConfig(env);
  }

  current(): AppConfig {
    return this.cfg;
  }

  reload(): AppConfig {
    this.cfg = loadConfig(this.env);
    return this.cfg;
  }

  static from(overrides: Record<string, string> = {}): Settings {
    return new Settings({ ...overrides });
  }
}
