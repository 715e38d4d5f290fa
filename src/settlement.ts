import type { Settings } from './config';
import type { CurrencyRegistry } from './currencies';
import fallbackTable from './data/fallback-rates.json';
import { ApiRequestError, PersistenceError, RateUnavailableError, UserNotAuthenticatedError } from './errors';
import type { Ledger, TradeContext, TradeReceipt } from './ledger/ledger';
import type { ActionLog, Logger } from './logger';
import type { PortfolioRepository } from './portfolios';
import type { RateCache, RefreshReport } from './rates/cache';
import type { CurrencyPairRate } from './rates/snapshot';
import type { Result } from './result';
import type { UserManager } from './users';

type RateTable = Record<string, Record<string, number>>;

const SAME_CURRENCY_SOURCE = 'system';

export interface PortfolioRow {
  code: string;
  balance: number;
  rate: number;
  value: number;
  /** 'live' when the rate came from the cache, 'fallback' from the static table. */
  rateSource: 'live' | 'fallback';
}

export interface PortfolioView {
  userId: number;
  base: string;
  rows: PortfolioRow[];
  totalValue: number;
}

export interface SettlementDeps {
  settings: Settings;
  registry: CurrencyRegistry;
  users: UserManager;
  portfolios: PortfolioRepository;
  ledger: Ledger;
  rates: RateCache;
  actions: ActionLog;
  logger: Logger;
  fallbackRates?: RateTable;
  now?: () => Date;
}

/** Static table lookup, direct or through USD. */
export function fallbackRate(table: RateTable, from: string, to: string): number | undefined {
  if (from === to) return 1;
  const direct = table[from]?.[to];
  if (direct !== undefined) return direct;
  const toUsd = table[from]?.USD;
  const fromUsd = table.USD?.[to];
  if (toUsd !== undefined && fromUsd !== undefined) return toUsd * fromUsd;
  return undefined;
}

/**
 * Entry point for the shell: binds the logged-in session to the ledger and
 * the rate cache.
 */
export class SettlementService {
  private readonly logger: Logger;
  private readonly fallback: RateTable;
  private readonly now: () => Date;

  constructor(private readonly deps: SettlementDeps) {
    this.logger = deps.logger.child({ component: 'settlement' });
    this.fallback = deps.fallbackRates ?? fallbackTable;
    this.now = deps.now ?? (() => new Date());
  }

  async buy(code: string, amount: number): Promise<Result<TradeReceipt>> {
    return this.deps.ledger.buy(this.context(), code, amount);
  }

  async sell(code: string, amount: number): Promise<Result<TradeReceipt>> {
    return this.deps.ledger.sell(this.context(), code, amount);
  }

  /**
   * Live rate for any pair: the cached pair itself, the inverse of the
   * reverse pair, or a cross through the base currency.
   */
  async getRate(from: string, to: string): Promise<CurrencyPairRate> {
    const src = this.deps.registry.get(from).code;
    const dst = this.deps.registry.get(to).code;
    if (src === dst) {
      return { from: src, to: dst, rate: 1, observedAt: this.now().toISOString(), source: SAME_CURRENCY_SOURCE };
    }

    const apiFailures: ApiRequestError[] = [];
    const lookup = async (a: string, b: string): Promise<CurrencyPairRate | null> => {
      try {
        return await this.deps.rates.getRate(a, b);
      } catch (err) {
        if (err instanceof ApiRequestError) {
          apiFailures.push(err);
          return null;
        }
        if (err instanceof RateUnavailableError) return null;
        throw err;
      }
    };

    const direct = await lookup(src, dst);
    if (direct) return direct;

    const reverse = await lookup(dst, src);
    if (reverse) {
      return { from: src, to: dst, rate: 1 / reverse.rate, observedAt: reverse.observedAt, source: reverse.source };
    }

    const base = this.deps.settings.current().baseCurrency;
    if (src !== base && dst !== base) {
      const fromLeg = await lookup(src, base);
      const toLeg = fromLeg ? await lookup(dst, base) : null;
      if (fromLeg && toLeg) {
        return {
          from: src,
          to: dst,
          rate: fromLeg.rate / toLeg.rate,
          observedAt: fromLeg.observedAt < toLeg.observedAt ? fromLeg.observedAt : toLeg.observedAt,
          source: fromLeg.source === toLeg.source ? fromLeg.source : `${fromLeg.source}/${toLeg.source}`,
        };
      }
    }

    if (apiFailures.length > 0) throw apiFailures[0];
    throw new RateUnavailableError(src, dst, 'no live rate');
  }

  async refreshRates(): Promise<RefreshReport> {
    const handle = this.deps.actions.begin('REFRESH_RATES');
    try {
      const report = await this.deps.rates.refreshAll();
      if (report.errors.length > 0 && Object.keys(report.updatedBySource).length === 0) {
        handle.fail(report.errors.map((e) => e.message).join('; '), { totalPairs: report.totalPairs });
      } else {
        handle.succeed({ updatedBySource: report.updatedBySource, totalPairs: report.totalPairs });
      }
      return report;
    } catch (err) {
      handle.fail(err);
      throw err;
    }
  }

  async showPortfolio(base?: string): Promise<PortfolioView> {
    const ctx = this.context();
    if (!ctx) throw new UserNotAuthenticatedError();
    const target = this.deps.registry.get(base ?? this.deps.settings.current().baseCurrency).code;
    const handle = this.deps.actions.begin('SHOW_PORTFOLIO', { userId: ctx.userId, base: target });
    try {
      const rows: PortfolioRow[] = [];
      for (const wallet of ctx.portfolio.listWallets()) {
        const { rate, rateSource } = await this.convert(wallet.currencyCode, target);
        rows.push({ code: wallet.currencyCode, balance: wallet.balance, rate, value: wallet.balance * rate, rateSource });
      }
      const totalValue = rows.reduce((sum, r) => sum + r.value, 0);
      handle.succeed({ wallets: rows.length, totalValue });
      return { userId: ctx.userId, base: target, rows, totalValue };
    } catch (err) {
      handle.fail(err);
      throw err;
    }
  }

  private async convert(from: string, to: string): Promise<{ rate: number; rateSource: PortfolioRow['rateSource'] }> {
    if (from === to) return { rate: 1, rateSource: 'live' };
    try {
      const quote = await this.getRate(from, to);
      return { rate: quote.rate, rateSource: 'live' };
    } catch (err) {
      if (!(err instanceof RateUnavailableError) && !(err instanceof ApiRequestError)) throw err;
      const rate = fallbackRate(this.fallback, from, to);
      if (rate === undefined) throw new RateUnavailableError(from, to, 'no live or fallback rate');
      this.logger.warn({ from, to, rate }, 'using fallback rate');
      return { rate, rateSource: 'fallback' };
    }
  }

  private context(): TradeContext | null {
    const user = this.deps.users.whoami();
    if (!user) return null;
    const portfolio = this.deps.portfolios.get(user.userId);
    if (!portfolio) {
      throw new PersistenceError(`Portfolio for user ${user.userId} is missing`);
    }
    return { userId: user.userId, portfolio };
  }
}
