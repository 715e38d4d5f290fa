import type { Settings } from '../config';
import type { CurrencyRegistry } from '../currencies';
import { InsufficientFundsError, InvalidAmountError, UserNotAuthenticatedError, errorMessage } from '../errors';
import type { ActionFields, ActionLog, ActionName, Logger } from '../logger';
import type { CurrencyPairRate } from '../rates/snapshot';
import { fail, ok } from '../result';
import type { Result } from '../result';
import type { Portfolio } from './portfolio';
import type { Wallet } from './wallet';

export type TradeDirection = 'buy' | 'sell';

/** Authenticated caller; null when nobody is logged in. */
export interface TradeContext {
  userId: number;
  portfolio: Portfolio;
}

export interface RateSource {
  getRate(from: string, to: string): Promise<CurrencyPairRate>;
}

/** Durable write of every portfolio; throws when the write fails. */
export interface PortfolioSink {
  save(): void;
}

export interface BalanceChange {
  before: number;
  after: number;
}

export interface TradeReceipt {
  direction: TradeDirection;
  currency: string;
  amount: number;
  baseCurrency: string;
  rate: number;
  rateObservedAt: string;
  /** amount * rate, before commission */
  estimatedValue: number;
  commission: number;
  /** Cost debited (buy) or proceeds credited (sell), in the base currency. */
  total: number;
  currencyBalance: BalanceChange;
  baseBalance: BalanceChange;
}

export interface LedgerDeps {
  settings: Settings;
  registry: CurrencyRegistry;
  rates: RateSource;
  store: PortfolioSink;
  actions: ActionLog;
  logger: Logger;
}

interface Touched {
  wallet: Wallet;
  before: number;
}

/**
 * Two-leg trades against the rate cache. Wallets are mutated in memory, then
 * the portfolio store is written; a failed write puts every touched wallet
 * back before the call returns.
 */
export class Ledger {
  private readonly logger: Logger;

  constructor(private readonly deps: LedgerDeps) {
    this.logger = deps.logger.child({ component: 'ledger' });
  }

  buy(ctx: TradeContext | null, currency: string, amount: number): Promise<Result<TradeReceipt>> {
    return this.track('BUY', { userId: ctx?.userId, currency, amount }, () => this.executeBuy(ctx, currency, amount));
  }

  sell(ctx: TradeContext | null, currency: string, amount: number): Promise<Result<TradeReceipt>> {
    return this.track('SELL', { userId: ctx?.userId, currency, amount }, () => this.executeSell(ctx, currency, amount));
  }

  private async executeBuy(ctx: TradeContext | null, currency: string, amount: number): Promise<Result<TradeReceipt>> {
    const { portfolio, code } = this.precheck(ctx, currency, amount);
    const cfg = this.deps.settings.current();
    const base = cfg.baseCurrency;
    if (amount < cfg.MIN_TRADE_AMOUNT) {
      return fail('BELOW_MINIMUM', `Minimum purchase amount is ${cfg.MIN_TRADE_AMOUNT.toFixed(4)} ${code}`);
    }
    if (code === base) return fail('INVALID_INPUT', `Cannot buy ${base} with ${base}`);

    const quote = await this.deps.rates.getRate(code, base);
    const estimatedValue = amount * quote.rate;
    const commission = cfg.COMMISSION_RATE > 0 ? estimatedValue * cfg.COMMISSION_RATE : 0;
    const cost = estimatedValue + commission;

    const baseSlot = portfolio.ensureWallet(base);
    const targetSlot = portfolio.ensureWallet(code);
    const created = [baseSlot, targetSlot].filter((s) => s.created).map((s) => s.wallet.currencyCode);
    const baseWallet = baseSlot.wallet;
    const target = targetSlot.wallet;

    if (baseWallet.balance < cost) {
      const available = baseWallet.balance;
      for (const c of created) portfolio.removeWallet(c);
      return fail(
        'INSUFFICIENT_FUNDS',
        `Insufficient funds: required ${cost.toFixed(2)} ${base}, available ${available.toFixed(2)} ${base}`,
      );
    }

    const touched: Touched[] = [
      { wallet: baseWallet, before: baseWallet.balance },
      { wallet: target, before: target.balance },
    ];
    baseWallet.withdrawOrThrow(cost);
    target.deposit(amount);

    const committed = this.commit(portfolio, touched, created);
    if (!committed.ok) return committed;

    return ok({
      direction: 'buy',
      currency: code,
      amount,
      baseCurrency: base,
      rate: quote.rate,
      rateObservedAt: quote.observedAt,
      estimatedValue,
      commission,
      total: cost,
      currencyBalance: { before: touched[1].before, after: target.balance },
      baseBalance: { before: touched[0].before, after: baseWallet.balance },
    });
  }

  private async executeSell(ctx: TradeContext | null, currency: string, amount: number): Promise<Result<TradeReceipt>> {
    const { portfolio, code } = this.precheck(ctx, currency, amount);
    const cfg = this.deps.settings.current();
    const base = cfg.baseCurrency;
    if (amount < cfg.MIN_TRADE_AMOUNT) {
      return fail('BELOW_MINIMUM', `Minimum sale amount is ${cfg.MIN_TRADE_AMOUNT.toFixed(4)} ${code}`);
    }
    if (code === base) return fail('INVALID_INPUT', `Cannot sell ${base} for ${base}`);

    const source = portfolio.getWallet(code);
    if (!source) {
      return fail('NO_WALLET', `You have no '${code}' wallet; it is created on the first purchase`);
    }
    if (source.balance < amount) {
      throw new InsufficientFundsError(source.balance, amount, code);
    }

    const quote = await this.deps.rates.getRate(code, base);
    const estimatedValue = amount * quote.rate;
    const commission = cfg.COMMISSION_RATE > 0 ? estimatedValue * cfg.COMMISSION_RATE : 0;
    const proceeds = estimatedValue - commission;

    const baseSlot = portfolio.ensureWallet(base);
    const baseWallet = baseSlot.wallet;
    const created = baseSlot.created ? [base] : [];

    const touched: Touched[] = [
      { wallet: source, before: source.balance },
      { wallet: baseWallet, before: baseWallet.balance },
    ];
    source.withdrawOrThrow(amount);
    if (proceeds > 0) baseWallet.deposit(proceeds);

    const committed = this.commit(portfolio, touched, created);
    if (!committed.ok) return committed;

    return ok({
      direction: 'sell',
      currency: code,
      amount,
      baseCurrency: base,
      rate: quote.rate,
      rateObservedAt: quote.observedAt,
      estimatedValue,
      commission,
      total: proceeds,
      currencyBalance: { before: touched[0].before, after: source.balance },
      baseBalance: { before: touched[1].before, after: baseWallet.balance },
    });
  }

  /** Authentication, then amount, then currency; all before any state is touched. */
  private precheck(ctx: TradeContext | null, currency: string, amount: number): { portfolio: Portfolio; code: string } {
    if (!ctx) throw new UserNotAuthenticatedError();
    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
      throw new InvalidAmountError(`Amount must be a positive number, got ${String(amount)}`);
    }
    const code = this.deps.registry.get(currency).code;
    return { portfolio: ctx.portfolio, code };
  }

  private commit(portfolio: Portfolio, touched: Touched[], created: string[]): Result<void> {
    try {
      this.deps.store.save();
      return ok(undefined);
    } catch (err) {
      for (const t of touched) t.wallet.restore(t.before);
      for (const code of created) portfolio.removeWallet(code);
      this.logger.error({ err, userId: portfolio.ownerId }, 'portfolio save failed; trade rolled back');
      return fail('PERSISTENCE', `Could not save the portfolio, trade rolled back: ${errorMessage(err)}`);
    }
  }

  private async track<T>(
    action: ActionName,
    fields: ActionFields,
    op: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    const handle = this.deps.actions.begin(action, fields);
    try {
      const result = await op();
      if (result.ok) handle.succeed();
      else handle.fail(result.error);
      return result;
    } catch (err) {
      handle.fail(err);
      throw err;
    }
  }
}
