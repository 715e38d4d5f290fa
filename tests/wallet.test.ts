import { describe, expect, it } from 'vitest';
import { InsufficientFundsError, InvalidAmountError, ValidationError } from '../src/errors';
import { Portfolio } from '../src/ledger/portfolio';
import { Wallet } from '../src/ledger/wallet';

describe('Wallet', () => {
  it('rejects non-positive and non-finite amounts', () => {
    const w = new Wallet('USD', 10);
    expect(() => w.deposit(0)).toThrow(InvalidAmountError);
    expect(() => w.deposit(-1)).toThrow(InvalidAmountError);
    expect(() => w.withdraw(Number.POSITIVE_INFINITY)).toThrow(InvalidAmountError);
    expect(w.balance).toBe(10);
  });

  it('refuses to overdraw and leaves the balance untouched', () => {
    const w = new Wallet('BTC', 0.01);
    expect(w.withdraw(0.02)).toBe(false);
    expect(w.balance).toBe(0.01);
    expect(w.withdraw(0.01)).toBe(true);
    expect(w.balance).toBe(0);
  });

  it('reports available and required amounts when withdrawing strictly', () => {
    const w = new Wallet('BTC', 0.01);
    let caught: unknown;
    try {
      w.withdrawOrThrow(0.02);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InsufficientFundsError);
    expect(caught).toMatchObject({ available: 0.01, required: 0.02, code: 'BTC' });
    expect(caught).toHaveProperty('message', 'Insufficient funds: available 0.0100 BTC, required 0.0200 BTC');
  });

  it('never holds a negative balance', () => {
    expect(() => new Wallet('USD', -1)).toThrow(InvalidAmountError);
    expect(() => new Wallet('USD').restore(-0.5)).toThrow(InvalidAmountError);
  });
});

describe('Portfolio', () => {
  it('creates wallets once per code', () => {
    const p = new Portfolio(1);
    expect(p.ensureWallet('usd').created).toBe(true);
    expect(p.ensureWallet('USD').created).toBe(false);
    expect(() => p.addCurrency('Usd')).toThrow(ValidationError);
    expect(p.hasWallet('usd')).toBe(true);
    expect(p.getWallet('EUR')).toBeUndefined();
  });

  it('serialises to the stored record layout and back', () => {
    const p = new Portfolio(7, [new Wallet('USD', 125.5), new Wallet('BTC', 0.25)]);
    const record = p.toJSON();
    expect(record).toEqual({
      user_id: 7,
      wallets: {
        USD: { currency_code: 'USD', balance: 125.5 },
        BTC: { currency_code: 'BTC', balance: 0.25 },
      },
    });
    const restored = Portfolio.fromJSON(record);
    expect(restored.ownerId).toBe(7);
    expect(restored.balances()).toEqual({ USD: 125.5, BTC: 0.25 });
  });

  it('rejects malformed records', () => {
    expect(() => Portfolio.fromJSON({ user_id: 0, wallets: {} })).toThrow(ValidationError);
    expect(() => Portfolio.fromJSON({ user_id: 1, wallets: { USD: { currency_code: 'USD', balance: -3 } } })).toThrow(
      ValidationError,
    );
    expect(Portfolio.fromJSON({ user_id: 2 }).listWallets()).toEqual([]);
  });
});
