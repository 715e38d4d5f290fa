import { z } from 'zod';
import { ValidationError } from '../errors';
import { Wallet } from './wallet';
import type { WalletRecord } from './wallet';

export interface PortfolioRecord {
  user_id: number;
  wallets: Record<string, WalletRecord>;
}

const portfolioSchema = z.object({
  user_id: z.number().int().positive(),
  wallets: z
    .record(
      z.string(),
      z.object({
        currency_code: z.string().min(1),
        balance: z.number().finite().nonnegative(),
      }),
    )
    .default({}),
});

export class Portfolio {
  private readonly wallets = new Map<string, Wallet>();

  constructor(
    readonly ownerId: number,
    wallets: readonly Wallet[] = [],
  ) {
    for (const w of wallets) this.wallets.set(w.currencyCode, w);
  }

  hasWallet(code: string): boolean {
    return this.wallets.has(code.toUpperCase());
  }

  getWallet(code: string): Wallet | undefined {
    return this.wallets.get(code.toUpperCase());
  }

  addCurrency(code: string): Wallet {
    const key = code.toUpperCase();
    if (this.wallets.has(key)) throw new ValidationError(`Wallet '${key}' already exists`);
    const wallet = new Wallet(key);
    this.wallets.set(key, wallet);
    return wallet;
  }

  ensureWallet(code: string): { wallet: Wallet; created: boolean } {
    const existing = this.getWallet(code);
    if (existing) return { wallet: existing, created: false };
    return { wallet: this.addCurrency(code), created: true };
  }

  removeWallet(code: string): void {
    this.wallets.delete(code.toUpperCase());
  }

  listWallets(): Wallet[] {
    return Array.from(this.wallets.values());
  }

  balances(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const w of this.wallets.values()) out[w.currencyCode] = w.balance;
    return out;
  }

  toJSON(): PortfolioRecord {
    const wallets: Record<string, WalletRecord> = {};
    for (const w of this.wallets.values()) wallets[w.currencyCode] = w.toJSON();
    return { user_id: this.ownerId, wallets };
  }

  static fromJSON(raw: unknown): Portfolio {
    const parsed = portfolioSchema.safeParse(raw);
    if (!parsed.success) throw new ValidationError(`Invalid portfolio record: ${parsed.error.message}`);
    const wallets = Object.entries(parsed.data.wallets).map(([code, w]) => new Wallet(code.toUpperCase(), w.balance));
    return new Portfolio(parsed.data.user_id, wallets);
  }
}
