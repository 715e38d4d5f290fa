import { InsufficientFundsError, InvalidAmountError } from '../errors';

export interface WalletRecord {
  currency_code: string;
  balance: number;
}

function assertPositive(amount: number, op: string): void {
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    throw new InvalidAmountError(`${op} amount must be a positive number, got ${String(amount)}`);
  }
}

export class Wallet {
  private _balance: number;

  constructor(
    readonly currencyCode: string,
    balance = 0,
  ) {
    this._balance = Wallet.checkedBalance(balance);
  }

  get balance(): number {
    return this._balance;
  }

  deposit(amount: number): void {
    assertPositive(amount, 'Deposit');
    this._balance += amount;
  }

  /** False (balance untouched) when the wallet holds less than `amount`. */
  withdraw(amount: number): boolean {
    assertPositive(amount, 'Withdrawal');
    if (amount > this._balance) return false;
    this._balance -= amount;
    return true;
  }

  withdrawOrThrow(amount: number): void {
    if (!this.withdraw(amount)) {
      throw new InsufficientFundsError(this._balance, amount, this.currencyCode);
    }
  }

  /** Puts back a balance captured before a mutation that could not be persisted. */
  restore(balance: number): void {
    this._balance = Wallet.checkedBalance(balance);
  }

  toJSON(): WalletRecord {
    return { currency_code: this.currencyCode, balance: this._balance };
  }

  private static checkedBalance(value: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new InvalidAmountError(`Balance must be a non-negative number, got ${String(value)}`);
    }
    return value;
  }
}
