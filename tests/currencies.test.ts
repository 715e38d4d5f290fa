import { describe, expect, it } from 'vitest';
import { CurrencyRegistry, createDefaultRegistry, displayInfo } from '../src/currencies';
import { CurrencyNotFoundError, ValidationError } from '../src/errors';

describe('CurrencyRegistry', () => {
  it('loads the bundled currencies', () => {
    const registry = createDefaultRegistry();
    expect(registry.all().map((c) => c.code).sort()).toEqual(
      ['ADA', 'BTC', 'CHF', 'ETH', 'EUR', 'GBP', 'JPY', 'LTC', 'RUB', 'USD', 'XRP'],
    );
    expect(registry.get(' btc ').kind).toBe('crypto');
    expect(registry.get('eur').kind).toBe('fiat');
    expect(registry.has('usd')).toBe(true);
  });

  it('throws CurrencyNotFoundError with the normalised code', () => {
    const registry = createDefaultRegistry();
    expect(() => registry.get('xyz')).toThrow(CurrencyNotFoundError);
    expect(() => registry.get('xyz')).toThrow("Unknown currency 'XYZ'");
  });

  it('rejects duplicates and malformed entries', () => {
    const registry = new CurrencyRegistry([{ kind: 'fiat', code: 'ZZZ', name: 'Test Dollar', issuingCountry: 'Nowhere' }]);
    expect(() =>
      registry.register({ kind: 'fiat', code: 'zzz', name: 'Other', issuingCountry: 'Elsewhere' }),
    ).toThrow(ValidationError);
    expect(() =>
      registry.register({ kind: 'crypto', code: 'TOOLONG', name: 'Long', algorithm: 'none' }),
    ).toThrow(ValidationError);
    expect(registry.all()).toHaveLength(1);
  });
});

describe('displayInfo', () => {
  it('formats fiat currencies with the issuer', () => {
    expect(displayInfo({ kind: 'fiat', code: 'ZZZ', name: 'Test Dollar', issuingCountry: 'Nowhere' })).toBe(
      '[FIAT] ZZZ — Test Dollar (Issuing: Nowhere)',
    );
  });

  it('formats large market caps in exponent form', () => {
    expect(
      displayInfo({ kind: 'crypto', code: 'TST', name: 'Testcoin', algorithm: 'SHA-256', marketCap: 1.12e12 }),
    ).toBe('[CRYPTO] TST — Testcoin (Algo: SHA-256, MCAP: 1.12e+12)');
    expect(
      displayInfo({ kind: 'crypto', code: 'TST', name: 'Testcoin', algorithm: 'SHA-256', marketCap: 1500 }),
    ).toBe('[CRYPTO] TST — Testcoin (Algo: SHA-256, MCAP: 1,500.00)');
  });
});
