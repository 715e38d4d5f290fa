import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import type { App } from '../src/app';
import { Shell, parseCommand } from '../src/cli';
import { Settings } from '../src/config';
import { ValidationError } from '../src/errors';
import { FakeProvider, fixedClock, makeTempDir, removeDir, silentLogger } from './helpers';

describe('parseCommand', () => {
  it('splits a line into a lowercase command and flags', () => {
    expect(parseCommand('  BUY --currency BTC   --amount 0.5 ')).toEqual({
      name: 'buy',
      flags: { currency: 'BTC', amount: '0.5' },
    });
    expect(parseCommand('whoami')).toEqual({ name: 'whoami', flags: {} });
  });

  it('returns null for a blank line', () => {
    expect(parseCommand('   ')).toBeNull();
  });

  it('rejects flags without values and stray arguments', () => {
    expect(() => parseCommand('buy --currency')).toThrow(new ValidationError('Flag --currency needs a value'));
    expect(() => parseCommand('buy --currency --amount 1')).toThrow('Flag --currency needs a value');
    expect(() => parseCommand('buy BTC')).toThrow("Unexpected argument 'BTC'");
  });
});

describe('Shell', () => {
  let dir: string;
  let app: App;
  let lines: string[];
  let tables: unknown[];
  let shell: Shell;

  beforeEach(() => {
    dir = makeTempDir();
    app = createApp(Settings.from({ DATA_DIR: dir, COMMISSION_RATE: '0', BACKUP_ENABLED: 'false' }), silentLogger, {
      providers: [{ provider: new FakeProvider('fake-crypto', { BTC_USD: 50000, EUR_USD: 1.25 }), codes: ['BTC', 'EUR'] }],
      now: fixedClock('2025-01-01T00:00:00.000Z').now,
    });
    lines = [];
    tables = [];
    shell = new Shell(app, { log: (m) => lines.push(m), table: (rows) => tables.push(rows) });
  });

  afterEach(() => {
    app.close();
    removeDir(dir);
  });

  it('stops on exit and ignores blank lines', async () => {
    expect(await shell.execute('')).toBe(true);
    expect(await shell.execute('exit')).toBe(false);
    expect(lines).toEqual([]);
  });

  it('walks through registration and login', async () => {
    await shell.execute('register --username alice --password secret1');
    await shell.execute('login --username alice --password secret1');
    await shell.execute('whoami');
    expect(lines).toEqual([
      "User 'alice' registered (id=1). Log in with: login --username alice --password ****",
      "Logged in as 'alice'",
      'alice (id=1, registered 2025-01-01T00:00:00.000Z)',
    ]);
  });

  it('prints readable errors instead of throwing', async () => {
    expect(await shell.execute('buy --currency BTC --amount 1')).toBe(true);
    await shell.execute('get-rate --from XYZ --to USD');
    await shell.execute('buy --currency');
    await shell.execute('frobnicate');
    expect(lines).toEqual([
      "Error: Login required. Use 'login' first.",
      "Error: Unknown currency 'XYZ'. Run 'currencies' to list supported codes.",
      'Error: Flag --currency needs a value',
      "Unknown command 'frobnicate'. Type 'help' for the list.",
    ]);
  });

  it('reports soft trade failures', async () => {
    await shell.execute('register --username alice --password secret1');
    await shell.execute('login --username alice --password secret1');
    lines.length = 0;
    await shell.execute('sell --currency BTC --amount 1');
    expect(lines).toEqual(["Failed: You have no 'BTC' wallet; it is created on the first purchase"]);
  });

  it('prints a trade receipt and the portfolio', async () => {
    await shell.execute('register --username alice --password secret1');
    await shell.execute('login --username alice --password secret1');
    app.portfolios.get(1)?.ensureWallet('USD').wallet.deposit(1000);
    lines.length = 0;

    await shell.execute('buy --currency BTC --amount 0.01');
    expect(lines).toEqual([
      'Bought 0.0100 BTC at 50000 USD/BTC',
      'Cost: 500.00 USD (commission 0.00)',
      'BTC: 0.0000 -> 0.0100',
      'USD: 1000.00 -> 500.00',
    ]);

    lines.length = 0;
    await shell.execute('show-portfolio');
    expect(tables).toEqual([
      [
        { Currency: 'USD', Balance: '500.0000', Rate: 1, 'Value (USD)': '500.00', Source: 'live' },
        { Currency: 'BTC', Balance: '0.0100', Rate: 50000, 'Value (USD)': '500.00', Source: 'live' },
      ],
    ]);
    expect(lines).toEqual(['Total: 1000.00 USD']);
  });

  it('shows rates and cache state', async () => {
    await shell.execute('get-rate --from BTC --to USD');
    await shell.execute('cache-info');
    expect(lines).toEqual([
      'Rate BTC->USD: 50000 (updated 2025-01-01T00:00:00.000Z, source fake-crypto)',
      'Reverse USD->BTC: 0.0000200000',
      'Pairs cached: 3',
      'Last refresh: 2025-01-01T00:00:00.000Z',
      'Fresh: yes (TTL 5 min)',
      'Pairs: BTC_USD, EUR_USD, USD_USD',
    ]);
  });

  it('derives a rate from the reverse pair', async () => {
    await shell.execute('get-rate --from USD --to EUR');
    expect(lines).toEqual([
      'Rate USD->EUR: 0.8 (updated 2025-01-01T00:00:00.000Z, source fake-crypto)',
      'Reverse EUR->USD: 1.25000',
    ]);
  });
});
