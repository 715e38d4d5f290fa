import readline from 'readline';
import type { App } from './app';
import { displayInfo } from './currencies';
import {
  ApiRequestError,
  CurrencyNotFoundError,
  InsufficientFundsError,
  ProviderError,
  RateUnavailableError,
  TradeDeskError,
  UserNotAuthenticatedError,
  ValidationError,
  errorMessage,
} from './errors';
import type { TradeReceipt } from './ledger/ledger';
import type { Result } from './result';

export interface ParsedCommand {
  name: string;
  flags: Record<string, string>;
}

/** Where the shell writes; `console` fits. */
export interface ShellOutput {
  log(message: string): void;
  table(rows: unknown): void;
}

const HELP = `Commands:
  register --username <name> --password <pass>
  login --username <name> --password <pass>
  logout
  whoami
  show-portfolio [--base <code>]
  buy --currency <code> --amount <n>
  sell --currency <code> --amount <n>
  get-rate --from <code> --to <code>
  update-rates
  cache-info
  history --currency <code> [--limit <n>]
  stats
  currencies
  help
  exit`;

/** "buy --currency BTC --amount 0.5" -> { name: 'buy', flags: { currency: 'BTC', amount: '0.5' } } */
export function parseCommand(line: string): ParsedCommand | null {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;
  const [name, ...rest] = tokens;
  const flags: Record<string, string> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith('--') || token.length === 2) {
      throw new ValidationError(`Unexpected argument '${token}'`);
    }
    const value = rest[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`Flag ${token} needs a value`);
    }
    flags[token.slice(2)] = value;
    i++;
  }
  return { name: name.toLowerCase(), flags };
}

function required(flags: Record<string, string>, name: string): string {
  const v = flags[name];
  if (v === undefined) throw new ValidationError(`Missing --${name}`);
  return v;
}

function positiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ValidationError(`--${name} must be a positive integer`);
  return n;
}

/** Human-readable text for an error raised by a command. */
export function describeError(err: unknown): string {
  if (err instanceof InsufficientFundsError) return `Error: ${err.message}`;
  if (err instanceof CurrencyNotFoundError) {
    return `Error: ${err.message}. Run 'currencies' to list supported codes.`;
  }
  if (err instanceof RateUnavailableError || err instanceof ApiRequestError) {
    return `Error: ${err.message}. Try 'update-rates' later.`;
  }
  if (err instanceof UserNotAuthenticatedError) return `Error: ${err.message}. Use 'login' first.`;
  if (err instanceof ProviderError) return `Error: rate provider failed (${err.message}).`;
  if (err instanceof TradeDeskError) return `Error: ${err.message}`;
  return `Unexpected error: ${errorMessage(err)}`;
}

export class Shell {
  constructor(
    private readonly app: App,
    private readonly out: ShellOutput = console,
  ) {}

  /** Runs one input line; false once the user asks to leave. */
  async execute(line: string): Promise<boolean> {
    try {
      const cmd = parseCommand(line);
      if (!cmd) return true;
      if (cmd.name === 'exit' || cmd.name === 'quit') return false;
      await this.dispatch(cmd);
    } catch (err) {
      if (!(err instanceof TradeDeskError)) this.app.logger.error({ err }, 'command failed');
      this.out.log(describeError(err));
    }
    return true;
  }

  async run(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): Promise<void> {
    const rl = readline.createInterface({ input, output });
    rl.setPrompt('ratedesk> ');
    this.out.log("Type 'help' for commands.");
    rl.prompt();
    for await (const line of rl) {
      if (!(await this.execute(line))) break;
      rl.prompt();
    }
    rl.close();
  }

  private async dispatch(cmd: ParsedCommand): Promise<void> {
    const { flags } = cmd;
    switch (cmd.name) {
      case 'register': {
        const username = required(flags, 'username');
        const res = this.app.users.register(username, required(flags, 'password'));
        if (res.ok) {
          this.out.log(
            `User '${res.value.username}' registered (id=${res.value.userId}). Log in with: login --username ${res.value.username} --password ****`,
          );
        } else {
          this.out.log(`Failed: ${res.error.message}`);
        }
        return;
      }
      case 'login': {
        const res = this.app.users.login(required(flags, 'username'), required(flags, 'password'));
        this.out.log(res.ok ? `Logged in as '${res.value.username}'` : `Failed: ${res.error.message}`);
        return;
      }
      case 'logout': {
        const res = this.app.users.logout();
        this.out.log(res.ok ? `User '${res.value}' logged out` : `Failed: ${res.error.message}`);
        return;
      }
      case 'whoami': {
        const me = this.app.users.whoami();
        this.out.log(me ? `${me.username} (id=${me.userId}, registered ${me.registrationDate})` : 'Not logged in');
        return;
      }
      case 'show-portfolio':
        return this.showPortfolio(flags.base);
      case 'buy':
      case 'sell': {
        const currency = required(flags, 'currency');
        const amount = Number(required(flags, 'amount'));
        const res =
          cmd.name === 'buy'
            ? await this.app.settlement.buy(currency, amount)
            : await this.app.settlement.sell(currency, amount);
        this.printTrade(res);
        return;
      }
      case 'get-rate':
        return this.getRate(required(flags, 'from'), required(flags, 'to'));
      case 'update-rates':
        return this.updateRates();
      case 'cache-info': {
        const info = this.app.rates.cacheInfo();
        this.out.log(`Pairs cached: ${info.pairsCount}`);
        this.out.log(`Last refresh: ${info.lastRefresh ?? 'never'}`);
        this.out.log(`Fresh: ${info.isFresh ? 'yes' : 'no'} (TTL ${info.ttlMinutes} min)`);
        if (info.pairs.length > 0) this.out.log(`Pairs: ${info.pairs.join(', ')}`);
        return;
      }
      case 'history': {
        const code = this.app.registry.get(required(flags, 'currency')).code;
        const rows = this.app.history.history(code, positiveInt(flags.limit, 10, 'limit'));
        if (rows.length === 0) {
          this.out.log(`No history for ${code}`);
          return;
        }
        this.out.table(rows.map((r) => ({ Pair: `${r.from_currency}/${r.to_currency}`, Rate: r.rate, At: r.timestamp, Source: r.source })));
        return;
      }
      case 'stats': {
        const stats = this.app.history.stats();
        if (stats.length === 0) {
          this.out.log('Rate history is empty');
          return;
        }
        this.out.table(
          stats.map((s) => ({
            Currency: s.currency,
            Records: s.recordCount,
            Min: s.minRate,
            Max: s.maxRate,
            Avg: Number(s.avgRate.toFixed(6)),
            Sources: s.sources.join(', '),
          })),
        );
        return;
      }
      case 'currencies':
        for (const c of this.app.registry.all()) this.out.log(displayInfo(c));
        return;
      case 'help':
        this.out.log(HELP);
        return;
      default:
        this.out.log(`Unknown command '${cmd.name}'. Type 'help' for the list.`);
    }
  }

  private async showPortfolio(base: string | undefined): Promise<void> {
    const view = await this.app.settlement.showPortfolio(base);
    if (view.rows.length === 0) {
      this.out.log('Portfolio is empty');
      return;
    }
    this.out.table(
      view.rows.map((r) => ({
        Currency: r.code,
        Balance: r.balance.toFixed(4),
        Rate: r.rate,
        [`Value (${view.base})`]: r.value.toFixed(2),
        Source: r.rateSource,
      })),
    );
    this.out.log(`Total: ${view.totalValue.toFixed(2)} ${view.base}`);
  }

  private async getRate(from: string, to: string): Promise<void> {
    const quote = await this.app.settlement.getRate(from, to);
    this.out.log(`Rate ${quote.from}->${quote.to}: ${quote.rate} (updated ${quote.observedAt}, source ${quote.source})`);
    this.out.log(`Reverse ${quote.to}->${quote.from}: ${(1 / quote.rate).toPrecision(6)}`);
  }

  private async updateRates(): Promise<void> {
    const report = await this.app.settlement.refreshRates();
    for (const [source, n] of Object.entries(report.updatedBySource)) {
      this.out.log(`Updated ${n} pairs from ${source}`);
    }
    for (const e of report.errors) this.out.log(`Failed: ${e.provider} (${e.kind}): ${e.message}`);
    this.out.log(`Total pairs: ${report.totalPairs}, last refresh: ${report.lastRefresh}`);
  }

  private printTrade(res: Result<TradeReceipt>): void {
    if (!res.ok) {
      this.out.log(`Failed: ${res.error.message}`);
      return;
    }
    const r = res.value;
    const verb = r.direction === 'buy' ? 'Bought' : 'Sold';
    this.out.log(`${verb} ${r.amount.toFixed(4)} ${r.currency} at ${r.rate} ${r.baseCurrency}/${r.currency}`);
    const label = r.direction === 'buy' ? 'Cost' : 'Proceeds';
    this.out.log(`${label}: ${r.total.toFixed(2)} ${r.baseCurrency} (commission ${r.commission.toFixed(2)})`);
    this.out.log(`${r.currency}: ${r.currencyBalance.before.toFixed(4)} -> ${r.currencyBalance.after.toFixed(4)}`);
    this.out.log(`${r.baseCurrency}: ${r.baseBalance.before.toFixed(2)} -> ${r.baseBalance.after.toFixed(2)}`);
  }
}
