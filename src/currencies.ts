import { z } from 'zod';
import rawCurrencies from './data/currencies.json';
import { CurrencyNotFoundError, ValidationError } from './errors';

export type CurrencyKind = 'fiat' | 'crypto';

const codeSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]{2,5}$/, 'currency code must be 2-5 alphanumeric characters')
  .transform((s) => s.toUpperCase());

const currencySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('fiat'),
    code: codeSchema,
    name: z.string().trim().min(1),
    issuingCountry: z.string().trim().min(1),
  }),
  z.object({
    kind: z.literal('crypto'),
    code: codeSchema,
    name: z.string().trim().min(1),
    algorithm: z.string().trim().min(1),
    marketCap: z.number().nonnegative().default(0),
  }),
]);

export type Currency = z.infer<typeof currencySchema>;
export type CurrencyInput = z.input<typeof currencySchema>;

export function displayInfo(c: Currency): string {
  if (c.kind === 'fiat') {
    return `[FIAT] ${c.code} — ${c.name} (Issuing: ${c.issuingCountry})`;
  }
  const mcap =
    c.marketCap >= 1e6
      ? c.marketCap.toExponential(2)
      : c.marketCap.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return `[CRYPTO] ${c.code} — ${c.name} (Algo: ${c.algorithm}, MCAP: ${mcap})`;
}

export class CurrencyRegistry {
  private readonly byCode = new Map<string, Currency>();

  constructor(entries: readonly CurrencyInput[] = []) {
    for (const e of entries) this.register(e);
  }

  register(input: CurrencyInput): Currency {
    const parsed = currencySchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid currency: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    const currency = parsed.data;
    if (this.byCode.has(currency.code)) {
      throw new ValidationError(`Currency '${currency.code}' is already registered`);
    }
    this.byCode.set(currency.code, currency);
    return currency;
  }

  get(code: string): Currency {
    const key = code.trim().toUpperCase();
    const found = this.byCode.get(key);
    if (!found) throw new CurrencyNotFoundError(key);
    return found;
  }

  has(code: string): boolean {
    return this.byCode.has(code.trim().toUpperCase());
  }

  all(): Currency[] {
    return Array.from(this.byCode.values());
  }
}

export function createDefaultRegistry(): CurrencyRegistry {
  return new CurrencyRegistry(z.array(currencySchema).parse(rawCurrencies));
}
