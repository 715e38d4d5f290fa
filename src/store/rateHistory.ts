import { z } from 'zod';
import type { Logger } from '../logger';
import type { JsonDocumentStore } from './jsonStore';

export interface RateHistoryRecord {
  id: string;
  from_currency: string;
  to_currency: string;
  rate: number;
  timestamp: string; // ISO8601 UTC
  source: string;
  meta: Record<string, unknown>;
}

export interface CurrencyHistoryStats {
  currency: string;
  recordCount: number;
  minRate: number;
  maxRate: number;
  avgRate: number;
  firstRecord: string;
  lastRecord: string;
  sources: string[];
}

const recordSchema = z.object({
  id: z.string().min(1),
  from_currency: z.string().min(1),
  to_currency: z.string().min(1),
  rate: z.number().positive(),
  timestamp: z.string(),
  source: z.string(),
  meta: z.record(z.unknown()).default({}),
});

const documentSchema = z.object({ records: z.record(z.unknown()) });

export function historyRecordId(from: string, to: string, at: Date): string {
  return `${from.toUpperCase()}_${to.toUpperCase()}_${at.toISOString()}`;
}

export function createHistoryRecord(
  from: string,
  to: string,
  rate: number,
  source: string,
  at: Date,
  meta: Record<string, unknown> = {},
): RateHistoryRecord {
  return {
    id: historyRecordId(from, to, at),
    from_currency: from.toUpperCase(),
    to_currency: to.toUpperCase(),
    rate,
    timestamp: at.toISOString(),
    source,
    meta,
  };
}

/** Newest first; ties on the timestamp go by id. */
function newestFirst(a: RateHistoryRecord, b: RateHistoryRecord): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? 1 : -1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

/**
 * Append-only log of every observed rate, kept as one JSON document keyed by
 * record id. A batch is written with a single document save; a record whose
 * id is already stored is skipped.
 */
export class RateHistoryStore {
  private records = new Map<string, RateHistoryRecord>();
  private readonly logger: Logger;

  constructor(
    private readonly store: JsonDocumentStore,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'rate-history' });
    this.load();
  }

  load(): void {
    const raw = this.store.read();
    this.records = new Map();
    if (raw === undefined) return;
    const doc = documentSchema.safeParse(raw);
    if (!doc.success) {
      this.logger.warn('rate history document has an unexpected shape; starting empty');
      return;
    }
    let skipped = 0;
    for (const [id, entry] of Object.entries(doc.data.records)) {
      const parsed = recordSchema.safeParse(entry);
      if (parsed.success && parsed.data.id === id) this.records.set(id, parsed.data);
      else skipped++;
    }
    if (skipped > 0) this.logger.warn({ skipped }, 'skipping invalid rate history entries');
  }

  /** Adds unseen records and saves; returns how many were new. */
  append(batch: readonly RateHistoryRecord[]): number {
    const added: string[] = [];
    for (const r of batch) {
      if (this.records.has(r.id)) continue;
      this.records.set(r.id, r);
      added.push(r.id);
    }
    if (added.length === 0) return 0;
    try {
      this.save();
    } catch (err) {
      for (const id of added) this.records.delete(id);
      throw err;
    }
    return added.length;
  }

  /** Most recent `limit` records for a currency, oldest first. */
  history(currency: string, limit = 10): RateHistoryRecord[] {
    const code = currency.toUpperCase();
    return Array.from(this.records.values())
      .filter((r) => r.from_currency === code)
      .sort(newestFirst)
      .slice(0, limit)
      .reverse();
  }

  /** The newest record per source currency, ordered by currency. */
  latest(): RateHistoryRecord[] {
    const newest = new Map<string, RateHistoryRecord>();
    for (const r of Array.from(this.records.values()).sort(newestFirst)) {
      if (!newest.has(r.from_currency)) newest.set(r.from_currency, r);
    }
    return Array.from(newest.values()).sort((a, b) => a.from_currency.localeCompare(b.from_currency));
  }

  count(): number {
    return this.records.size;
  }

  stats(): CurrencyHistoryStats[] {
    const groups = new Map<string, RateHistoryRecord[]>();
    for (const r of this.records.values()) {
      const group = groups.get(r.from_currency);
      if (group) group.push(r);
      else groups.set(r.from_currency, [r]);
    }
    return Array.from(groups.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([currency, rows]) => {
        const rates = rows.map((r) => r.rate);
        const stamps = rows.map((r) => r.timestamp).sort();
        return {
          currency,
          recordCount: rows.length,
          minRate: Math.min(...rates),
          maxRate: Math.max(...rates),
          avgRate: rates.reduce((sum, v) => sum + v, 0) / rates.length,
          firstRecord: stamps[0],
          lastRecord: stamps[stamps.length - 1],
          sources: Array.from(new Set(rows.map((r) => r.source))).sort(),
        };
      });
  }

  private save(): void {
    this.store.write({ records: Object.fromEntries(this.records) });
  }
}
