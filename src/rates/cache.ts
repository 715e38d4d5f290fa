import type { Settings } from '../config';
import type { CurrencyRegistry } from '../currencies';
import type { Logger } from '../logger';
import { ApiRequestError, ProviderError, RateUnavailableError, errorMessage } from '../errors';
import type { RateProvider } from '../providers/types';
import { pairKey } from '../providers/types';
import type { JsonDocumentStore } from '../store/jsonStore';
import { createHistoryRecord } from '../store/rateHistory';
import type { RateHistoryRecord, RateHistoryStore } from '../store/rateHistory';
import { decodeRatesDocument, emptySnapshot, encodeRatesDocument, isFresh, parseTimestampSeconds } from './snapshot';
import type { CurrencyPairRate, RateCacheSnapshot } from './snapshot';

export interface ProviderBinding {
  provider: RateProvider;
  /** Codes requested from this provider on every refresh. */
  codes: string[];
}

export interface ProviderFailure {
  provider: string;
  kind: string;
  message: string;
}

export interface RefreshReport {
  lastRefresh: string;
  updatedBySource: Record<string, number>;
  errors: ProviderFailure[];
  totalPairs: number;
  persisted: boolean;
  historySaved: number;
}

export interface CacheInfo {
  pairsCount: number;
  lastRefresh: string | null;
  isFresh: boolean;
  ttlMinutes: number;
  pairs: string[];
}

export interface RateCacheDeps {
  settings: Settings;
  registry: CurrencyRegistry;
  store: JsonDocumentStore;
  providers: ProviderBinding[];
  logger: Logger;
  history?: RateHistoryStore;
  clock?: () => Date;
}

export const SYSTEM_SOURCE = 'system';

/**
 * TTL-bounded table of current pair rates. A miss triggers one full refresh
 * across every provider; concurrent misses share the same refresh.
 */
export class RateCache {
  private snapshot: RateCacheSnapshot = emptySnapshot();
  private inflight: Promise<RefreshReport> | null = null;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: RateCacheDeps) {
    this.logger = deps.logger.child({ component: 'rate-cache' });
    this.clock = deps.clock ?? (() => new Date());
    this.reload();
  }

  private get ttlMs(): number {
    return this.deps.settings.current().rateTtlMs;
  }

  current(): RateCacheSnapshot {
    return this.snapshot;
  }

  async getRate(from: string, to: string): Promise<CurrencyPairRate> {
    const src = this.deps.registry.get(from).code;
    const dst = this.deps.registry.get(to).code;
    const key = pairKey(src, dst);

    const cached = this.freshEntry(key);
    if (cached) return cached;

    if (isFresh(this.snapshot.lastRefresh, this.clock().getTime(), this.ttlMs)) {
      throw new RateUnavailableError(src, dst, 'not present after the latest refresh');
    }

    this.logger.info({ pair: key }, 'cache stale or pair missing; refreshing');
    const report = await this.refreshAll();
    const refreshed = this.freshEntry(key);
    if (refreshed) return refreshed;
    if (report.errors.length > 0) {
      throw new ApiRequestError(report.errors.map((e) => `${e.provider} (${e.kind})`).join(', '));
    }
    throw new RateUnavailableError(src, dst, 'no provider supplied it');
  }

  async getReverseRate(from: string, to: string): Promise<number> {
    const quote = await this.getRate(from, to);
    return 1 / quote.rate;
  }

  refreshAll(): Promise<RefreshReport> {
    if (!this.inflight) {
      this.inflight = this.runRefresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Replaces memory state with whatever is on disk. */
  reload(): void {
    const raw = this.deps.store.read();
    const { snapshot, migrated } = decodeRatesDocument(raw, this.logger, this.clock);
    const before = Object.keys(this.snapshot.pairs).length;
    this.snapshot = snapshot;
    if (raw === undefined || migrated) this.persist();
    this.logger.info({ before, after: Object.keys(snapshot.pairs).length }, 'rate cache loaded');
  }

  cacheInfo(): CacheInfo {
    return {
      pairsCount: Object.keys(this.snapshot.pairs).length,
      lastRefresh: this.snapshot.lastRefresh,
      isFresh: isFresh(this.snapshot.lastRefresh, this.clock().getTime(), this.ttlMs),
      ttlMinutes: this.ttlMs / 60000,
      pairs: Object.keys(this.snapshot.pairs).sort(),
    };
  }

  private freshEntry(key: string): CurrencyPairRate | null {
    const entry = this.snapshot.pairs[key];
    if (!entry) return null;
    if (isFresh(entry.observedAt, this.clock().getTime(), this.ttlMs)) return entry;
    if (parseTimestampSeconds(entry.observedAt) === null) {
      this.logger.warn({ pair: key, observedAt: entry.observedAt }, 'unparseable rate timestamp; treating as stale');
    }
    return null;
  }

  private async runRefresh(): Promise<RefreshReport> {
    const base = this.deps.settings.current().baseCurrency;
    const bindings = this.deps.providers
      .map((b) => ({ provider: b.provider, codes: b.codes.filter((c) => c !== base) }))
      .filter((b) => b.codes.length > 0);

    const settled = await Promise.allSettled(bindings.map((b) => b.provider.fetchRates(b.codes, base)));

    const observedAt = this.clock();
    const stamp = observedAt.toISOString();
    const pairs: Record<string, CurrencyPairRate> = { ...this.snapshot.pairs };
    const updatedBySource: Record<string, number> = {};
    const errors: ProviderFailure[] = [];
    const observations: RateHistoryRecord[] = [];

    settled.forEach((outcome, i) => {
      const name = bindings[i].provider.name;
      if (outcome.status === 'rejected') {
        const err: unknown = outcome.reason;
        const kind = err instanceof ProviderError ? err.kind : 'Unexpected';
        errors.push({ provider: name, kind, message: errorMessage(err) });
        this.logger.error({ provider: name, kind, err }, 'provider refresh failed');
        return;
      }
      const { rates, source, meta } = outcome.value;
      let accepted = 0;
      for (const [key, rate] of Object.entries(rates)) {
        const [from, to] = key.split('_');
        if (!from || !to || !Number.isFinite(rate) || rate <= 0) {
          this.logger.warn({ provider: name, key, rate }, 'discarding invalid pair from provider');
          continue;
        }
        pairs[key] = { from, to, rate, observedAt: stamp, source };
        observations.push(
          createHistoryRecord(from, to, rate, source, observedAt, {
            raw_id: meta.rawIds?.[from] ?? '',
            request_ms: meta.requestMs,
            status_code: meta.statusCode,
          }),
        );
        accepted++;
      }
      updatedBySource[source] = (updatedBySource[source] ?? 0) + accepted;
    });

    const baseKey = pairKey(base, base);
    pairs[baseKey] = { from: base, to: base, rate: 1.0, observedAt: stamp, source: SYSTEM_SOURCE };
    observations.push(createHistoryRecord(base, base, 1.0, SYSTEM_SOURCE, observedAt));

    this.snapshot = { pairs, lastRefresh: stamp };
    const persisted = this.persist();
    const historySaved = this.appendHistory(observations);

    const report: RefreshReport = {
      lastRefresh: stamp,
      updatedBySource,
      errors,
      totalPairs: Object.keys(pairs).length,
      persisted,
      historySaved,
    };
    this.logger.info(
      { updatedBySource, failed: errors.length, totalPairs: report.totalPairs, historySaved },
      'rate refresh finished',
    );
    return report;
  }

  private persist(): boolean {
    try {
      this.deps.store.write(encodeRatesDocument(this.snapshot));
      return true;
    } catch (err) {
      this.logger.error({ err }, 'failed to persist rate cache');
      return false;
    }
  }

  private appendHistory(records: RateHistoryRecord[]): number {
    if (!this.deps.history) return 0;
    try {
      return this.deps.history.append(records);
    } catch (err) {
      this.logger.warn({ err }, 'failed to append rate history');
      return 0;
    }
  }
}
