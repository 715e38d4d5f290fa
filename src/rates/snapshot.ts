import type { Logger } from '../logger';

export interface CurrencyPairRate {
  from: string;
  to: string;
  rate: number;
  observedAt: string;
  source: string;
}

export interface RateCacheSnapshot {
  pairs: Readonly<Record<string, CurrencyPairRate>>;
  lastRefresh: string | null;
}

/** On-disk form of one pair, shared by the current and the legacy layout. */
export interface StoredPair {
  rate: number;
  updated_at: string;
  source: string;
}

export interface RatesDocument {
  pairs: Record<string, StoredPair>;
  last_refresh: string | null;
}

const PAIR_KEY = /^([A-Z0-9]{2,5})_([A-Z0-9]{2,5})$/;
const LEGACY_META_KEYS = new Set(['source', 'last_refresh']);

export function emptySnapshot(): RateCacheSnapshot {
  return { pairs: {}, lastRefresh: null };
}

/**
 * Seconds since the epoch, or null when the value is not an ISO8601 UTC
 * timestamp. Fractional seconds and a trailing Z / +00:00 are ignored.
 */
export function parseTimestampSeconds(value: unknown): number | null {
  if (typeof value !== 'string') return null;
  let s = value.trim();
  if (s.endsWith('Z')) s = s.slice(0, -1);
  else if (s.endsWith('+00:00')) s = s.slice(0, -6);
  s = s.split('.')[0];
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/.test(s)) return null;
  const ms = Date.parse(`${s}Z`);
  return Number.isNaN(ms) ? null : ms / 1000;
}

export function isFresh(observedAt: unknown, nowMs: number, ttlMs: number): boolean {
  const ts = parseTimestampSeconds(observedAt);
  if (ts === null) return false;
  return Math.floor(nowMs / 1000) - ts < ttlMs / 1000;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function decodePair(
  key: string,
  value: unknown,
  defaults: { source: string; updatedAt: string },
  logger: Logger,
): CurrencyPairRate | null {
  const m = PAIR_KEY.exec(key);
  if (!m || !isRecord(value)) {
    logger.warn({ key }, 'ignoring malformed rate entry');
    return null;
  }
  const rate = value.rate;
  if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) {
    logger.warn({ key, rate }, 'ignoring non-positive rate');
    return null;
  }
  return {
    from: m[1],
    to: m[2],
    rate,
    observedAt: typeof value.updated_at === 'string' ? value.updated_at : defaults.updatedAt,
    source: typeof value.source === 'string' ? value.source : defaults.source,
  };
}

export interface DecodedRates {
  snapshot: RateCacheSnapshot;
  /** True when the input used the flat legacy layout and was rewritten. */
  migrated: boolean;
}

export function decodeRatesDocument(raw: unknown, logger: Logger, now: () => Date = () => new Date()): DecodedRates {
  if (!isRecord(raw) || Object.keys(raw).length === 0) return { snapshot: emptySnapshot(), migrated: false };

  const pairs: Record<string, CurrencyPairRate> = {};
  if (isRecord(raw.pairs)) {
    for (const [key, value] of Object.entries(raw.pairs)) {
      const pair = decodePair(key, value, { source: 'unknown', updatedAt: '' }, logger);
      if (pair) pairs[key] = pair;
    }
    const lastRefresh = typeof raw.last_refresh === 'string' ? raw.last_refresh : null;
    return { snapshot: { pairs, lastRefresh }, migrated: false };
  }

  const nowIso = now().toISOString();
  const defaults = {
    source: typeof raw.source === 'string' ? raw.source : 'unknown',
    updatedAt: nowIso,
  };
  for (const [key, value] of Object.entries(raw)) {
    if (LEGACY_META_KEYS.has(key)) continue;
    const pair = decodePair(key, value, defaults, logger);
    if (pair) pairs[key] = pair;
  }
  const lastRefresh = typeof raw.last_refresh === 'string' ? raw.last_refresh : nowIso;
  logger.info({ pairs: Object.keys(pairs).length }, 'migrated legacy rates document');
  return { snapshot: { pairs, lastRefresh }, migrated: true };
}

export function encodeRatesDocument(snapshot: RateCacheSnapshot): RatesDocument {
  const pairs: Record<string, StoredPair> = {};
  for (const [key, p] of Object.entries(snapshot.pairs)) {
    pairs[key] = { rate: p.rate, updated_at: p.observedAt, source: p.source };
  }
  return { pairs, last_refresh: snapshot.lastRefresh };
}
