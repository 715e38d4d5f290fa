import 'dotenv/config';
import path from 'path';
import { loadConfig } from '../config';
import { createLogger } from '../logger';
import { JsonDocumentStore } from '../store/jsonStore';
import { RateHistoryStore } from '../store/rateHistory';

const logger = createLogger();

function getArg(name: string, fallback?: string): string | undefined {
  const p = process.argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}

function main(): void {
  const cfg = loadConfig();
  const store = new RateHistoryStore(new JsonDocumentStore(path.join(cfg.DATA_DIR, cfg.HISTORY_FILE), { logger }), logger);
  const currency = getArg('--currency');
  if (currency) {
    const rows = store.history(currency, Number(getArg('--limit', '10')));
    if (!rows.length) {
      console.log(`No history for ${currency.toUpperCase()}. Run refresh-rates first.`);
      return;
    }
    console.table(rows.map((r) => ({ Pair: `${r.from_currency}/${r.to_currency}`, Rate: r.rate, At: r.timestamp, Source: r.source })));
    return;
  }
  const stats = store.stats();
  if (!stats.length) {
    console.log('Rate history is empty. Run refresh-rates first.');
    return;
  }
  console.table(
    stats.map((s) => ({
      Currency: s.currency,
      Records: s.recordCount,
      Min: s.minRate,
      Max: s.maxRate,
      Avg: s.avgRate.toFixed(6),
      First: s.firstRecord,
      Last: s.lastRecord,
    })),
  );
}

main();
