import 'dotenv/config';
import { createApp } from '../app';
import { Settings } from '../config';
import { createLogger } from '../logger';

const logger = createLogger();

async function main(): Promise<void> {
  const app = createApp(new Settings(), logger);
  try {
    const report = await app.settlement.refreshRates();
    console.table(Object.entries(report.updatedBySource).map(([Source, Pairs]) => ({ Source, Pairs })));
    for (const e of report.errors) logger.warn({ provider: e.provider, kind: e.kind }, e.message);
    logger.info({ totalPairs: report.totalPairs, historySaved: report.historySaved }, 'refreshRates completed');
    if (report.errors.length > 0 && Object.keys(report.updatedBySource).length === 0) process.exitCode = 1;
  } finally {
    app.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'refreshRates failed');
  process.exit(1);
});
