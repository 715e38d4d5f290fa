#!/usr/bin/env node
import 'dotenv/config';
import { createApp } from './app';
import { Shell } from './cli';
import { Settings } from './config';
import { createLogger } from './logger';

const logger = createLogger();

async function main(): Promise<void> {
  const settings = new Settings();
  const app = createApp(settings, logger);
  logger.info({ base: settings.current().baseCurrency, mockFiat: settings.current().isMockFiat }, 'ratedesk starting');
  if (process.argv.includes('--auto-update')) app.scheduler.start();
  try {
    await new Shell(app).run();
  } finally {
    app.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
