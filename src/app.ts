import path from 'path';
import type { AppConfig, Settings } from './config';
import { createDefaultRegistry } from './currencies';
import type { CurrencyRegistry } from './currencies';
import { Ledger } from './ledger/ledger';
import { createActionLog } from './logger';
import type { ActionLog, Logger } from './logger';
import { PortfolioRepository } from './portfolios';
import { createProviderBindings } from './providers';
import { RateCache } from './rates/cache';
import type { ProviderBinding } from './rates/cache';
import { RatesScheduler } from './rates/scheduler';
import { SettlementService } from './settlement';
import { JsonDocumentStore } from './store/jsonStore';
import { RateHistoryStore } from './store/rateHistory';
import { UserManager } from './users';

export interface App {
  settings: Settings;
  registry: CurrencyRegistry;
  users: UserManager;
  portfolios: PortfolioRepository;
  rates: RateCache;
  history: RateHistoryStore;
  scheduler: RatesScheduler;
  settlement: SettlementService;
  actions: ActionLog;
  logger: Logger;
  close(): void;
}

export interface AppOverrides {
  providers?: ProviderBinding[];
  now?: () => Date;
}

function documentStore(cfg: AppConfig, file: string, logger: Logger, now?: () => Date): JsonDocumentStore {
  return new JsonDocumentStore(path.join(cfg.DATA_DIR, file), {
    logger,
    backupDir: cfg.backupEnabled ? path.join(cfg.DATA_DIR, cfg.BACKUP_DIR) : undefined,
    backupKeep: cfg.BACKUP_KEEP,
    now,
  });
}

export function createApp(settings: Settings, logger: Logger, overrides: AppOverrides = {}): App {
  const cfg = settings.current();
  const registry = createDefaultRegistry();
  const actions = createActionLog(logger);

  // The history document is written without rotating backups.
  const history = new RateHistoryStore(
    new JsonDocumentStore(path.join(cfg.DATA_DIR, cfg.HISTORY_FILE), { logger, now: overrides.now }),
    logger,
  );
  const rates = new RateCache({
    settings,
    registry,
    store: documentStore(cfg, cfg.RATES_FILE, logger, overrides.now),
    providers: overrides.providers ?? createProviderBindings(cfg, logger),
    history,
    logger,
    clock: overrides.now,
  });

  const portfolios = new PortfolioRepository(documentStore(cfg, cfg.PORTFOLIOS_FILE, logger, overrides.now), logger);
  portfolios.load();
  const users = new UserManager({
    store: documentStore(cfg, cfg.USERS_FILE, logger, overrides.now),
    portfolios,
    actions,
    logger,
    now: overrides.now,
  });

  const ledger = new Ledger({ settings, registry, rates, store: portfolios, actions, logger });
  const settlement = new SettlementService({
    settings,
    registry,
    users,
    portfolios,
    ledger,
    rates,
    actions,
    logger,
    now: overrides.now,
  });
  const scheduler = new RatesScheduler(rates, cfg.UPDATE_INTERVAL_SECONDS * 1000, logger);

  return {
    settings,
    registry,
    users,
    portfolios,
    rates,
    history,
    scheduler,
    settlement,
    actions,
    logger,
    close() {
      if (scheduler.status().isRunning) scheduler.stop();
    },
  };
}
