import type { Logger } from '../logger';
import type { RateCache, RefreshReport } from './cache';

export interface SchedulerStatus {
  isRunning: boolean;
  intervalMs: number;
  lastUpdate: string | null;
  lastError: string | null;
}

export class RatesScheduler {
  private timer: NodeJS.Timeout | null = null;
  private lastUpdate: string | null = null;
  private lastError: string | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly cache: RateCache,
    private readonly intervalMs: number,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'scheduler' });
  }

  start(): void {
    if (this.timer) {
      this.logger.warn('scheduler already running');
      return;
    }
    this.logger.info({ intervalMs: this.intervalMs }, 'scheduler start');
    void this.runOnce();
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      this.logger.warn('scheduler not running');
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('scheduler stopped');
  }

  status(): SchedulerStatus {
    return {
      isRunning: this.timer !== null,
      intervalMs: this.intervalMs,
      lastUpdate: this.lastUpdate,
      lastError: this.lastError,
    };
  }

  manualUpdate(): Promise<RefreshReport> {
    this.logger.info('manual rate update requested');
    return this.cache.refreshAll();
  }

  /** One scheduled refresh; never rejects. */
  async runOnce(): Promise<RefreshReport | null> {
    try {
      const report = await this.cache.refreshAll();
      this.lastUpdate = report.lastRefresh;
      this.lastError = null;
      return report;
    } catch (err) {
      this.lastError = err instanceof Error ? err.message : String(err);
      this.logger.error({ err }, 'scheduled rate refresh failed');
      return null;
    }
  }
}
