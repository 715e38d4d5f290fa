import { PersistenceError, errorMessage } from './errors';
import { Portfolio } from './ledger/portfolio';
import type { PortfolioRecord } from './ledger/portfolio';
import type { Logger } from './logger';
import type { JsonDocumentStore } from './store/jsonStore';

/** Every user's portfolio, stored as one JSON array. */
export class PortfolioRepository {
  private readonly portfolios = new Map<number, Portfolio>();
  private readonly logger: Logger;

  constructor(
    private readonly store: JsonDocumentStore,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'portfolios' });
  }

  load(): number {
    this.portfolios.clear();
    const raw = this.store.read();
    if (raw === undefined) return 0;
    if (!Array.isArray(raw)) {
      this.logger.warn({ file: this.store.filePath }, 'portfolio document is not a list; starting empty');
      return 0;
    }
    for (const entry of raw) {
      try {
        const p = Portfolio.fromJSON(entry);
        this.portfolios.set(p.ownerId, p);
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'skipping invalid portfolio entry');
      }
    }
    this.logger.info({ count: this.portfolios.size }, 'portfolios loaded');
    return this.portfolios.size;
  }

  get(userId: number): Portfolio | undefined {
    return this.portfolios.get(userId);
  }

  /** Adds an empty portfolio and persists; the entry is dropped again if the save fails. */
  create(userId: number): Portfolio {
    const existing = this.portfolios.get(userId);
    if (existing) return existing;
    const p = new Portfolio(userId);
    this.portfolios.set(userId, p);
    try {
      this.save();
    } catch (err) {
      this.portfolios.delete(userId);
      throw err;
    }
    return p;
  }

  save(): void {
    const records: PortfolioRecord[] = Array.from(this.portfolios.values()).map((p) => p.toJSON());
    try {
      this.store.write(records);
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to save portfolios: ${errorMessage(err)}`);
    }
  }
}
