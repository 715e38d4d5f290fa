import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({ level });
}

export type ActionName = 'REGISTER' | 'LOGIN' | 'BUY' | 'SELL' | 'REFRESH_RATES' | 'SHOW_PORTFOLIO';

export type ActionFields = Record<string, unknown>;

export interface ActionHandle {
  succeed(fields?: ActionFields): void;
  fail(err: unknown, fields?: ActionFields): void;
}

/** Structured start/end events around account and trade operations. */
export interface ActionLog {
  begin(action: ActionName, fields?: ActionFields): ActionHandle;
}

export function createActionLog(logger: Logger, now: () => number = Date.now): ActionLog {
  const log = logger.child({ component: 'actions' });
  return {
    begin(action, fields = {}) {
      const startedAt = now();
      log.info({ action, ...fields }, 'action started');
      return {
        succeed(extra = {}) {
          log.info({ action, ...fields, ...extra, durationMs: now() - startedAt, outcome: 'ok' }, 'action finished');
        },
        fail(err, extra = {}) {
          log.warn(
            { action, ...fields, ...extra, durationMs: now() - startedAt, outcome: 'error', err },
            'action failed',
          );
        },
      };
    },
  };
}
