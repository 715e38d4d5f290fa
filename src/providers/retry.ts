import type { Logger } from '../logger';
import { classifyHttpError } from './types';

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * Runs `fn` up to `attempts` times with a fixed pause between tries.
 * RateLimited and AuthenticationFailed are thrown on the first occurrence.
 */
export async function withRetry<T>(
  provider: string,
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions,
  logger: Logger,
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  const sleep = opts.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (raw) {
      const err = classifyHttpError(provider, raw);
      if (!err.retryable || attempt >= attempts) {
        logger.error({ provider, kind: err.kind, attempt, status: err.status }, 'provider request failed');
        throw err;
      }
      if (err.kind === 'MalformedResponse') {
        logger.warn({ provider, attempt, detail: err.message }, 'malformed provider response; retrying');
      } else {
        logger.warn({ provider, attempt, detail: err.message }, 'provider network error; retrying');
      }
      await sleep(opts.delayMs);
    }
  }
}
