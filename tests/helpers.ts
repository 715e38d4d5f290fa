import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { ProviderError } from '../src/errors';
import type { FetchResult, RateProvider } from '../src/providers/types';

export const silentLogger = pino({ level: 'silent' });

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'ratedesk-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Mutable test clock. */
export function fixedClock(iso: string): { now: () => Date; set(iso: string): void; advance(ms: number): void } {
  let ms = Date.parse(iso);
  return {
    now: () => new Date(ms),
    set(next: string) {
      ms = Date.parse(next);
    },
    advance(delta: number) {
      ms += delta;
    },
  };
}

/** In-process provider returning a fixed table and counting calls. */
export class FakeProvider implements RateProvider {
  calls = 0;
  requested: Array<{ codes: string[]; base: string }> = [];

  constructor(
    readonly name: string,
    public rates: Record<string, number>,
    public failure?: ProviderError,
  ) {}

  async fetchRates(codes: readonly string[], base: string): Promise<FetchResult> {
    this.calls++;
    this.requested.push({ codes: [...codes], base });
    await Promise.resolve();
    if (this.failure) throw this.failure;
    return { rates: { ...this.rates }, source: this.name, meta: { requestMs: 1, statusCode: 200 } };
  }
}

export function networkFailure(provider: string): ProviderError {
  return new ProviderError(provider, 'Network', 'connection reset');
}
