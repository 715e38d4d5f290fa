import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError } from '../src/errors';
import { JsonDocumentStore } from '../src/store/jsonStore';
import { makeTempDir, removeDir, silentLogger } from './helpers';

describe('JsonDocumentStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('returns undefined for a missing document', () => {
    const store = new JsonDocumentStore(path.join(dir, 'doc.json'), { logger: silentLogger });
    expect(store.exists()).toBe(false);
    expect(store.read()).toBeUndefined();
  });

  it('writes through a temp file and reads the document back', () => {
    const file = path.join(dir, 'nested', 'doc.json');
    const store = new JsonDocumentStore(file, { logger: silentLogger });
    store.write({ a: 1, list: ['x'] });
    expect(store.read()).toEqual({ a: 1, list: ['x'] });
    expect(fs.readdirSync(path.dirname(file))).toEqual(['doc.json']);
  });

  it('keeps only the newest backups', () => {
    let t = Date.parse('2025-01-01T00:00:00.000Z');
    const backupDir = path.join(dir, 'backups');
    const store = new JsonDocumentStore(path.join(dir, 'doc.json'), {
      logger: silentLogger,
      backupDir,
      backupKeep: 2,
      now: () => new Date((t += 1000)),
    });
    for (let i = 1; i <= 4; i++) store.write({ version: i });

    expect(store.listBackups().map((f) => path.basename(f))).toEqual([
      'doc.json.backup_20250101_000002_000',
      'doc.json.backup_20250101_000003_000',
    ]);
    const newest = fs.readFileSync(path.join(backupDir, 'doc.json.backup_20250101_000003_000'), 'utf-8');
    expect(JSON.parse(newest)).toEqual({ version: 3 });
    expect(store.read()).toEqual({ version: 4 });
  });

  it('moves a corrupted document aside', () => {
    const file = path.join(dir, 'doc.json');
    fs.writeFileSync(file, '{not json', 'utf-8');
    const store = new JsonDocumentStore(file, {
      logger: silentLogger,
      now: () => new Date('2025-01-01T00:00:00.000Z'),
    });
    expect(store.read()).toBeUndefined();
    expect(fs.existsSync(file)).toBe(false);
    expect(fs.readFileSync(`${file}.corrupted_20250101_000000_000`, 'utf-8')).toBe('{not json');
  });

  it('raises PersistenceError when the target cannot be written', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'file, not a directory');
    const store = new JsonDocumentStore(path.join(blocker, 'doc.json'), { logger: silentLogger });
    expect(() => store.write({ a: 1 })).toThrow(PersistenceError);
  });
});
