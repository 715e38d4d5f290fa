import fs from 'fs';
import path from 'path';
import type { Logger } from '../logger';
import { PersistenceError, errorMessage } from '../errors';

export interface JsonStoreOptions {
  logger: Logger;
  /** Directory for rotating copies taken before each overwrite; omit to disable. */
  backupDir?: string;
  backupKeep?: number;
  now?: () => Date;
}

function stamp(d: Date): string {
  // 2025-01-02T03:04:05.678Z -> 20250102_030405_678
  return d.toISOString().replace(/[-:]/g, '').replace('T', '_').replace('.', '_').replace('Z', '');
}

/**
 * A single JSON document on disk. Writes go to a temp file that is renamed
 * over the target, so readers see either the old or the new document.
 */
export class JsonDocumentStore {
  private readonly logger: Logger;
  private readonly backupKeep: number;
  private readonly now: () => Date;

  constructor(
    readonly filePath: string,
    private readonly opts: JsonStoreOptions,
  ) {
    this.logger = opts.logger.child({ store: path.basename(filePath) });
    this.backupKeep = opts.backupKeep ?? 5;
    this.now = opts.now ?? (() => new Date());
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** Parsed document, or undefined when the file is missing or unreadable. */
  read(): unknown {
    if (!this.exists()) {
      this.logger.debug({ file: this.filePath }, 'document not found');
      return undefined;
    }
    const text = fs.readFileSync(this.filePath, 'utf-8');
    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      const aside = `${this.filePath}.corrupted_${stamp(this.now())}`;
      fs.renameSync(this.filePath, aside);
      this.logger.error({ err, movedTo: aside }, 'corrupted document moved aside');
      return undefined;
    }
  }

  write(data: unknown): void {
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.backup();
      fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
      fs.renameSync(tmp, this.filePath);
      this.logger.debug({ file: this.filePath }, 'document saved');
    } catch (err) {
      if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
      throw new PersistenceError(`Failed to save ${this.filePath}: ${errorMessage(err)}`);
    }
  }

  listBackups(): string[] {
    const dir = this.opts.backupDir;
    if (!dir || !fs.existsSync(dir)) return [];
    const prefix = `${path.basename(this.filePath)}.backup_`;
    return fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(prefix))
      .sort()
      .map((f) => path.join(dir, f));
  }

  private backup(): void {
    const dir = this.opts.backupDir;
    if (!dir || !this.exists()) return;
    fs.mkdirSync(dir, { recursive: true });
    const target = path.join(dir, `${path.basename(this.filePath)}.backup_${stamp(this.now())}`);
    fs.copyFileSync(this.filePath, target);
    const backups = this.listBackups();
    for (const old of backups.slice(0, Math.max(0, backups.length - this.backupKeep))) {
      fs.rmSync(old, { force: true });
      this.logger.debug({ file: old }, 'old backup removed');
    }
  }
}
