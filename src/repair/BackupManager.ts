/**
 * BackupManager - Timestamped file copies taken before a mutation
 *
 * Backups are named `{stem}_{YYYYMMDD_HHMMSS}{suffix}`; a `-n` counter is
 * added when that name is already taken within the same second. Files
 * under `root` are backed up into a mirror of their directory, so
 * `src/a/index.ts` and `src/b/index.ts` keep separate histories. With a
 * retention limit, only the newest N backups of each file are kept.
 */

import { copyFileSync, existsSync, mkdirSync, readdirSync, unlinkSync } from 'fs';
import { basename, dirname, extname, isAbsolute, join, relative } from 'path';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { compactTimestamp, systemClock, type Clock } from '../core/time.js';

export interface BackupManagerOptions {
  /** Absolute backup directory */
  dir: string;
  /** Project root; files outside it are backed up flat into `dir` */
  root?: string;
  /** Newest backups kept per file; null keeps everything */
  retention?: number | null;
  logger?: Logger;
  clock?: Clock;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class BackupManager {
  private readonly dir: string;
  private readonly root: string | null;
  private readonly retention: number | null;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: BackupManagerOptions) {
    this.dir = options.dir;
    this.root = options.root ?? null;
    this.retention = options.retention ?? null;
    this.logger = options.logger ?? createLogger('BackupManager');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Copy the file into the backup directory; returns the backup path
   */
  create(file: string): string {
    const folder = this.folderFor(file);
    mkdirSync(folder, { recursive: true });

    const suffix = extname(file);
    const stem = basename(file, suffix);
    const stamp = compactTimestamp(this.clock());

    let backup = join(folder, `${stem}_${stamp}${suffix}`);
    for (let n = 2; existsSync(backup); n++) {
      backup = join(folder, `${stem}_${stamp}-${n}${suffix}`);
    }

    copyFileSync(file, backup);
    this.logger.debug(`Backed up ${file} to ${backup}`);

    this.prune(folder, stem, suffix);
    return backup;
  }

  /**
   * Put the backed-up content back in place
   */
  restore(file: string, backup: string): void {
    copyFileSync(backup, file);
    this.logger.info(`Restored ${file} from ${backup}`);
  }

  /**
   * Backups of a file, oldest first
   */
  list(file: string): string[] {
    const folder = this.folderFor(file);
    const suffix = extname(file);
    return this.matching(folder, basename(file, suffix), suffix).map(entry => join(folder, entry.name));
  }

  getDirectory(): string {
    return this.dir;
  }

  private folderFor(file: string): string {
    if (this.root === null) {
      return this.dir;
    }
    const rel = relative(this.root, dirname(file));
    if (rel.startsWith('..') || isAbsolute(rel)) {
      return this.dir;
    }
    return join(this.dir, rel);
  }

  private matching(folder: string, stem: string, suffix: string): Array<{ name: string; stamp: string; counter: number }> {
    if (!existsSync(folder)) {
      return [];
    }

    const pattern = new RegExp(`^${escapeRegExp(stem)}_(\\d{8}_\\d{6})(?:-(\\d+))?${escapeRegExp(suffix)}$`);
    const entries: Array<{ name: string; stamp: string; counter: number }> = [];

    for (const name of readdirSync(folder)) {
      const match = pattern.exec(name);
      if (match) {
        entries.push({ name, stamp: match[1], counter: match[2] ? Number(match[2]) : 1 });
      }
    }

    return entries.sort((a, b) => a.stamp.localeCompare(b.stamp) || a.counter - b.counter);
  }

  private prune(folder: string, stem: string, suffix: string): void {
    if (this.retention === null) {
      return;
    }

    const entries = this.matching(folder, stem, suffix);
    const excess = entries.slice(0, Math.max(0, entries.length - this.retention));

    for (const entry of excess) {
      try {
        unlinkSync(join(folder, entry.name));
        this.logger.debug(`Pruned backup ${entry.name}`);
      } catch (error) {
        this.logger.warn(`Could not prune backup ${entry.name}: ${errorMessage(error)}`);
      }
    }
  }
}
