/**
 * StatusStore - Last-run snapshot on disk
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { createLogger, type Logger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock, type Clock } from '../core/time.js';
import type { Operation, StatusSnapshot } from './types.js';

const StatusSnapshotSchema = z.object({
  last_run: z.string(),
  operation: z.string(),
  results: z.unknown(),
  last_audit: z.string().optional()
});

export class StatusStore {
  private readonly file: string;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(file: string, options: { logger?: Logger; clock?: Clock } = {}) {
    this.file = file;
    this.logger = options.logger ?? createLogger('StatusStore');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Overwrite the snapshot. Write failures are logged, not thrown.
   * A full audit moves `last_audit`; other operations keep the previous one.
   */
  write(operation: Operation, results: unknown): boolean {
    const now = this.clock().toISOString();
    const lastAudit = operation === 'full_audit' ? now : this.read()?.last_audit;
    const snapshot: StatusSnapshot = {
      last_run: now,
      operation,
      results,
      ...(lastAudit ? { last_audit: lastAudit } : {})
    };

    try {
      mkdirSync(dirname(this.file), { recursive: true });
      writeFileSync(this.file, JSON.stringify(snapshot, null, 2));
      return true;
    } catch (error) {
      this.logger.error(`Failed to write status to ${this.file}: ${errorMessage(error)}`);
      return false;
    }
  }

  read(): StatusSnapshot | null {
    if (!existsSync(this.file)) {
      return null;
    }

    try {
      const parsed = StatusSnapshotSchema.safeParse(JSON.parse(readFileSync(this.file, 'utf-8')));
      if (parsed.success) {
        const { last_run, operation, results, last_audit } = parsed.data;
        return { last_run, operation, results, ...(last_audit ? { last_audit } : {}) };
      }
      this.logger.warn(`Ignoring malformed status file ${this.file}`);
    } catch (error) {
      this.logger.warn(`Could not read status file ${this.file}: ${errorMessage(error)}`);
    }
    return null;
  }

  getFilePath(): string {
    return this.file;
  }
}
