/**
 * SafeWriter - backup, write, verify, and restore on any failure
 */

import { writeFileSync } from 'fs';
import { checkParses } from '../analysis/sourceParser.js';
import { createLogger, type Logger } from '../core/Logger.js';
import { RewriteVerificationError, errorMessage } from '../core/errors.js';
import type { BackupManager } from './BackupManager.js';

export type SafeWriteResult =
  | { ok: true; backup: string }
  | { ok: false; error: string; backup?: string };

export interface SafeWriterOptions {
  backups: BackupManager;
  /** Re-parse the written content and restore the file when it fails */
  verify?: boolean;
  logger?: Logger;
}

export class SafeWriter {
  private readonly backups: BackupManager;
  private readonly verify: boolean;
  private readonly logger: Logger;

  constructor(options: SafeWriterOptions) {
    this.backups = options.backups;
    this.verify = options.verify ?? true;
    this.logger = options.logger ?? createLogger('SafeWriter');
  }

  /**
   * Replace a file's content. On failure the file holds its previous bytes.
   */
  write(file: string, content: string): SafeWriteResult {
    let backup: string;
    try {
      backup = this.backups.create(file);
    } catch (error) {
      return { ok: false, error: `Backup failed: ${errorMessage(error)}` };
    }

    try {
      writeFileSync(file, content);

      if (this.verify) {
        const check = checkParses(file, content);
        if (!check.ok) {
          throw new RewriteVerificationError(file, check.line, check.message);
        }
      }

      return { ok: true, backup };
    } catch (error) {
      try {
        this.backups.restore(file, backup);
      } catch (restoreError) {
        this.logger.error(`Could not restore ${file} from ${backup}: ${errorMessage(restoreError)}`);
        return {
          ok: false,
          backup,
          error: `${errorMessage(error)}; restore failed: ${errorMessage(restoreError)}`
        };
      }
      return { ok: false, backup, error: errorMessage(error) };
    }
  }
}
