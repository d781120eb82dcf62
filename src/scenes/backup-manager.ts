/**
 * Backup Manager
 *
 * Sibling backups named `{basename}.backup_{YYYYMMDD_HHMMSS}`. Two
 * backups within one second get a `_{NNN}` sequence suffix, which sorts
 * after the plain name. Backups are never deleted here.
 */

import { copyFile, readdir, rename, unlink, constants as fsConstants } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { tempSiblingPath } from './document-store.js';
import type { BackupHandle } from './types.js';
import { IOError, errnoCode, describeCause } from '../utils/errors.js';
import { emit, log, TelemetryEvents, type Logger } from '../utils/telemetry.js';

export interface BackupManagerOptions {
  logger?: Logger;
  /** Clock for backup timestamps */
  now?: () => Date;
  /** Name collisions tolerated before giving up */
  maxAttempts?: number;
}

const DEFAULT_MAX_ATTEMPTS = 1000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time `YYYYMMDD_HHMMSS`
 */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupPathFor(path: string, createdAt: Date, attempt = 0): string {
  const name = `${basename(path)}.backup_${formatBackupTimestamp(createdAt)}`;
  return join(dirname(path), attempt === 0 ? name : `${name}_${pad(attempt, 3)}`);
}

export class BackupManager {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly maxAttempts: number;

  constructor(options: BackupManagerOptions = {}) {
    this.logger = options.logger ?? log;
    this.now = options.now ?? (() => new Date());
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  /**
   * Copy `path` to a fresh sibling backup. The copy is exclusive, so an
   * existing backup is never overwritten.
   * @throws IOError if the source is unreadable or no backup could be created
   */
  async backup(path: string): Promise<BackupHandle> {
    const createdAt = this.now();

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const backupPath = backupPathFor(path, createdAt, attempt);
      try {
        await copyFile(path, backupPath, fsConstants.COPYFILE_EXCL);
      } catch (error) {
        if (errnoCode(error) === 'EEXIST') {
          continue;
        }
        this.logger.error({ error, path, backup_path: backupPath }, 'Failed to create backup');
        throw new IOError(`Failed to back up ${path}: ${describeCause(error)}`, path, error);
      }

      const handle: BackupHandle = { originalPath: path, backupPath, createdAt };
      emit(TelemetryEvents.BackupCreated, { path, backup_path: backupPath, attempt });
      return handle;
    }

    throw new IOError(
      `Failed to back up ${path}: ${this.maxAttempts} backup names already taken for ${formatBackupTimestamp(createdAt)}`,
      path
    );
  }

  /**
   * Replace the original with the backup's content by rename, so readers
   * never observe a half-restored file. The backup stays on disk.
   * @throws IOError if the backup is missing or the replace fails
   */
  async restore(handle: BackupHandle): Promise<void> {
    const { originalPath, backupPath } = handle;
    const tempPath = tempSiblingPath(originalPath);

    try {
      await copyFile(backupPath, tempPath, fsConstants.COPYFILE_EXCL);
      await rename(tempPath, originalPath);
    } catch (error) {
      await this.discardTemp(tempPath);
      const reason = errnoCode(error) === 'ENOENT' ? 'backup missing' : describeCause(error);
      throw new IOError(`Failed to restore ${originalPath} from ${backupPath}: ${reason}`, originalPath, error);
    }

    emit(TelemetryEvents.BackupRestored, { path: originalPath, backup_path: backupPath });
  }

  /**
   * Existing backups of `path`, oldest first
   */
  async listBackups(path: string): Promise<string[]> {
    const prefix = `${basename(path)}.backup_`;
    let files: string[];
    try {
      files = await readdir(dirname(path));
    } catch (error) {
      throw new IOError(`Failed to list backups of ${path}: ${describeCause(error)}`, path, error);
    }

    return files
      .filter((file) => file.startsWith(prefix) && /^\d{8}_\d{6}(_\d{3,})?$/.test(file.slice(prefix.length)))
      .sort()
      .map((file) => join(dirname(path), file));
  }

  private async discardTemp(tempPath: string): Promise<void> {
    try {
      await unlink(tempPath);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn({ error, path: tempPath }, 'Failed to remove temp file after restore failure');
      }
    }
  }
}
