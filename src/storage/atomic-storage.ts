/**
 * Atomic Storage Module
 *
 * Crash-safe JSON files for the node's bookkeeping (the segment index).
 * Uses write-to-temp + fsync + atomic-rename, and keeps the previous
 * version as a `.bak` so a torn or corrupted file can be recovered.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { logger } from '../scaling/structured-logger';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;
  checksum: string;       // SHA-256 of JSON.stringify(data)
  data: T;
  writtenAt: number;
}

export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup: boolean }
  | { success: false; error: string };

export type Guard<T> = (value: unknown) => value is T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class AtomicStorage {
  private static readonly CURRENT_VERSION = 1;
  private static readonly TEMP_SUFFIX = '.tmp';
  private static readonly BACKUP_SUFFIX = '.bak';

  /**
   * Atomically write data to a file with checksum
   *
   * 1. Write wrapper to a temporary file and fsync it
   * 2. Move the current file to .bak
   * 3. Rename temp -> target
   *
   * A crash at any point leaves either the old or the new file intact.
   */
  static writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + this.TEMP_SUFFIX;
    const backupPath = filePath + this.BACKUP_SUFFIX;

    const wrapper: ChecksummedFile<T> = {
      version: this.CURRENT_VERSION,
      checksum: sha256(JSON.stringify(data)),
      data,
      writtenAt: Date.now(),
    };

    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      try {
        fs.rmSync(backupPath, { force: true });
        fs.renameSync(filePath, backupPath);
      } catch (err) {
        // The temp file is complete; losing the backup only loses recovery
        logger.warn('AtomicStorage', `Backup failed for ${filePath}`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    fs.renameSync(tempPath, filePath);
  }

  /**
   * Read a file, verify its checksum and shape, fall back to the backup.
   */
  static readFileAtomic<T>(filePath: string, guard: Guard<T>): ReadResult<T> {
    const main = this.tryReadFile(filePath, guard);
    if (main.success) return main;

    logger.warn('AtomicStorage', `Main file unreadable, trying backup: ${filePath}`, { error: main.error });

    const backup = this.tryReadFile(filePath + this.BACKUP_SUFFIX, guard);
    if (!backup.success) {
      return { success: false, error: `Main file and backup unreadable: ${main.error}` };
    }

    try {
      this.writeFileAtomic(filePath, backup.data);
    } catch (err) {
      logger.error('AtomicStorage', `Failed to restore backup for ${filePath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return { success: true, data: backup.data, recoveredFromBackup: true };
  }

  private static tryReadFile<T>(filePath: string, guard: Guard<T>): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch {
      return { success: false, error: 'Invalid JSON' };
    }

    if (!isRecord(parsed) || typeof parsed.checksum !== 'string' || !('data' in parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data));
    if (calculated !== parsed.checksum) {
      return { success: false, error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}` };
    }
    if (!guard(parsed.data)) {
      return { success: false, error: 'Unexpected file contents' };
    }

    return { success: true, data: parsed.data, recoveredFromBackup: false };
  }

  static exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + this.BACKUP_SUFFIX);
  }

  /**
   * Remove temp files left behind by interrupted writes
   */
  static cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) return 0;

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(this.TEMP_SUFFIX)) continue;
      fs.rmSync(path.join(directory, file), { force: true });
      cleaned++;
      logger.debug('AtomicStorage', `Cleaned up orphaned temp file: ${file}`);
    }
    return cleaned;
  }
}
