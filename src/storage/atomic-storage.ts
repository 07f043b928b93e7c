/**
 * Atomic Storage Module
 *
 * Crash-safe JSON snapshots for the ledger. Uses the write-to-temp + fsync +
 * atomic-rename pattern so a crash mid-write leaves either the old snapshot
 * or the new one on disk, never a partial file. The previous snapshot is kept
 * as a `.bak` and used when the main file fails its checksum.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { errorMessage } from '../errors';
import { logger } from '../logging';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number; // Schema version for future migrations
  checksum: string; // SHA-256 of the serialized data
  data: T;
  writtenAt: number;
}

export type ReadResult<T> =
  | { success: true; data: T; recoveredFromBackup?: boolean }
  | { success: false; error: string };

/**
 * Turns parsed JSON into a typed value, throwing when the shape is wrong.
 */
export type Parser<T> = (raw: unknown) => T;

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
   * 1. Serialize data with checksum
   * 2. Write to temporary file and fsync
   * 3. Move the existing file to the backup slot
   * 4. Atomic rename temp -> target
   */
  static writeFileAtomic<T>(filePath: string, data: T): void {
    const tempPath = filePath + this.TEMP_SUFFIX;
    const backupPath = filePath + this.BACKUP_SUFFIX;

    const jsonData = JSON.stringify(data, null, 2);
    const wrapper: ChecksummedFile<T> = {
      version: this.CURRENT_VERSION,
      checksum: sha256(jsonData),
      data,
      writtenAt: Date.now(),
    };

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, JSON.stringify(wrapper, null, 2));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    if (fs.existsSync(filePath)) {
      try {
        if (fs.existsSync(backupPath)) {
          fs.unlinkSync(backupPath);
        }
        fs.renameSync(filePath, backupPath);
      } catch (err) {
        // The temp file is complete, so the write still goes ahead
        logger.warn('AtomicStorage', 'Backup failed', { filePath, error: errorMessage(err) });
      }
    }

    fs.renameSync(tempPath, filePath);

    try {
      const dirFd = fs.openSync(dir, 'r');
      try {
        fs.fsyncSync(dirFd);
      } finally {
        fs.closeSync(dirFd);
      }
    } catch (err) {
      // Directory fsync is unsupported on some platforms
      logger.debug('AtomicStorage', 'Directory sync skipped', { dir, error: errorMessage(err) });
    }
  }

  /**
   * Read a file with checksum verification, falling back to the backup
   */
  static readFileAtomic<T>(filePath: string, parse: Parser<T>): ReadResult<T> {
    const mainResult = this.tryReadFile(filePath, parse);
    if (mainResult.success) {
      return mainResult;
    }

    const backupPath = filePath + this.BACKUP_SUFFIX;
    if (!fs.existsSync(backupPath)) {
      return mainResult;
    }

    logger.warn('AtomicStorage', 'Main file unreadable, trying backup', { filePath, error: mainResult.error });
    const backupResult = this.tryReadFile(backupPath, parse);
    if (!backupResult.success) {
      return {
        success: false,
        error: `Both main file and backup are unreadable: ${mainResult.error}; ${backupResult.error}`,
      };
    }

    try {
      this.writeFileAtomic(filePath, backupResult.data);
      logger.warn('AtomicStorage', 'Restored backup to main file', { filePath });
    } catch (err) {
      logger.error('AtomicStorage', 'Failed to restore backup', { filePath, error: errorMessage(err) });
    }

    return { success: true, data: backupResult.data, recoveredFromBackup: true };
  }

  private static tryReadFile<T>(filePath: string, parse: Parser<T>): ReadResult<T> {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      return { success: false, error: `Invalid JSON: ${errorMessage(err)}` };
    }

    if (!isRecord(parsed) || typeof parsed.checksum !== 'string' || !('data' in parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculatedChecksum = sha256(JSON.stringify(parsed.data, null, 2));
    if (calculatedChecksum !== parsed.checksum) {
      return {
        success: false,
        error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculatedChecksum}`,
      };
    }

    try {
      return { success: true, data: parse(parsed.data) };
    } catch (err) {
      return { success: false, error: `Unexpected content: ${errorMessage(err)}` };
    }
  }

  static exists(filePath: string): boolean {
    return fs.existsSync(filePath) || fs.existsSync(filePath + this.BACKUP_SUFFIX);
  }

  /**
   * Remove orphaned temp files left by interrupted writes
   */
  static cleanupTempFiles(directory: string): number {
    if (!fs.existsSync(directory)) {
      return 0;
    }

    let cleaned = 0;
    for (const file of fs.readdirSync(directory)) {
      if (!file.endsWith(this.TEMP_SUFFIX)) continue;
      try {
        fs.unlinkSync(path.join(directory, file));
        cleaned++;
        logger.info('AtomicStorage', 'Cleaned up orphaned temp file', { file });
      } catch (err) {
        logger.warn('AtomicStorage', 'Failed to clean up temp file', { file, error: errorMessage(err) });
      }
    }
    return cleaned;
  }
}
