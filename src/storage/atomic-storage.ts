/**
 * Atomic Storage Module
 *
 * Crash-safe file operations for ledger snapshots.
 * Uses write-to-temp + fsync + atomic-rename so that a crash leaves either
 * the old file or the new file intact, never a partial write.
 */

import * as fs from 'fs';
import * as path from 'path';
import { sha256 } from '../crypto';
import { logger } from '../scaling/structured-logger';

const COMPONENT = 'AtomicStorage';

/**
 * File wrapper with checksum for corruption detection
 */
export interface ChecksummedFile<T> {
  version: number;        // Schema version for future migrations
  checksum: string;       // SHA-256 of the data
  data: T;
  writtenAt: number;
}

/**
 * Result of a read operation. `data` is unvalidated: callers parse it.
 */
export interface ReadResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

function isWrapper(value: unknown): value is ChecksummedFile<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    'checksum' in value &&
    typeof value.checksum === 'string' &&
    'data' in value
  );
}

/**
 * Atomic file writer with checksums and backup recovery
 */
export class AtomicStorage {
  private static readonly CURRENT_VERSION = 1;
  private static readonly TEMP_SUFFIX = '.tmp';
  private static readonly BACKUP_SUFFIX = '.bak';

  /**
   * Atomically write JSON-serializable data with a checksum
   *
   * 1. Serialize data with checksum
   * 2. Write to temporary file and fsync
   * 3. Move the existing file to .bak
   * 4. Rename temp -> target
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
    const finalData = JSON.stringify(wrapper, null, 2);

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeSync(fd, finalData);
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
        // The temp file is complete; losing the backup is recoverable
        logger.warn(COMPONENT, 'Backup failed', { filePath, error: String(err) });
      }
    }

    fs.renameSync(tempPath, filePath);

    try {
      const dirFd = fs.openSync(dir, 'r');
      fs.fsyncSync(dirFd);
      fs.closeSync(dirFd);
    } catch (err) {
      // Directory fsync is unsupported on some platforms
      logger.debug(COMPONENT, 'Directory sync skipped', { dir, error: String(err) });
    }
  }

  /**
   * Read a file with checksum verification, falling back to the backup
   */
  static readFileAtomic(filePath: string): ReadResult {
    const backupPath = filePath + this.BACKUP_SUFFIX;

    const mainResult = this.tryReadFile(filePath);
    if (mainResult.success) {
      return mainResult;
    }

    const backupResult = this.tryReadFile(backupPath);
    if (backupResult.success) {
      logger.warn(COMPONENT, 'Recovered from backup', { filePath, mainError: mainResult.error });
      try {
        this.writeFileAtomic(filePath, backupResult.data);
      } catch (err) {
        logger.error(COMPONENT, 'Failed to restore backup to main file', { filePath, error: String(err) });
      }
      return { success: true, data: backupResult.data };
    }

    return {
      success: false,
      error: `Both main file and backup are corrupted or missing: ${mainResult.error}`,
    };
  }

  /**
   * Base paths of the checksummed files in `dir` ending in `extension`,
   * including those that only survive as a backup.
   */
  static listFiles(dir: string, extension: string): string[] {
    if (!fs.existsSync(dir)) {
      return [];
    }

    const names = new Set<string>();
    for (const name of fs.readdirSync(dir)) {
      const base = name.endsWith(this.BACKUP_SUFFIX) ? name.slice(0, -this.BACKUP_SUFFIX.length) : name;
      if (base.endsWith(extension)) names.add(base);
    }
    return Array.from(names).sort().map(name => path.join(dir, name));
  }

  /**
   * Append newline-terminated lines and fsync. A crash mid-append can only
   * leave an unterminated last line, which readers discard.
   */
  static appendLines(filePath: string, lines: string[]): void {
    if (lines.length === 0) return;

    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const fd = fs.openSync(filePath, 'a');
    try {
      fs.writeSync(fd, lines.map(line => line + '\n').join(''));
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  private static tryReadFile(filePath: string): ReadResult {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File does not exist' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      return { success: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
    }

    if (!isWrapper(parsed)) {
      return { success: false, error: 'Missing checksum wrapper' };
    }

    const calculated = sha256(JSON.stringify(parsed.data, null, 2));
    if (calculated !== parsed.checksum) {
      return {
        success: false,
        error: `Checksum mismatch: expected ${parsed.checksum}, got ${calculated}`,
      };
    }

    return { success: true, data: parsed.data };
  }
}
