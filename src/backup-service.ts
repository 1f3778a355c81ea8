/**
 * @fileoverview DirectoryBackupService - timestamped backups of the server
 * data directory with count-based retention.
 *
 * Compressed backups are zip archives written with archiver; otherwise the
 * directory is copied as-is. Only the newest `maxBackups` entries are kept.
 *
 * @module backup-service
 */

import { createWriteStream } from 'node:fs';
import { cp, mkdir, readdir, rm, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import archiver from 'archiver';
import { getErrorMessage } from './types.js';
import type { BackupResult, BackupService } from './types.js';

const BACKUP_PREFIX = 'backup-';

/** Files the server holds open or that are pointless to keep */
const ARCHIVE_IGNORE = ['**/*.lock', '**/*.lck', '**/*.tmp'];

export interface DirectoryBackupServiceOptions {
  backupDir: string;
  maxBackups: number;
  compress: boolean;
  /** Injected for tests */
  clock?: () => Date;
}

/**
 * `backup-20261018-140321`, sortable by name.
 */
export function backupName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${BACKUP_PREFIX}${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class DirectoryBackupService implements BackupService {
  private readonly options: DirectoryBackupServiceOptions;

  constructor(options: DirectoryBackupServiceOptions) {
    this.options = options;
  }

  async create(sourcePath: string): Promise<BackupResult> {
    const now = this.options.clock?.() ?? new Date();
    const target = join(this.options.backupDir, backupName(now) + (this.options.compress ? '.zip' : ''));

    try {
      const source = await stat(sourcePath);
      if (!source.isDirectory()) {
        return { success: false, error: `${sourcePath} is not a directory` };
      }
    } catch (err) {
      return { success: false, error: getErrorMessage(err) };
    }
    if (await this.exists(target)) {
      return { success: false, error: `${basename(target)} already exists` };
    }

    try {
      await mkdir(this.options.backupDir, { recursive: true });
      if (this.options.compress) {
        await this.writeArchive(sourcePath, target);
      } else {
        await cp(sourcePath, target, { recursive: true, errorOnExist: true, force: false });
      }
    } catch (err) {
      await rm(target, { recursive: true, force: true });
      return { success: false, error: getErrorMessage(err) };
    }

    console.log(`[BackupService] Created ${basename(target)}`);
    await this.applyRetention();
    return { success: true, path: target };
  }

  /** Existing backups, oldest first */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.options.backupDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }
    return entries.filter((name) => name.startsWith(BACKUP_PREFIX)).sort();
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
      throw err;
    }
  }

  private writeArchive(sourcePath: string, target: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const output = createWriteStream(target);
      const archive = archiver('zip', { zlib: { level: 9 } });

      output.on('close', () => resolve());
      output.on('error', reject);
      archive.on('warning', (err) => {
        console.warn(`[BackupService] Archive warning: ${err.message}`);
      });
      archive.on('error', reject);

      archive.pipe(output);
      archive.glob('**/*', { cwd: sourcePath, dot: true, ignore: ARCHIVE_IGNORE });
      archive.finalize().catch(reject);
    });
  }

  private async applyRetention(): Promise<void> {
    try {
      const backups = await this.list();
      const excess = backups.slice(0, Math.max(0, backups.length - this.options.maxBackups));
      for (const name of excess) {
        await rm(join(this.options.backupDir, name), { recursive: true, force: true });
        console.log(`[BackupService] Removed old backup ${name}`);
      }
    } catch (err) {
      console.warn(`[BackupService] Retention pass failed: ${getErrorMessage(err)}`);
    }
  }
}
