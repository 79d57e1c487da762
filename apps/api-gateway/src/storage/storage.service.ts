import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { randomUUID } from 'crypto';
import { StorageWriteException } from './storage.exceptions';

/** Max length of the sanitized file name suffix in the stored name */
const MAX_FILENAME_LENGTH = 100;

const DEFAULT_STORAGE_PATH = './data/uploads';

/**
 * StorageService: persists uploaded files on a directory shared with the
 * worker.
 *
 * File name pattern:  {uuid}-{sanitized-filename}
 * Example:            f3a2b1c0-…-acme_invoice.txt
 *
 * The returned path is absolute, so the worker can open it regardless of
 * its own working directory as long as both see the same mount.
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private readonly root: string;

  constructor(private readonly configService: ConfigService) {
    this.root = resolve(
      this.configService.get<string>('FILE_STORAGE_PATH', DEFAULT_STORAGE_PATH),
    );
  }

  /** Creates the storage directory; an existing directory is left as is */
  async onModuleInit(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    this.logger.log(`StorageService ready, directory "${this.root}"`);
  }

  /**
   * Writes a file buffer under a unique name and returns its absolute path.
   *
   * @throws StorageWriteException on any file system error
   */
  async saveFile(buffer: Buffer, originalName: string): Promise<string> {
    const filePath = join(this.root, this.buildFileName(originalName));

    this.logger.debug(`Writing ${filePath} (${buffer.length} bytes)`);

    try {
      await writeFile(filePath, buffer, { flag: 'wx' });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to write "${filePath}": ${cause.message}`);
      throw new StorageWriteException(originalName, cause);
    }

    this.logger.log(`Stored "${filePath}" (${buffer.length} bytes)`);
    return filePath;
  }

  // ── Helpers ────────────────────────────────────────────────

  private buildFileName(originalName: string): string {
    const sanitized = this.sanitizeFilename(originalName) || 'upload';
    return `${randomUUID()}-${sanitized}`;
  }

  /**
   * Replaces path separators and anything outside [a-zA-Z0-9._-], and
   * truncates to MAX_FILENAME_LENGTH characters.
   */
  sanitizeFilename(filename: string): string {
    return filename
      .replace(/[^a-zA-Z0-9._-]/g, '_')
      .slice(0, MAX_FILENAME_LENGTH)
      .toLowerCase();
  }
}
