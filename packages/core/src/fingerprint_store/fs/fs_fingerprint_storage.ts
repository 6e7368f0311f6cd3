/**
 * FsFingerprintStorage - Text-file FingerprintStorage
 *
 * Reads and writes the `path=fingerprint` line format. Writes go to a temp
 * file in the destination directory, are fsynced, then renamed over the
 * destination, so a crash leaves either the old or the new store.
 *
 * @module fingerprint_store/fs/fs_fingerprint_storage
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { FingerprintStorage } from '../fingerprint_store';
import { parseFingerprints, serializeFingerprints } from '../fingerprint_store.codec';
import type { FingerprintMap } from '../fingerprint_store.codec';
import { FingerprintStoreError } from '../fingerprint_store.errors';
import { createLogger } from '../../logger';

const logger = createLogger('[FingerprintStore] ');

/**
 * File operations used by FsFingerprintStorage. Can be mocked for testing.
 */
export interface StoreFileSystem {
  readFile(filePath: string): Promise<string>;
  /** Writes `content` and flushes it to disk before resolving. */
  writeFileDurable(filePath: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(dirPath: string): Promise<void>;
  remove(filePath: string): Promise<void>;
}

export type FsFingerprintStorageOptions = {
  /** Path of the store file */
  filePath: string;
  /** FileSystem abstraction (default: Node.js fs) */
  fileSystem?: StoreFileSystem;
};

export const nodeStoreFileSystem: StoreFileSystem = {
  readFile: (filePath) => fs.readFile(filePath, 'utf-8'),
  writeFileDurable: async (filePath, content) => {
    const handle = await fs.open(filePath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => fs.rename(from, to),
  mkdir: async (dirPath) => {
    await fs.mkdir(dirPath, { recursive: true });
  },
  remove: (filePath) => fs.rm(filePath, { force: true }),
};

/**
 * @example
 * ```typescript
 * const storage = new FsFingerprintStorage({ filePath: './logs/.checksums' });
 * const store = await FingerprintStore.open(storage);
 * ```
 */
export class FsFingerprintStorage implements FingerprintStorage {
  readonly filePath: string;
  private readonly fileSystem: StoreFileSystem;

  constructor(options: FsFingerprintStorageOptions) {
    this.filePath = options.filePath;
    this.fileSystem = options.fileSystem ?? nodeStoreFileSystem;
  }

  /** Temp file used while replacing the store. */
  get tempPath(): string {
    return path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${process.pid}.tmp`);
  }

  async load(): Promise<FingerprintMap> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(this.filePath);
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        return new Map();
      }
      throw new FingerprintStoreError(
        `Cannot read fingerprint store ${this.filePath}: ${error.message}`,
        'READ_ERROR',
        this.filePath,
        err
      );
    }
    return parseFingerprints(content);
  }

  async save(fingerprints: FingerprintMap): Promise<void> {
    const tmpPath = this.tempPath;

    try {
      await this.fileSystem.mkdir(path.dirname(this.filePath));
      await this.fileSystem.writeFileDurable(tmpPath, serializeFingerprints(fingerprints));
      await this.fileSystem.rename(tmpPath, this.filePath);
    } catch (err: unknown) {
      try {
        await this.fileSystem.remove(tmpPath);
      } catch (cleanupErr: unknown) {
        const cleanupMessage = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
        logger.warn(`Cannot remove temp file ${tmpPath}: ${cleanupMessage}`);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new FingerprintStoreError(
        `Cannot write fingerprint store ${this.filePath}: ${message}`,
        'WRITE_ERROR',
        this.filePath,
        err
      );
    }
  }
}
