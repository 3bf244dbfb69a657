import { mkdir, readFile, writeFile, unlink, access, rename, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/logger.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous file as a backup when overwriting (default: true) */
  createBackup?: boolean;
  /** File extension (default: '.json') */
  extension?: string;
  /** Logger for warnings (optional) */
  logger?: Logger;
}

const SAFE_KEY = /^[A-Za-z0-9._-]+$/;

/**
 * JSON file-based storage.
 *
 * - Atomic writes (unique temp file + rename)
 * - Optional backup of the previous version, used when the primary is unparsable
 * - Automatic directory creation
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly extension: string;
  private readonly logger: Logger | undefined;
  private tempCounter = 0;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.extension = config.extension ?? '.json';
    this.logger = config.logger?.child({ component: 'json-storage' });
  }

  private getPath(key: string): string {
    return join(this.basePath, `${this.checkKey(key)}${this.extension}`);
  }

  private getBackupPath(key: string): string {
    return join(this.basePath, `${this.checkKey(key)}.backup${this.extension}`);
  }

  /**
   * Temp names are unique per write so overlapping saves never share a file.
   */
  private getTempPath(key: string): string {
    this.tempCounter++;
    return join(
      this.basePath,
      `${this.checkKey(key)}.${String(process.pid)}-${String(this.tempCounter)}.tmp`
    );
  }

  private checkKey(key: string): string {
    if (!SAFE_KEY.test(key) || key.startsWith('.')) {
      throw new Error(`Unsafe storage key: ${JSON.stringify(key)}`);
    }
    return key;
  }

  async load(key: string): Promise<unknown> {
    const path = this.getPath(key);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(content) as unknown;
    } catch (error) {
      const backup = await this.loadBackup(key);
      if (backup !== null) {
        this.logger?.warn({ key }, 'Primary file unparsable, loaded backup');
        return backup;
      }
      throw error;
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.getBackupPath(key), 'utf-8');
      return JSON.parse(content) as unknown;
    } catch {
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    const path = this.getPath(key);
    const tempPath = this.getTempPath(key);

    await mkdir(this.basePath, { recursive: true });

    // Write the full document to a temp file first
    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');

    if (this.createBackup && (await this.exists(key))) {
      try {
        await writeFile(this.getBackupPath(key), await readFile(path, 'utf-8'), 'utf-8');
      } catch (error) {
        this.logger?.debug(
          { key, error: error instanceof Error ? error.message : String(error) },
          'Backup copy skipped'
        );
      }
    }

    // rename() replaces the target atomically on the same filesystem
    try {
      await rename(tempPath, path);
    } catch (error) {
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.getPath(key));
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.getPath(key));
      return true;
    } catch {
      return false;
    }
  }

  async keys(prefix?: string): Promise<string[]> {
    try {
      const files = await readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension) && !f.endsWith(`.backup${this.extension}`))
        .map((f) => f.slice(0, -this.extension.length))
        .filter((k) => prefix === undefined || k.startsWith(prefix))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}

/**
 * Factory function for creating JSON storage.
 */
export function createJSONStorage(
  basePath: string,
  options?: Partial<Omit<JSONStorageConfig, 'basePath'>>
): JSONStorage {
  return new JSONStorage({
    basePath,
    ...options,
  });
}
