/**
 * Persistent Store - Debounced & Atomic File Persistence
 *
 * - Debounced writes: rapid save calls collapse into one write of the latest data
 * - Atomic writes: temp file + rename, so readers never see a partial file
 * - Validated loads: file contents go through the caller's parser
 *
 * Usage:
 *   const store = new PersistentStore('./cache/selectors.json', (raw) => schema.parse(raw));
 *   await store.save(data);          // debounced, atomic
 *   const data = await store.load(); // null when the file is missing
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from './logger.js';

const log = logger.store;

export interface PersistentStoreConfig {
  /** Debounce delay in milliseconds (default: 1000ms) */
  debounceMs: number;

  /** Pretty-print JSON with indentation (default: true) */
  prettyPrint: boolean;

  indent: number;

  /** Create parent directories if they don't exist (default: true) */
  createDirs: boolean;

  /** Component name for logging */
  componentName: string;
}

const DEFAULT_CONFIG: PersistentStoreConfig = {
  debounceMs: 1000,
  prettyPrint: true,
  indent: 2,
  createDirs: true,
  componentName: 'PersistentStore',
};

interface Waiter {
  resolve: () => void;
  reject: (error: unknown) => void;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * PersistentStore - Debounced & Atomic JSON file persistence
 */
export class PersistentStore<T> {
  private readonly filePath: string;
  private readonly config: PersistentStoreConfig;
  /** Numbers temp files */
  private writes = 0;

  private pendingData: T | null = null;
  private waiters: Waiter[] = [];
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    filePath: string,
    private readonly parse: (raw: unknown) => T,
    config: Partial<PersistentStoreConfig> = {}
  ) {
    this.filePath = path.resolve(filePath);
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Save data with debouncing. Every caller whose data was superseded
   * resolves once the write carrying the newer data lands.
   */
  save(data: T): Promise<void> {
    this.pendingData = data;

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    const done = new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.writePending().catch((error: unknown) => {
        log.debug(`${this.config.componentName}: Debounced write failed`, { error: String(error) });
      });
    }, this.config.debounceMs);

    return done;
  }

  /**
   * Write any pending data now. Used on shutdown.
   */
  async flush(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.writePending();
    await this.writeChain;
  }

  /**
   * Load and validate the file. Returns null if the file doesn't exist.
   */
  async load(): Promise<T | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      log.error(`${this.config.componentName}: Failed to load from ${this.filePath}`, { error });
      throw error;
    }
    return this.parse(JSON.parse(content));
  }

  private writePending(): Promise<void> {
    const data = this.pendingData;
    const waiters = this.waiters;
    this.pendingData = null;
    this.waiters = [];

    if (data === null) {
      for (const waiter of waiters) waiter.resolve();
      return this.writeChain;
    }

    // Writes are serialized so an older write never renames over a newer one
    const write = this.writeChain.then(() => this.atomicWrite(data));
    this.writeChain = write.catch((error: unknown) => {
      log.debug(`${this.config.componentName}: Write chain continues after failure`, {
        error: String(error),
      });
    });

    void write.then(
      () => {
        for (const waiter of waiters) waiter.resolve();
      },
      (error: unknown) => {
        for (const waiter of waiters) waiter.reject(error);
      }
    );
    return write;
  }

  /**
   * Perform atomic write: write to temp file, then rename
   */
  private async atomicWrite(data: T): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${process.pid}.${this.writes++}`;

    try {
      if (this.config.createDirs) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      }

      const content = this.config.prettyPrint
        ? JSON.stringify(data, null, this.config.indent)
        : JSON.stringify(data);

      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);

      log.debug(`${this.config.componentName}: Saved to ${this.filePath}`, {
        size: content.length,
      });
    } catch (error) {
      log.error(`${this.config.componentName}: Failed to save to ${this.filePath}`, { error });

      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
