/**
 * Selector Cache - per-site memory of working locators
 *
 * Keyed by (site, logical name). Entries older than the TTL read as absent;
 * expiry is evaluated on read, and prune() sweeps expired entries out of the
 * file. The cache is the only writer of its file.
 */

import { z } from 'zod';
import type { LocatorCandidate, SelectorCacheEntry } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { PersistentStore } from '../utils/persistent-store.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.cache;

const HOUR_MS = 60 * 60 * 1000;

const candidateSchema = z.object({
  locator: z.string().min(1),
  strategy: z.enum(['direct', 'cached', 'text', 'semantic']),
  confidence: z.number().min(0).max(1),
  depth: z.number().int().nonnegative().optional(),
});

const cacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.object({
      candidate: candidateSchema,
      hits: z.number().int().nonnegative(),
      lastVerifiedAt: z.number(),
    })
  ),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

export interface SelectorCacheOptions {
  /** JSON file backing the cache; null keeps it in memory */
  filePath: string | null;
  ttlHours: number;
  now?: () => number;
  debounceMs?: number;
}

export function cacheKey(site: string, logicalName: string): string {
  return `${site}::${logicalName}`;
}

function freezeCandidate(candidate: LocatorCandidate): LocatorCandidate {
  return Object.freeze({ ...candidate });
}

export class SelectorCache {
  private readonly entries = new Map<string, SelectorCacheEntry>();
  private readonly store: PersistentStore<CacheFile> | null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SelectorCacheOptions) {
    this.ttlMs = options.ttlHours * HOUR_MS;
    this.now = options.now ?? Date.now;
    this.store = options.filePath
      ? new PersistentStore(options.filePath, (raw) => cacheFileSchema.parse(raw), {
          componentName: 'SelectorCache',
          debounceMs: options.debounceMs ?? TIMEOUTS.CACHE_WRITE_DEBOUNCE,
        })
      : null;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Read the backing file. A missing or unreadable file starts an empty cache.
   */
  async load(): Promise<void> {
    if (!this.store) return;

    let file: CacheFile | null;
    try {
      file = await this.store.load();
    } catch (error) {
      log.warn('Selector cache file is invalid, starting empty', {
        path: this.store.getFilePath(),
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (!file) return;

    for (const [key, entry] of Object.entries(file.entries)) {
      this.entries.set(key, { ...entry, candidate: freezeCandidate(entry.candidate) });
    }

    const pruned = this.prune();
    log.debug('Selector cache loaded', { entries: this.entries.size, pruned });
  }

  private isExpired(entry: SelectorCacheEntry, ttlHours?: number): boolean {
    const ttlMs = ttlHours === undefined ? this.ttlMs : ttlHours * HOUR_MS;
    return this.now() - entry.lastVerifiedAt > ttlMs;
  }

  /**
   * Fresh entry or null. Pure read. `ttlHours` overrides the configured TTL
   * for this read only.
   */
  getEntry(site: string, logicalName: string, ttlHours?: number): SelectorCacheEntry | null {
    const entry = this.entries.get(cacheKey(site, logicalName));
    if (!entry || this.isExpired(entry, ttlHours)) return null;
    return { ...entry };
  }

  get(site: string, logicalName: string, ttlHours?: number): LocatorCandidate | null {
    return this.getEntry(site, logicalName, ttlHours)?.candidate ?? null;
  }

  /**
   * Entry regardless of age. Only for tie-breaking against a previous match.
   */
  peek(site: string, logicalName: string): SelectorCacheEntry | null {
    const entry = this.entries.get(cacheKey(site, logicalName));
    return entry ? { ...entry } : null;
  }

  /**
   * Replace the whole entry (last write wins).
   */
  put(site: string, logicalName: string, candidate: LocatorCandidate, hits = 1): void {
    this.entries.set(cacheKey(site, logicalName), {
      candidate: freezeCandidate(candidate),
      hits,
      lastVerifiedAt: this.now(),
    });
    log.debug('Selector cached', { site, logicalName, strategy: candidate.strategy, hits });
    this.persist();
  }

  invalidate(site: string, logicalName: string): boolean {
    const removed = this.entries.delete(cacheKey(site, logicalName));
    if (removed) {
      log.debug('Selector invalidated', { site, logicalName });
      this.persist();
    }
    return removed;
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) this.persist();
    return removed;
  }

  async flush(): Promise<void> {
    await this.store?.flush();
  }

  private serialize(): CacheFile {
    const entries: CacheFile['entries'] = {};
    for (const [key, entry] of this.entries) {
      entries[key] = { ...entry, candidate: { ...entry.candidate } };
    }
    return { version: 1, entries };
  }

  private persist(): void {
    if (!this.store) return;
    this.store.save(this.serialize()).catch((error: unknown) => {
      log.warn('Selector cache write failed', { error: error instanceof Error ? error.message : String(error) });
    });
  }
}
