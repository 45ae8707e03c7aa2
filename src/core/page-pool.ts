/**
 * Page Pool - bounded, LRU-evicting set of open pages
 *
 * Pages are addressed by tab id. State per page: idle -> active on acquire,
 * active -> idle on release, idle -> closing -> removed on eviction. Pages
 * being opened or closed count against `maxTabs`, so the number of live
 * pages never exceeds it. Active pages are never evicted; when nothing is
 * evictable, acquire() waits for a release (no polling) until the acquire
 * timeout, then throws PoolExhaustedError.
 */

import { PoolExhaustedError } from '../types/errors.js';
import type { PageHandle, PageProvider } from '../types/page.js';
import { logger } from '../utils/logger.js';

const log = logger.pool;

export type PooledPageState = 'idle' | 'active' | 'closing';

export interface PooledPage {
  readonly tabId: string;
  readonly page: PageHandle;
  state: PooledPageState;
  /** Logical clock value of the last acquire or release */
  lastUsedAt: number;
}

export interface PagePoolOptions {
  maxTabs: number;
  acquireTimeoutMs: number;
}

export interface AcquireOptions {
  signal?: AbortSignal;
}

export interface PoolStats {
  maxTabs: number;
  idle: number;
  active: number;
  opening: number;
  tabs: Array<{ tabId: string; state: PooledPageState }>;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Acquire aborted');
}

export class PagePool {
  private readonly pages = new Map<string, PooledPage>();
  private readonly opening = new Set<string>();
  private readonly waiters = new Set<() => void>();
  private readonly maxTabs: number;
  private readonly acquireTimeoutMs: number;
  private clock = 0;

  constructor(
    private readonly provider: PageProvider,
    options: PagePoolOptions
  ) {
    this.maxTabs = Math.max(1, Math.trunc(options.maxTabs));
    this.acquireTimeoutMs = options.acquireTimeoutMs;
  }

  /** Pages holding a slot: idle, active, closing, or being opened */
  private get occupied(): number {
    return this.pages.size + this.opening.size;
  }

  has(tabId: string): boolean {
    return this.pages.has(tabId);
  }

  /**
   * Take exclusive use of the page for `tabId`, opening it if needed.
   */
  async acquire(tabId: string, options: AcquireOptions = {}): Promise<PageHandle> {
    const { signal } = options;
    const started = Date.now();

    for (;;) {
      if (signal?.aborted) throw abortReason(signal);

      const existing = this.pages.get(tabId);
      if (existing) {
        if (existing.state === 'idle') {
          existing.state = 'active';
          existing.lastUsedAt = ++this.clock;
          log.debug('Reusing tab', { tabId });
          return existing.page;
        }
      } else if (!this.opening.has(tabId)) {
        if (this.occupied < this.maxTabs) {
          return this.open(tabId, signal);
        }
        const victim = this.leastRecentlyUsedIdle();
        if (victim) {
          await this.evict(victim);
          continue;
        }
      }

      await this.waitForChange(tabId, started, signal);
    }
  }

  /**
   * Hand a page back. Unknown or already idle tabs are ignored.
   */
  release(tabId: string): void {
    const entry = this.pages.get(tabId);
    if (!entry || entry.state !== 'active') {
      log.debug('Release ignored', { tabId, state: entry?.state ?? 'absent' });
      return;
    }
    entry.state = 'idle';
    entry.lastUsedAt = ++this.clock;
    this.notify();
  }

  /**
   * Close an idle tab. Returns false when the tab is unknown or in use.
   */
  async closeTab(tabId: string): Promise<boolean> {
    const entry = this.pages.get(tabId);
    if (!entry || entry.state !== 'idle') return false;
    await this.evict(entry);
    return true;
  }

  /**
   * Close every idle tab, leaving tabs in use alone. Returns the closed ids.
   */
  async closeIdle(): Promise<string[]> {
    const entries = [...this.pages.values()].filter((entry) => entry.state === 'idle');
    await Promise.all(entries.map((entry) => this.evict(entry)));
    return entries.map((entry) => entry.tabId).sort();
  }

  /**
   * Close every page regardless of state. Only for shutdown.
   */
  async closeAll(): Promise<void> {
    const entries = [...this.pages.values()].filter((entry) => entry.state !== 'closing');
    await Promise.all(entries.map((entry) => this.evict(entry)));
  }

  stats(): PoolStats {
    const tabs = [...this.pages.values()]
      .map((entry) => ({ tabId: entry.tabId, state: entry.state }))
      .sort((a, b) => a.tabId.localeCompare(b.tabId));
    return {
      maxTabs: this.maxTabs,
      idle: tabs.filter((tab) => tab.state === 'idle').length,
      active: tabs.filter((tab) => tab.state === 'active').length,
      opening: this.opening.size,
      tabs,
    };
  }

  private leastRecentlyUsedIdle(): PooledPage | null {
    let victim: PooledPage | null = null;
    for (const entry of this.pages.values()) {
      if (entry.state !== 'idle') continue;
      if (!victim || entry.lastUsedAt < victim.lastUsedAt) victim = entry;
    }
    return victim;
  }

  private async open(tabId: string, signal: AbortSignal | undefined): Promise<PageHandle> {
    this.opening.add(tabId);
    let page: PageHandle;
    try {
      page = await this.provider.open(tabId);
    } catch (error) {
      this.opening.delete(tabId);
      this.notify();
      throw error;
    }
    this.opening.delete(tabId);

    const entry: PooledPage = { tabId, page, state: 'active', lastUsedAt: ++this.clock };
    this.pages.set(tabId, entry);
    log.debug('Opened tab', { tabId, open: this.pages.size });

    if (signal?.aborted) {
      this.release(tabId);
      throw abortReason(signal);
    }
    return page;
  }

  private async evict(entry: PooledPage): Promise<void> {
    entry.state = 'closing';
    log.debug('Closing tab', { tabId: entry.tabId });
    try {
      await this.provider.close(entry.page);
    } catch (error) {
      log.warn('Closing tab failed', { tabId: entry.tabId, error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.pages.delete(entry.tabId);
      this.notify();
    }
  }

  private waitForChange(tabId: string, started: number, signal: AbortSignal | undefined): Promise<void> {
    const remaining = started + this.acquireTimeoutMs - Date.now();
    if (remaining <= 0) {
      return Promise.reject(new PoolExhaustedError(tabId, Date.now() - started));
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', onAbort);
      };
      const wake = () => {
        cleanup();
        resolve();
      };
      const onAbort = () => {
        cleanup();
        reject(signal ? abortReason(signal) : new Error('Acquire aborted'));
      };
      const timer = setTimeout(() => {
        cleanup();
        log.warn('Pool exhausted', { tabId, waitedMs: Date.now() - started });
        reject(new PoolExhaustedError(tabId, Date.now() - started));
      }, remaining);

      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private notify(): void {
    const waiting = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiting) wake();
  }
}
