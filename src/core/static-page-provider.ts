/**
 * Static Page Provider - HTML over fetch, queried with cheerio
 *
 * Used when `browser.engine` is `static`, and by the tests. No script runs,
 * so visibility comes from markup (hidden attributes, inline styles).
 */

import type {
  ContentBlock,
  ElementSnapshot,
  FormInfo,
  NavigationOutcome,
  NetworkCall,
  NetworkQuery,
  PagePreview,
  RawTable,
  StructureInfo,
} from '../types/index.js';
import { CookieJar } from 'tough-cookie';
import { NavigationError } from '../types/errors.js';
import type {
  BlockOptions,
  GotoOptions,
  PageHandle,
  PageProvider,
  ReadOptions,
  SessionState,
} from '../types/page.js';
import { locatorKind } from '../utils/css.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { DomDocument } from './dom-document.js';
import { NetworkMonitor } from './network-monitor.js';

const log = logger.staticPages;

export interface FetchedPage {
  url: string;
  status: number;
  body: string;
  setCookies: string[];
}

export type HtmlFetcher = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchedPage>;

/**
 * Default fetcher over the global fetch.
 */
export const fetchHtml: HtmlFetcher = async (url, init) => {
  const response = await fetch(url, { headers: init.headers, signal: init.signal, redirect: 'follow' });
  return {
    url: response.url || url,
    status: response.status,
    body: await response.text(),
    setCookies: response.headers.getSetCookie(),
  };
};

export interface StaticProviderOptions {
  fetcher?: HtmlFetcher;
  userAgent?: string;
  extraHeaders?: Record<string, string>;
  navigationTimeoutMs?: number;
  maxNetworkEvents?: number;
}

/**
 * Page handle over a parsed HTML document.
 */
export class StaticPageHandle implements PageHandle {
  private document: DomDocument = new DomDocument('');
  private currentUrl = '';
  private readonly monitor: NetworkMonitor;

  constructor(
    readonly id: string,
    private readonly provider: StaticPageProvider,
    maxNetworkEvents: number
  ) {
    this.monitor = new NetworkMonitor(maxNetworkEvents);
  }

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string, options: GotoOptions = {}): Promise<NavigationOutcome> {
    const complete = this.monitor.begin(url, 'GET', 'document');
    let page: FetchedPage;
    try {
      page = await withRetry(() => this.provider.fetchPage(url, options.timeoutMs, options.signal), {
        maxAttempts: 2,
        signal: options.signal,
      });
    } catch (error) {
      complete(null);
      throw new NavigationError(url, error instanceof Error ? error.message : String(error), null, {
        cause: error,
      });
    }
    complete(page.status);

    if (page.status >= 400) {
      throw new NavigationError(url, `HTTP ${page.status}`, page.status);
    }

    this.currentUrl = page.url;
    this.document = new DomDocument(page.body);
    log.debug('Loaded page', { tabId: this.id, url: page.url, status: page.status, elements: this.document.size });
    return { url: page.url, status: page.status, ok: true };
  }

  /**
   * Replace the document directly (no network).
   */
  setContent(html: string, url = 'about:blank'): void {
    this.currentUrl = url;
    this.document = new DomDocument(html);
  }

  async evaluate(locator: string): Promise<ElementSnapshot[]> {
    return this.document.evaluate(locator);
  }

  async snapshot(max: number): Promise<ElementSnapshot[]> {
    return this.document.snapshot(max);
  }

  async readValue(locator: string, options?: ReadOptions): Promise<string | null> {
    return this.document.readValueAt(this.document.matchIndexes(locator), options);
  }

  async readAll(locator: string, limit: number, options?: ReadOptions): Promise<string[]> {
    const indexes = this.document.listIndexes(this.document.matchIndexes(locator));
    return this.document.readAllAt(indexes, limit, options);
  }

  async readTextSlice(selector: string, offset: number, length: number): Promise<string> {
    return this.document.readTextSlice(selector, offset, length);
  }

  async collectBlocks(options: BlockOptions): Promise<ContentBlock[]> {
    return this.document.collectBlocks(options);
  }

  async extractTables(selector: string, rowLimit: number): Promise<RawTable[]> {
    return this.document.extractTables(selector, rowLimit);
  }

  async describeStructure(locator: string): Promise<StructureInfo | null> {
    if (locatorKind(locator) === 'xpath') {
      log.debug('XPath structure capture needs a browser engine', { locator });
    }
    return this.document.describeStructure(this.document.matchIndexes(locator));
  }

  async preview(maxSections: number): Promise<PagePreview> {
    return this.document.preview(maxSections);
  }

  async detectForms(): Promise<FormInfo[]> {
    return this.document.forms();
  }

  networkCalls(query?: NetworkQuery): NetworkCall[] {
    return this.monitor.list(query);
  }
}

export class StaticPageProvider implements PageProvider {
  readonly engine = 'static';
  private readonly fetcher: HtmlFetcher;
  private readonly headers: Record<string, string>;
  private readonly navigationTimeoutMs: number;
  private readonly maxNetworkEvents: number;
  private cookieJar = new CookieJar();
  private readonly handles = new Set<StaticPageHandle>();

  constructor(options: StaticProviderOptions = {}) {
    this.fetcher = options.fetcher ?? fetchHtml;
    this.headers = {
      ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
      ...options.extraHeaders,
    };
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? TIMEOUTS.NAVIGATION;
    this.maxNetworkEvents = options.maxNetworkEvents ?? 600;
  }

  async open(id: string): Promise<StaticPageHandle> {
    const handle = new StaticPageHandle(id, this, this.maxNetworkEvents);
    this.handles.add(handle);
    return handle;
  }

  async close(handle: PageHandle): Promise<void> {
    if (handle instanceof StaticPageHandle) {
      this.handles.delete(handle);
    }
  }

  /**
   * Fetch a page with the provider's headers and cookie jar. The request is
   * aborted on `signal` or after `timeoutMs`, whichever comes first.
   */
  async fetchPage(url: string, timeoutMs = this.navigationTimeoutMs, signal?: AbortSignal): Promise<FetchedPage> {
    const cookieString = await this.cookieJar.getCookieString(url);
    const headers = cookieString ? { ...this.headers, Cookie: cookieString } : { ...this.headers };
    const timeout = AbortSignal.timeout(timeoutMs);
    const page = await this.fetcher(url, { headers, signal: signal ? AbortSignal.any([signal, timeout]) : timeout });

    for (const header of page.setCookies) {
      try {
        await this.cookieJar.setCookie(header, page.url || url);
      } catch (error) {
        log.debug('Rejected cookie', { url, error: error instanceof Error ? error.message : String(error) });
      }
    }
    return page;
  }

  async exportState(): Promise<SessionState> {
    return { cookieJar: await this.cookieJar.serialize() };
  }

  async restoreState(state: SessionState): Promise<void> {
    const raw = state.cookieJar;
    this.cookieJar =
      typeof raw === 'object' && raw !== null ? await CookieJar.deserialize(JSON.stringify(raw)) : new CookieJar();
    log.debug('Restored cookie jar', { present: raw !== undefined });
  }

  async cookieHeader(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  async shutdown(): Promise<void> {
    this.handles.clear();
  }
}
