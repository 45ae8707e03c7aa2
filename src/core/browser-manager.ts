/**
 * Browser Manager - Playwright page provider
 *
 * Playwright is loaded lazily so the static engine works without it.
 * One browser and one context are shared by every tab; the context carries
 * the device profile, stealth init script and any restored session state.
 */

import type { Browser, BrowserContext, Page, Response } from 'playwright';
import { z } from 'zod';
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
import { NavigationError } from '../types/errors.js';
import type {
  BlockOptions,
  FillFormOptions,
  FillFormResult,
  GotoOptions,
  InteractionDriver,
  PageHandle,
  PageProvider,
  ReadOptions,
  ScrollResult,
  SessionState,
} from '../types/page.js';
import type { BrowserConfig, DeviceProfile, PerformanceConfig } from '../utils/config-schemas.js';
import { locatorKind } from '../utils/css.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';
import { DomDocument } from './dom-document.js';
import { fillForm, type ControlKind, type FormControls } from './form-filler.js';
import { NetworkMonitor } from './network-monitor.js';
import type { StealthProvider } from './stealth.js';

const log = logger.browser;

// Lazy-loaded Playwright reference
let playwrightModule: typeof import('playwright') | null = null;
let playwrightLoadError: string | null = null;

/**
 * Try to load Playwright dynamically
 */
async function tryLoadPlaywright(): Promise<typeof import('playwright') | null> {
  if (playwrightModule || playwrightLoadError) {
    return playwrightModule;
  }

  try {
    playwrightModule = await import('playwright');
    return playwrightModule;
  } catch (error) {
    playwrightLoadError = error instanceof Error ? error.message : 'Failed to load Playwright';
    log.warn('Playwright not available', { error: playwrightLoadError });
    return null;
  }
}

// ============================================
// SESSION STATE
// ============================================

const storageStateSchema = z.object({
  cookies: z
    .array(
      z.object({
        name: z.string(),
        value: z.string(),
        domain: z.string(),
        path: z.string(),
        expires: z.number(),
        httpOnly: z.boolean(),
        secure: z.boolean(),
        sameSite: z.enum(['Strict', 'Lax', 'None']),
      })
    )
    .default([]),
  origins: z
    .array(
      z.object({
        origin: z.string(),
        localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
      })
    )
    .default([]),
});

type StorageState = z.infer<typeof storageStateSchema>;

// ============================================
// IN-PAGE FUNCTIONS
// ============================================

function liveVisibility(): boolean[] {
  return Array.from(document.querySelectorAll('body *')).map((el) => {
    const style = window.getComputedStyle(el);
    if (style.display === 'none' || style.visibility === 'hidden') return false;
    const rect = el.getBoundingClientRect();
    return rect.width > 0 && rect.height > 0;
  });
}

/**
 * Whitespace-normalised innerText of the first match among `selectors`.
 */
function normalizedTextInPage(selectors: string[]): string {
  for (const selector of selectors) {
    let el: Element | null;
    try {
      el = document.querySelector(selector);
    } catch {
      continue;
    }
    if (el) {
      const text = el instanceof HTMLElement ? el.innerText : el.textContent ?? '';
      return text.replace(/\s+/g, ' ').trim();
    }
  }
  return '';
}

function controlKindInPage(el: Element): ControlKind {
  const tag = el.tagName.toLowerCase();
  if (tag === 'select') return 'select';
  if (tag === 'button') return 'button';
  const type = (el.getAttribute('type') ?? 'text').toLowerCase();
  if (type === 'checkbox' || type === 'radio') return type;
  if (type === 'submit' || type === 'button' || type === 'reset' || type === 'image') return 'button';
  return 'text';
}

function indexesInBody(elements: Element[]): number[] {
  const all = Array.from(document.querySelectorAll('body *'));
  return elements.map((el) => all.indexOf(el)).filter((index) => index >= 0);
}

// ============================================
// PAGE HANDLE
// ============================================

export interface PlaywrightHandleOptions {
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  waitAfterNavigationMs: number;
}

export class PlaywrightPageHandle implements PageHandle {
  /** Parsed view of the page; dropped on navigation and interaction */
  private document: DomDocument | null = null;
  /** Normalised text per selector, for streaming reads */
  private readonly texts = new Map<string, string>();
  readonly interactions: InteractionDriver;

  constructor(
    readonly id: string,
    readonly page: Page,
    private readonly monitor: NetworkMonitor,
    private readonly options: PlaywrightHandleOptions
  ) {
    this.interactions = {
      click: (selector, clickOptions) => this.click(selector, clickOptions?.timeoutMs),
      typeText: (selector, text, typeOptions) => this.typeText(selector, text, typeOptions),
      autoScroll: (scrollOptions) => this.autoScroll(scrollOptions?.maxScrolls, scrollOptions?.delayMs),
      fillForm: (values, fillOptions) => this.fillForm(values, fillOptions),
    };
  }

  private invalidate(): void {
    this.document = null;
    this.texts.clear();
  }

  url(): string {
    const current = this.page.url();
    return current === 'about:blank' ? '' : current;
  }

  /**
   * Navigate; aborting `options.signal` stops the load by sending the tab to
   * about:blank.
   */
  async goto(url: string, options: GotoOptions = {}): Promise<NavigationOutcome> {
    this.invalidate();
    const { signal } = options;
    const interrupt = (): void => {
      this.page.goto('about:blank').catch((error: unknown) => {
        log.debug('Interrupting navigation failed', { tabId: this.id, error: String(error) });
      });
    };
    signal?.addEventListener('abort', interrupt, { once: true });

    let response: Response | null;
    try {
      signal?.throwIfAborted();
      response = await withRetry(
        () =>
          this.page.goto(url, {
            waitUntil: options.waitUntil ?? 'domcontentloaded',
            timeout: options.timeoutMs ?? this.options.navigationTimeoutMs,
          }),
        { maxAttempts: 2, signal }
      );
    } catch (error) {
      throw new NavigationError(url, error instanceof Error ? error.message : String(error), null, {
        cause: error,
      });
    } finally {
      signal?.removeEventListener('abort', interrupt);
    }

    if (this.options.waitAfterNavigationMs > 0) {
      await this.page.waitForTimeout(this.options.waitAfterNavigationMs);
    }

    const status = response?.status() ?? null;
    if (status !== null && status >= 400) {
      throw new NavigationError(url, `HTTP ${status}`, status);
    }
    return { url: this.page.url(), status, ok: true };
  }

  private async dom(): Promise<DomDocument> {
    if (this.document) return this.document;
    const [html, visibility] = await Promise.all([this.page.content(), this.page.evaluate(liveVisibility)]);
    this.document = new DomDocument(html, { visibility });
    return this.document;
  }

  /**
   * CSS is answered from the parsed document; `text=` and XPath go through
   * the browser's own engine and are mapped back to document positions.
   */
  private async matchIndexes(locator: string): Promise<number[]> {
    const dom = await this.dom();
    if (locatorKind(locator) === 'css') {
      return dom.matchIndexes(locator);
    }
    try {
      return await this.page.locator(locator).evaluateAll(indexesInBody);
    } catch (error) {
      log.debug('Locator evaluation failed', { tabId: this.id, locator, error: String(error) });
      return [];
    }
  }

  async evaluate(locator: string): Promise<ElementSnapshot[]> {
    const dom = await this.dom();
    return dom.snapshotsAt(await this.matchIndexes(locator));
  }

  async snapshot(max: number): Promise<ElementSnapshot[]> {
    return (await this.dom()).snapshot(max);
  }

  async readValue(locator: string, options?: ReadOptions): Promise<string | null> {
    const dom = await this.dom();
    return dom.readValueAt(await this.matchIndexes(locator), options);
  }

  async readAll(locator: string, limit: number, options?: ReadOptions): Promise<string[]> {
    const dom = await this.dom();
    return dom.readAllAt(dom.listIndexes(await this.matchIndexes(locator)), limit, options);
  }

  async readTextSlice(selector: string, offset: number, length: number): Promise<string> {
    let text = this.texts.get(selector);
    if (text === undefined) {
      const alternatives = selector
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
      text = await this.page.evaluate(normalizedTextInPage, alternatives);
      this.texts.set(selector, text);
    }
    return text.slice(offset, offset + length);
  }

  async collectBlocks(options: BlockOptions): Promise<ContentBlock[]> {
    return (await this.dom()).collectBlocks(options);
  }

  async extractTables(selector: string, rowLimit: number): Promise<RawTable[]> {
    return (await this.dom()).extractTables(selector, rowLimit);
  }

  async describeStructure(locator: string): Promise<StructureInfo | null> {
    const dom = await this.dom();
    return dom.describeStructure(await this.matchIndexes(locator));
  }

  async preview(maxSections: number): Promise<PagePreview> {
    return (await this.dom()).preview(maxSections);
  }

  async detectForms(): Promise<FormInfo[]> {
    return (await this.dom()).forms();
  }

  networkCalls(query?: NetworkQuery): NetworkCall[] {
    return this.monitor.list(query);
  }

  // ============================================
  // INTERACTIONS
  // ============================================

  private async click(selector: string, timeoutMs = this.options.actionTimeoutMs): Promise<void> {
    this.invalidate();
    await this.page.locator(selector).first().click({ timeout: timeoutMs });
  }

  private async typeText(
    selector: string,
    text: string,
    options: { clear?: boolean; pressEnter?: boolean; timeoutMs?: number } = {}
  ): Promise<void> {
    this.invalidate();
    const timeout = options.timeoutMs ?? this.options.actionTimeoutMs;
    const target = this.page.locator(selector).first();
    if (options.clear !== false) {
      await target.fill('', { timeout });
    }
    await target.pressSequentially(text, { timeout });
    if (options.pressEnter) {
      await target.press('Enter', { timeout });
    }
  }

  private async fillForm(values: Record<string, string>, options: FillFormOptions = {}): Promise<FillFormResult> {
    this.invalidate();
    const timeout = options.timeoutMs ?? this.options.actionTimeoutMs;
    const first = (selector: string) => this.page.locator(selector).first();
    const controls: FormControls = {
      inspect: async (selector) => {
        try {
          if ((await this.page.locator(selector).count()) === 0) return null;
          return await first(selector).evaluate(controlKindInPage);
        } catch (error) {
          log.debug('Field lookup failed', { tabId: this.id, locator: selector, error: String(error) });
          return null;
        }
      },
      fill: (selector, value) => first(selector).fill(value, { timeout }),
      setChecked: (selector, checked) => first(selector).setChecked(checked, { timeout }),
      selectOption: async (selector, value) => {
        await first(selector).selectOption(value, { timeout });
      },
      click: (selector) => first(selector).click({ timeout }),
    };
    return fillForm(controls, values, options);
  }

  /**
   * Scroll to the bottom until the page height stops growing twice in a row.
   */
  private async autoScroll(maxScrolls = 20, delayMs: number = TIMEOUTS.SCROLL_STEP): Promise<ScrollResult> {
    this.invalidate();
    const bodyHeight = () => this.page.evaluate(() => document.body.scrollHeight);

    let previousHeight = await bodyHeight();
    let unchanged = 0;

    for (let i = 0; i < Math.max(1, maxScrolls); i++) {
      await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await this.page.waitForTimeout(Math.max(100, delayMs));

      const currentHeight = await bodyHeight();
      if (currentHeight <= previousHeight) {
        unchanged += 1;
        if (unchanged >= 2) {
          return { scrollCount: i + 1, stoppedReason: 'no_new_content', finalHeight: currentHeight };
        }
      } else {
        unchanged = 0;
      }
      previousHeight = Math.max(previousHeight, currentHeight);
    }

    return { scrollCount: Math.max(1, maxScrolls), stoppedReason: 'max_scrolls_reached', finalHeight: previousHeight };
  }

  async closePage(): Promise<void> {
    this.invalidate();
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

// ============================================
// PROVIDER
// ============================================

export interface BrowserManagerOptions {
  browser: BrowserConfig;
  performance: PerformanceConfig;
  deviceProfile: DeviceProfile;
  stealth: StealthProvider;
  maxNetworkEvents: number;
}

function hostMatches(url: string, domain: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    const wanted = domain.toLowerCase();
    return host === wanted || host.endsWith(`.${wanted}`);
  } catch {
    return false;
  }
}

export class BrowserManager implements PageProvider {
  readonly engine = 'chromium';
  private browser: Browser | null = null;
  private contextPromise: Promise<BrowserContext> | null = null;
  private storageState: StorageState | undefined;
  private readonly handles = new Set<PlaywrightPageHandle>();

  constructor(private readonly options: BrowserManagerOptions) {}

  static getPlaywrightError(): string | null {
    return playwrightLoadError;
  }

  /**
   * Ensure Playwright is available, throwing a helpful error if not
   */
  private async ensurePlaywright(): Promise<typeof import('playwright')> {
    const pw = await tryLoadPlaywright();
    if (!pw) {
      throw new Error(
        'Playwright is not installed. ' +
          'Install it with: npm install playwright && npx playwright install chromium\n' +
          'Or set browser.engine to "static" to work from fetched HTML.'
      );
    }
    return pw;
  }

  private getContext(): Promise<BrowserContext> {
    if (!this.contextPromise) {
      this.contextPromise = this.createContext();
      this.contextPromise.catch(() => {
        this.contextPromise = null;
      });
    }
    return this.contextPromise;
  }

  private async createContext(): Promise<BrowserContext> {
    const { browser: browserConfig, deviceProfile } = this.options;

    if (!this.browser) {
      const pw = await this.ensurePlaywright();
      const started = Date.now();
      this.browser = await pw.chromium.launch({
        headless: browserConfig.headless,
        args: browserConfig.launch_args,
        executablePath: browserConfig.executable_path,
      });
      log.timed('Browser launched', started, { headless: browserConfig.headless });
    }

    const context = await this.browser.newContext({
      userAgent: deviceProfile.user_agent,
      viewport: deviceProfile.viewport,
      locale: deviceProfile.locale,
      timezoneId: deviceProfile.timezone_id,
      extraHTTPHeaders: deviceProfile.extra_http_headers,
      storageState: this.storageState,
    });

    const script = this.options.stealth.initScript();
    if (script) {
      await context.addInitScript(script);
    }
    return context;
  }

  private async installRouting(page: Page): Promise<void> {
    const { performance } = this.options;
    if (!performance.enable_request_blocking) return;

    const blockedTypes = new Set<string>(performance.block_resource_types);
    const blockedDomains = performance.block_ad_domains;

    await page.route('**/*', (route) => {
      const request = route.request();
      const blocked =
        blockedTypes.has(request.resourceType()) ||
        blockedDomains.some((domain) => hostMatches(request.url(), domain));
      const handled = blocked ? route.abort() : route.continue();
      return handled.catch((error: unknown) => {
        log.debug('Route handling failed', { url: request.url(), error: String(error) });
      });
    });
  }

  async open(id: string): Promise<PlaywrightPageHandle> {
    const context = await this.getContext();
    const page = await context.newPage();
    page.setDefaultTimeout(this.options.browser.default_timeout_ms);
    page.setDefaultNavigationTimeout(this.options.browser.navigation_timeout_ms);
    await this.installRouting(page);

    const monitor = new NetworkMonitor(this.options.maxNetworkEvents);
    monitor.attach(page);

    const handle = new PlaywrightPageHandle(id, page, monitor, {
      navigationTimeoutMs: this.options.browser.navigation_timeout_ms,
      actionTimeoutMs: this.options.browser.default_timeout_ms,
      waitAfterNavigationMs: this.options.performance.wait_after_navigation_ms,
    });
    this.handles.add(handle);
    log.debug('Opened tab', { tabId: id });
    return handle;
  }

  async close(handle: PageHandle): Promise<void> {
    if (handle instanceof PlaywrightPageHandle) {
      this.handles.delete(handle);
      await handle.closePage();
    }
  }

  async exportState(): Promise<SessionState> {
    if (!this.contextPromise) {
      return this.storageState ?? { cookies: [], origins: [] };
    }
    const state = await (await this.contextPromise).storageState();
    return { cookies: state.cookies, origins: state.origins };
  }

  /**
   * Load `state` into the live context without closing its tabs. Local
   * storage applies to contexts created later.
   */
  async restoreState(state: SessionState): Promise<void> {
    const restored = storageStateSchema.parse(state);
    this.storageState = restored;
    if (this.contextPromise) {
      const context = await this.contextPromise;
      await context.clearCookies();
      if (restored.cookies.length > 0) {
        await context.addCookies(restored.cookies);
      }
    }
    log.info('Session state restored', {
      cookies: restored.cookies.length,
      origins: restored.origins.length,
      openTabs: this.handles.size,
    });
  }

  async cookieHeader(url: string): Promise<string> {
    if (!this.contextPromise) return '';
    const cookies = await (await this.contextPromise).cookies(url);
    return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }

  private async closeContext(): Promise<void> {
    const pending = this.contextPromise;
    this.contextPromise = null;
    this.handles.clear();
    if (!pending) return;

    let context: BrowserContext;
    try {
      context = await pending;
    } catch (error) {
      log.debug('Context was never created', { error: String(error) });
      return;
    }
    await context.close();
  }

  async shutdown(): Promise<void> {
    await this.closeContext();
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
