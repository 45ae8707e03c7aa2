/**
 * Page provider contract.
 *
 * The resolver, extractors and executor only talk to pages through these
 * interfaces. Two implementations exist: Playwright (chromium) and a
 * cheerio-backed static provider that fetches HTML.
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
} from './index.js';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface GotoOptions {
  waitUntil?: WaitUntil;
  timeoutMs?: number;
  /** Abandons the navigation when aborted */
  signal?: AbortSignal;
}

export interface ReadOptions {
  /** Read this attribute instead of text */
  attribute?: string;
  maxLength?: number;
}

export interface BlockOptions {
  excludeSelectors: string[];
  limit: number;
}

export interface ScrollResult {
  scrollCount: number;
  stoppedReason: 'no_new_content' | 'max_scrolls_reached';
  finalHeight: number;
}

/**
 * Browser-only interaction surface.
 */
export interface InteractionDriver {
  click(selector: string, options?: { timeoutMs?: number }): Promise<void>;
  typeText(
    selector: string,
    text: string,
    options?: { clear?: boolean; pressEnter?: boolean; timeoutMs?: number }
  ): Promise<void>;
  autoScroll(options?: { maxScrolls?: number; delayMs?: number }): Promise<ScrollResult>;
  fillForm(values: Record<string, string>, options?: FillFormOptions): Promise<FillFormResult>;
}

export interface FillFormOptions {
  /** Limit field lookup to this form */
  formSelector?: string;
  submit?: boolean;
  timeoutMs?: number;
}

export interface FillFormResult {
  filledFields: string[];
  missingFields: string[];
  submitted: boolean;
}

export interface PageHandle {
  readonly id: string;

  /** Current URL, empty before the first navigation */
  url(): string;

  goto(url: string, options?: GotoOptions): Promise<NavigationOutcome>;

  /** Elements matching a locator, document order. Empty on no match or invalid locator. */
  evaluate(locator: string): Promise<ElementSnapshot[]>;

  /** First `max` elements under body, document order */
  snapshot(max: number): Promise<ElementSnapshot[]>;

  /** Value of the first visible match (text or attribute), null when nothing matches */
  readValue(locator: string, options?: ReadOptions): Promise<string | null>;

  readAll(locator: string, limit: number, options?: ReadOptions): Promise<string[]>;

  /**
   * Slice of the normalised text of the first node matching `selector`
   * (comma-separated alternatives tried in order).
   */
  readTextSlice(selector: string, offset: number, length: number): Promise<string>;

  collectBlocks(options: BlockOptions): Promise<ContentBlock[]>;

  extractTables(selector: string, rowLimit: number): Promise<RawTable[]>;

  describeStructure(locator: string): Promise<StructureInfo | null>;

  preview(maxSections: number): Promise<PagePreview>;

  detectForms(): Promise<FormInfo[]>;

  /** Recorded document/xhr/fetch traffic, oldest first */
  networkCalls(query?: NetworkQuery): NetworkCall[];

  readonly interactions?: InteractionDriver;
}

export type SessionState = Record<string, unknown>;

export interface PageProvider {
  readonly engine: 'chromium' | 'static';
  open(id: string): Promise<PageHandle>;
  close(handle: PageHandle): Promise<void>;
  exportState(): Promise<SessionState>;
  restoreState(state: SessionState): Promise<void>;
  /** Cookie header the engine would send to `url`, empty when none */
  cookieHeader(url: string): Promise<string>;
  shutdown(): Promise<void>;
}
