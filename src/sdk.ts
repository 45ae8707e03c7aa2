/**
 * mendscrape SDK
 *
 * Programmatic entry point: builds the page provider, page pool, selector
 * cache and session store from a configuration and runs JSON tasks against
 * them.
 *
 * Usage:
 * ```typescript
 * import { createAgent } from 'mendscrape';
 *
 * const agent = await createAgent({ config: { browser: { engine: 'static' } } });
 * const result = await agent.run({
 *   action: 'extract',
 *   target: { url: 'https://shop.example/item/1', fields: ['product_price', 'customer_rating'] },
 * });
 * await agent.cleanup();
 * ```
 */

import path from 'path';
import { BrowserManager } from './core/browser-manager.js';
import { FileDownloader, type FileFetcher } from './core/file-downloader.js';
import { PagePool } from './core/page-pool.js';
import { SelectorCache } from './core/selector-cache.js';
import { SessionManager } from './core/session-manager.js';
import { StaticPageProvider, type HtmlFetcher } from './core/static-page-provider.js';
import { StealthProvider } from './core/stealth.js';
import { TaskExecutor, type TaskResult } from './core/task-executor.js';
import type { PageProvider } from './types/page.js';
import { loadConfig, parseConfig } from './utils/config-loader.js';
import type { AgentConfig, AgentConfigInput } from './utils/config-schemas.js';
import { configureLogger, logger } from './utils/logger.js';

export type { TaskResult, Task, ActionName } from './core/task-executor.js';
export { ACTIONS, TaskExecutor } from './core/task-executor.js';
export type { AgentConfig, AgentConfigInput } from './utils/config-schemas.js';
export type { PageHandle, PageProvider, SessionState } from './types/page.js';
export type {
  LogicalTarget,
  LocatorCandidate,
  StrategyTag,
  ExtractionResult,
  StreamChunk,
  ContentBlock,
  ScoredBlock,
} from './types/index.js';
export type { TaskError, ErrorKind } from './types/errors.js';

export { FieldParser } from './core/field-parser.js';
export { SelectorResolver } from './core/selector-resolver.js';
export { SelectorCache } from './core/selector-cache.js';
export { filterBlocks } from './core/relevance-filter.js';
export { stream, pageTextSource } from './core/streaming-extractor.js';
export { PagePool } from './core/page-pool.js';
export { TabOrchestrator } from './core/tab-orchestrator.js';
export { FileDownloader } from './core/file-downloader.js';
export type { DownloadResult, FileFetcher } from './core/file-downloader.js';
export type { FormInfo, FormField } from './types/index.js';
export { StaticPageProvider, BrowserManager, SessionManager };

const log = logger.create('Agent');

export interface CreateAgentOptions {
  /** Inline configuration; when omitted the config file and environment are read */
  config?: AgentConfigInput;
  configPath?: string;
  /** Base for relative config, cache and session paths (default: process.cwd()) */
  cwd?: string;
  /** Page provider to use instead of the one `browser.engine` selects */
  provider?: PageProvider;
  /** HTML fetcher for the static engine */
  fetcher?: HtmlFetcher;
  /** Fetcher for `download_file` */
  fileFetcher?: FileFetcher;
}

/**
 * Provider for the configured engine.
 */
export function createProvider(config: AgentConfig, fetcher?: HtmlFetcher): PageProvider {
  if (config.browser.engine === 'static') {
    return new StaticPageProvider({
      fetcher,
      userAgent: config.device_profile.user_agent,
      extraHeaders: config.device_profile.extra_http_headers,
      navigationTimeoutMs: config.browser.navigation_timeout_ms,
      maxNetworkEvents: config.network.max_events,
    });
  }
  return new BrowserManager({
    browser: config.browser,
    performance: config.performance,
    deviceProfile: config.device_profile,
    stealth: new StealthProvider(config.stealth),
    maxNetworkEvents: config.network.max_events,
  });
}

export class MendscrapeAgent {
  readonly pool: PagePool;
  readonly cache: SelectorCache;
  readonly sessions: SessionManager;
  readonly downloader: FileDownloader;
  readonly executor: TaskExecutor;

  constructor(
    readonly config: AgentConfig,
    readonly provider: PageProvider,
    cwd: string = process.cwd(),
    fileFetcher?: FileFetcher
  ) {
    this.pool = new PagePool(provider, {
      maxTabs: config.browser.max_tabs,
      acquireTimeoutMs: config.browser.acquire_timeout_ms,
    });
    this.cache = new SelectorCache({
      filePath: path.resolve(cwd, config.self_healing.cache_file),
      ttlHours: config.self_healing.cache_ttl_hours,
    });
    this.sessions = new SessionManager(path.resolve(cwd, config.sessions.directory));
    this.downloader = new FileDownloader({
      directory: path.resolve(cwd, config.downloads.directory),
      maxBytes: config.downloads.max_bytes,
      timeoutMs: config.downloads.timeout_ms,
      allowPrivateHosts: config.downloads.allow_private_hosts,
      fetcher: fileFetcher,
    });
    this.executor = new TaskExecutor({
      config,
      provider,
      pool: this.pool,
      cache: this.cache,
      sessions: this.sessions,
      downloader: this.downloader,
    });
  }

  async initialize(): Promise<void> {
    await this.cache.load();
    log.info('Agent ready', { engine: this.provider.engine, maxTabs: this.config.browser.max_tabs });
  }

  run(task: unknown): Promise<TaskResult> {
    return this.executor.run(task);
  }

  /**
   * Close every page, stop the provider and write pending cache changes.
   */
  async cleanup(): Promise<void> {
    try {
      await this.pool.closeAll();
      await this.provider.shutdown();
    } finally {
      await this.cache.flush();
    }
  }
}

export async function createAgent(options: CreateAgentOptions = {}): Promise<MendscrapeAgent> {
  const cwd = options.cwd ?? process.cwd();
  const config = options.config
    ? parseConfig(options.config, 'options.config')
    : loadConfig({ configPath: options.configPath, cwd }).config;

  configureLogger(config.log);

  const provider = options.provider ?? createProvider(config, options.fetcher);
  const agent = new MendscrapeAgent(config, provider, cwd, options.fileFetcher);
  await agent.initialize();
  return agent;
}
