/**
 * Task Executor - JSON task in, JSON envelope out
 *
 * run() never throws. Every page-touching action acquires its tab from the
 * pool and releases it in `finally`. The task timeout aborts the in-flight
 * call through an AbortSignal: navigations and pool waits stop, resolver
 * cache writes are discarded. The envelope is returned once the call has
 * unwound and released its tab, or after a short grace period.
 */

import { z } from 'zod';
import {
  TaskTimeoutError,
  TaskValidationError,
  UnsupportedActionError,
  toTaskError,
  type TaskError,
} from '../types/errors.js';
import type { LogicalTarget } from '../types/index.js';
import type { InteractionDriver, PageHandle, PageProvider } from '../types/page.js';
import { applyOverrides } from '../utils/config-loader.js';
import type { AgentConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { siteKey } from '../utils/text.js';
import { TIMEOUTS, settleWithin } from '../utils/timeouts.js';
import { ContentExtractor, extractTables } from './content-extractor.js';
import { FieldParser, fieldSpecSchema } from './field-parser.js';
import type { FileDownloader } from './file-downloader.js';
import type { PagePool } from './page-pool.js';
import { DEFAULT_EXCLUDE_SELECTORS, filterPage } from './relevance-filter.js';
import type { SelectorCache } from './selector-cache.js';
import { SelectorResolver } from './selector-resolver.js';
import type { SessionManager } from './session-manager.js';
import { DEFAULT_STREAM_SELECTOR, extractWithBudget, pageTextSource } from './streaming-extractor.js';
import { TabOrchestrator } from './tab-orchestrator.js';

const log = logger.executor;

// ============================================
// TASK AND RESULT SHAPES
// ============================================

export const taskSchema = z.object({
  action: z.string().min(1),
  target: z.unknown().optional(),
  config_overrides: z.unknown().optional(),
});

export type Task = z.infer<typeof taskSchema>;

export type TaskResult =
  | { status: 'ok'; result: unknown }
  | { status: 'error'; error: TaskError; result?: unknown };

interface RunContext {
  config: AgentConfig;
  signal: AbortSignal;
}

/**
 * Carries the completed steps of a `steps` task alongside the failing step's error.
 */
class StepFailedError extends Error {
  constructor(
    readonly taskError: TaskError,
    readonly partial: unknown
  ) {
    super(taskError.message);
    this.name = 'StepFailedError';
  }
}

// ============================================
// TARGET SCHEMAS
// ============================================

const tabIdSchema = z.string().min(1).default('default');
const waitUntilSchema = z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']).default('domcontentloaded');

const pageTargetSchema = z.object({
  tab_id: tabIdSchema,
  url: z.string().url().optional(),
  wait_until: waitUntilSchema,
});

type PageTarget = z.infer<typeof pageTargetSchema>;

const fieldsSchema = z.union([
  z.array(z.string().min(1)).min(1),
  z
    .record(z.union([fieldSpecSchema, z.string().min(1), z.null()]))
    .refine((fields) => Object.keys(fields).length > 0, 'At least one field is required'),
]);

const locateFields = {
  field: z.string().min(1).optional(),
  logical_name: z.string().min(1).optional(),
  selector: z.string().min(1).optional(),
  text_hint: z.string().optional(),
  semantic_hint: z.string().optional(),
};

type LocateTarget = {
  field?: string;
  logical_name?: string;
  selector?: string;
  text_hint?: string;
  semantic_hint?: string;
};

const hasLocator = (target: LocateTarget) => Boolean(target.field || target.logical_name || target.selector);
const LOCATOR_REQUIRED = 'One of field, logical_name or selector is required';

const schemas = {
  navigate: z.object({ tab_id: tabIdSchema, url: z.string().url(), wait_until: waitUntilSchema }),
  extract: pageTargetSchema.extend({ fields: fieldsSchema }),
  resolve: pageTargetSchema.extend(locateFields).refine(hasLocator, LOCATOR_REQUIRED),
  capture_structure: pageTargetSchema.extend(locateFields).refine(hasLocator, LOCATOR_REQUIRED),
  extract_tables: pageTargetSchema.extend({ selector: z.string().min(1).default('table') }),
  preview: pageTargetSchema.extend({ max_sections: z.number().int().min(1).max(100).default(10) }),
  relevance_filter: pageTargetSchema.extend({
    keywords: z.array(z.string()).default([]),
    min_score: z.number().min(0).max(1).default(0.6),
    max_items: z.number().int().min(1).max(1000).default(25),
    exclude_selectors: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE_SELECTORS),
  }),
  stream_extract: pageTargetSchema.extend({
    max_tokens: z.number().int().positive().default(4000),
    chars_per_token: z.number().positive().default(4.0),
    selector: z.string().min(1).default(DEFAULT_STREAM_SELECTOR),
  }),
  network_calls: z.object({
    tab_id: tabIdSchema,
    limit: z.number().int().positive().default(50),
    resource_types: z.array(z.string()).optional(),
    url_contains: z.string().optional(),
  }),
  parallel_extract: z.object({
    urls: z.array(z.string().url()).min(1),
    fields: fieldsSchema,
    max_concurrent: z.number().int().min(1).max(32).default(2),
    wait_until: waitUntilSchema,
  }),
  save_session: z.object({ name: z.string().min(1).default('default') }),
  load_session: z.object({ name: z.string().min(1).default('default') }),
  invalidate_selector: z
    .object({
      url: z.string().min(1),
      field: z.string().min(1).optional(),
      logical_name: z.string().min(1).optional(),
    })
    .refine((target) => Boolean(target.field || target.logical_name), 'One of field or logical_name is required'),
  close_tab: z.object({ tab_id: z.string().min(1) }),
  click: pageTargetSchema.extend({ selector: z.string().min(1) }),
  type_text: pageTargetSchema.extend({
    selector: z.string().min(1),
    text: z.string(),
    clear: z.boolean().default(true),
    press_enter: z.boolean().default(false),
  }),
  auto_scroll: pageTargetSchema.extend({
    max_scrolls: z.number().int().min(1).max(200).default(20),
    delay_ms: z.number().int().min(0).max(10000).default(300),
  }),
  detect_forms: pageTargetSchema,
  fill_form: pageTargetSchema.extend({
    field_values: z
      .record(z.union([z.string(), z.number(), z.boolean()]).transform(String))
      .refine((values) => Object.keys(values).length > 0, 'At least one field value is required'),
    form_selector: z.string().min(1).optional(),
    submit: z.boolean().default(false),
  }),
  download_file: pageTargetSchema
    .extend({
      selector: z.string().min(1).optional(),
      filename: z.string().min(1).optional(),
      subdirectory: z.string().min(1).optional(),
    })
    .refine((target) => Boolean(target.url || target.selector), 'One of url or selector is required'),
  steps: z.object({ steps: z.array(taskSchema).min(1).max(100) }),
} satisfies Record<string, z.ZodTypeAny>;

export type ActionName = keyof typeof schemas;

function isActionName(action: string): action is ActionName {
  return Object.prototype.hasOwnProperty.call(schemas, action);
}

export const ACTIONS: ActionName[] = Object.keys(schemas).filter(isActionName);

function parseTarget<S extends z.ZodTypeAny>(action: string, schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'target'}: ${issue.message}`);
    throw new TaskValidationError(`Invalid target for "${action}"`, issues);
  }
  return result.data;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Task aborted');
}

// ============================================
// EXECUTOR
// ============================================

export interface TaskExecutorDeps {
  config: AgentConfig;
  provider: PageProvider;
  pool: PagePool;
  cache: SelectorCache;
  sessions: SessionManager;
  downloader: FileDownloader;
  parser?: FieldParser;
}

export class TaskExecutor {
  private readonly config: AgentConfig;
  private readonly provider: PageProvider;
  private readonly pool: PagePool;
  private readonly cache: SelectorCache;
  private readonly sessions: SessionManager;
  private readonly downloader: FileDownloader;
  private readonly parser: FieldParser;
  private readonly resolver: SelectorResolver;
  private readonly extractor: ContentExtractor;
  private readonly orchestrator: TabOrchestrator;

  constructor(deps: TaskExecutorDeps) {
    this.config = deps.config;
    this.provider = deps.provider;
    this.pool = deps.pool;
    this.cache = deps.cache;
    this.sessions = deps.sessions;
    this.downloader = deps.downloader;
    this.parser = deps.parser ?? new FieldParser();
    this.resolver = new SelectorResolver(deps.cache, deps.config.self_healing);
    this.extractor = new ContentExtractor(this.resolver);
    this.orchestrator = new TabOrchestrator(deps.pool);
  }

  /**
   * Execute one task. Always resolves with an envelope.
   */
  async run(input: unknown): Promise<TaskResult> {
    const started = Date.now();
    let action = 'unknown';

    try {
      const parsed = taskSchema.safeParse(input);
      if (!parsed.success) {
        throw new TaskValidationError(
          'Task must be an object with a non-empty "action"',
          parsed.error.issues.map((issue) => `${issue.path.join('.') || 'task'}: ${issue.message}`)
        );
      }
      const task = parsed.data;
      action = task.action;

      const config = applyOverrides(this.config, task.config_overrides);
      const result = await this.runWithTimeout(task, config);
      log.timed('Task completed', started, { action });
      return { status: 'ok', result };
    } catch (error) {
      if (error instanceof StepFailedError) {
        log.warn('Task step failed', { action, kind: error.taskError.kind, message: error.taskError.message });
        return { status: 'error', error: error.taskError, result: error.partial };
      }
      const taskError = toTaskError(error);
      log.warn('Task failed', { action, kind: taskError.kind, message: taskError.message });
      return { status: 'error', error: taskError };
    }
  }

  private async runWithTimeout(task: Task, config: AgentConfig): Promise<unknown> {
    const controller = new AbortController();
    const timeoutMs = config.task.timeout_ms;
    const timer = setTimeout(() => controller.abort(new TaskTimeoutError(task.action, timeoutMs)), timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true });
    });
    const work = this.dispatch(task, { config, signal: controller.signal });

    try {
      return await Promise.race([work, aborted]);
    } catch (error) {
      if (controller.signal.aborted) {
        const settled = await settleWithin(work, TIMEOUTS.ABORT_GRACE);
        if (!settled) {
          log.warn('Aborted task still running after grace period', {
            action: task.action,
            graceMs: TIMEOUTS.ABORT_GRACE,
          });
        }
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async dispatch(task: Task, ctx: RunContext): Promise<unknown> {
    const { action } = task;
    if (!isActionName(action)) {
      throw new UnsupportedActionError(action);
    }

    switch (action) {
      case 'navigate': {
        const target = parseTarget(action, schemas.navigate, task.target);
        return this.withPage(target.tab_id, ctx, async (page) => {
          const outcome = await page.goto(target.url, {
            waitUntil: target.wait_until,
            timeoutMs: ctx.config.browser.navigation_timeout_ms,
            signal: ctx.signal,
          });
          return { tabId: target.tab_id, ...outcome };
        });
      }

      case 'extract': {
        const target = parseTarget(action, schemas.extract, task.target);
        return this.onPage(target, ctx, async (page) => this.extractFields(page, target.fields, ctx));
      }

      case 'resolve': {
        const target = parseTarget(action, schemas.resolve, task.target);
        return this.onPage(target, ctx, async (page) => {
          const logical = this.logicalTarget(target);
          const candidate = await this.resolver.resolve(page, logical, {
            signal: ctx.signal,
            config: ctx.config.self_healing,
          });
          return { logicalName: logical.logicalName, ...candidate };
        });
      }

      case 'capture_structure': {
        const target = parseTarget(action, schemas.capture_structure, task.target);
        return this.onPage(target, ctx, async (page) => {
          const logical = this.logicalTarget(target);
          const candidate = await this.resolver.resolve(page, logical, {
            signal: ctx.signal,
            config: ctx.config.self_healing,
          });
          const structure = await page.describeStructure(candidate.locator);
          return {
            logicalName: logical.logicalName,
            strategy: candidate.strategy,
            confidence: candidate.confidence,
            locator: candidate.locator,
            structure,
          };
        });
      }

      case 'extract_tables': {
        const target = parseTarget(action, schemas.extract_tables, task.target);
        return this.onPage(target, ctx, async (page) => {
          const tables = await extractTables(page, target.selector, ctx.config.extraction.max_table_rows);
          return { selector: target.selector, count: tables.length, tables };
        });
      }

      case 'preview': {
        const target = parseTarget(action, schemas.preview, task.target);
        return this.onPage(target, ctx, (page) => page.preview(target.max_sections));
      }

      case 'relevance_filter': {
        const target = parseTarget(action, schemas.relevance_filter, task.target);
        return this.onPage(target, ctx, async (page) => {
          const items = await filterPage(page, target.keywords, {
            minScore: target.min_score,
            maxItems: target.max_items,
            excludeSelectors: target.exclude_selectors,
          });
          return { count: items.length, items };
        });
      }

      case 'stream_extract': {
        const target = parseTarget(action, schemas.stream_extract, task.target);
        return this.onPage(target, ctx, (page) =>
          extractWithBudget(pageTextSource(page, target.selector), {
            maxTokens: target.max_tokens,
            charsPerToken: target.chars_per_token,
            chunkChars: ctx.config.extraction.stream_chunk_chars,
            maxChunks: ctx.config.extraction.max_stream_chunks,
          })
        );
      }

      case 'network_calls': {
        const target = parseTarget(action, schemas.network_calls, task.target);
        if (!this.pool.has(target.tab_id)) {
          return { tabId: target.tab_id, count: 0, calls: [] };
        }
        return this.withPage(target.tab_id, ctx, async (page) => {
          const calls = page.networkCalls({
            limit: target.limit,
            resourceTypes: target.resource_types,
            urlContains: target.url_contains,
          });
          return { tabId: target.tab_id, count: calls.length, calls };
        });
      }

      case 'parallel_extract': {
        const target = parseTarget(action, schemas.parallel_extract, task.target);
        const outcomes = await this.orchestrator.runParallel(
          target.urls,
          target.max_concurrent,
          async (page, url) => {
            await page.goto(url, {
              waitUntil: target.wait_until,
              timeoutMs: ctx.config.browser.navigation_timeout_ms,
              signal: ctx.signal,
            });
            return this.extractFields(page, target.fields, ctx);
          },
          { signal: ctx.signal }
        );
        return {
          count: outcomes.length,
          succeeded: outcomes.filter((outcome) => outcome.status === 'ok').length,
          results: outcomes,
        };
      }

      case 'save_session': {
        const target = parseTarget(action, schemas.save_session, task.target);
        const state = await this.provider.exportState();
        return this.sessions.save(target.name, state);
      }

      case 'load_session': {
        const target = parseTarget(action, schemas.load_session, task.target);
        const state = await this.sessions.load(target.name);
        if (!state) {
          return { name: target.name, loaded: false };
        }
        // Busy tabs belong to other tasks; only idle ones are reset.
        const closedTabs = await this.pool.closeIdle();
        await this.provider.restoreState(state);
        return { name: target.name, loaded: true, closedTabs };
      }

      case 'invalidate_selector': {
        const target = parseTarget(action, schemas.invalidate_selector, task.target);
        const site = siteKey(target.url);
        const logicalName = target.logical_name ?? this.parser.canonicalName(target.field ?? '');
        return { site, logicalName, removed: this.cache.invalidate(site, logicalName) };
      }

      case 'close_tab': {
        const target = parseTarget(action, schemas.close_tab, task.target);
        return { tabId: target.tab_id, closed: await this.pool.closeTab(target.tab_id) };
      }

      case 'click': {
        const target = parseTarget(action, schemas.click, task.target);
        return this.onPage(target, ctx, async (page) => {
          await this.interactionsOf(page, action).click(target.selector, {
            timeoutMs: ctx.config.browser.default_timeout_ms,
          });
          return { tabId: target.tab_id, selector: target.selector, url: page.url() };
        });
      }

      case 'type_text': {
        const target = parseTarget(action, schemas.type_text, task.target);
        return this.onPage(target, ctx, async (page) => {
          await this.interactionsOf(page, action).typeText(target.selector, target.text, {
            clear: target.clear,
            pressEnter: target.press_enter,
            timeoutMs: ctx.config.browser.default_timeout_ms,
          });
          return { tabId: target.tab_id, selector: target.selector, typed: target.text.length };
        });
      }

      case 'auto_scroll': {
        const target = parseTarget(action, schemas.auto_scroll, task.target);
        return this.onPage(target, ctx, (page) =>
          this.interactionsOf(page, action).autoScroll({
            maxScrolls: target.max_scrolls,
            delayMs: target.delay_ms,
          })
        );
      }

      case 'detect_forms': {
        const target = parseTarget(action, schemas.detect_forms, task.target);
        return this.onPage(target, ctx, async (page) => {
          const forms = await page.detectForms();
          return { url: page.url(), count: forms.length, forms };
        });
      }

      case 'fill_form': {
        const target = parseTarget(action, schemas.fill_form, task.target);
        return this.onPage(target, ctx, async (page) => {
          const filled = await this.interactionsOf(page, action).fillForm(target.field_values, {
            formSelector: target.form_selector,
            submit: target.submit,
            timeoutMs: ctx.config.browser.default_timeout_ms,
          });
          return { tabId: target.tab_id, url: page.url(), ...filled };
        });
      }

      case 'download_file': {
        const target = parseTarget(action, schemas.download_file, task.target);
        const options = {
          filename: target.filename,
          subdirectory: target.subdirectory,
          signal: ctx.signal,
        };
        if (!target.selector) {
          return this.downloader.download(target.url ?? '', options);
        }
        const selector = target.selector;
        const request = await this.onPage(target, ctx, async (page) => {
          const link =
            (await page.readValue(selector, { attribute: 'href' })) ??
            (await page.readValue(selector, { attribute: 'src' }));
          if (!link) {
            throw new TaskValidationError(`No href or src found for "${selector}"`);
          }
          const referer = page.url();
          const url = new URL(link, referer || undefined).toString();
          const cookie = await this.provider.cookieHeader(url);
          const headers: Record<string, string> = referer ? { Referer: referer } : {};
          if (cookie) headers.Cookie = cookie;
          return { url, headers };
        });
        return this.downloader.download(request.url, { ...options, headers: request.headers });
      }

      case 'steps': {
        const target = parseTarget(action, schemas.steps, task.target);
        return this.runSteps(target.steps, ctx);
      }
    }
  }

  /**
   * Run sub-tasks in order under the parent's timeout. The first failure
   * stops the run.
   */
  private async runSteps(steps: Task[], ctx: RunContext): Promise<unknown> {
    const completed: Array<{ action: string; result: unknown }> = [];

    for (const step of steps) {
      if (ctx.signal.aborted) throw abortReason(ctx.signal);
      try {
        const config = applyOverrides(ctx.config, step.config_overrides);
        const result = await this.dispatch(step, { config, signal: ctx.signal });
        completed.push({ action: step.action, result });
      } catch (error) {
        if (ctx.signal.aborted) throw abortReason(ctx.signal);
        const taskError = error instanceof StepFailedError ? error.taskError : toTaskError(error);
        throw new StepFailedError(taskError, {
          steps: completed,
          failedStep: { index: completed.length, action: step.action },
        });
      }
    }
    return { steps: completed };
  }

  private async extractFields(
    page: PageHandle,
    fields: z.infer<typeof fieldsSchema>,
    ctx: RunContext
  ): Promise<unknown> {
    const parsed = this.parser.parseQuery(fields);
    const result = await this.extractor.extract(page, parsed, {
      limits: ctx.config.extraction,
      selfHealing: ctx.config.self_healing,
      signal: ctx.signal,
    });
    return { url: page.url(), ...result };
  }

  private logicalTarget(target: LocateTarget): LogicalTarget {
    const parsed = target.field ? this.parser.parse(target.field) : null;
    return Object.freeze({
      logicalName: target.logical_name ?? parsed?.logicalName ?? 'target',
      selectorHint: target.selector,
      textHint: target.text_hint ?? parsed?.textHint,
      semanticHint: target.semantic_hint ?? parsed?.semanticHint,
    });
  }

  private interactionsOf(page: PageHandle, action: string): InteractionDriver {
    if (!page.interactions) {
      throw new UnsupportedActionError(action, 'requires the chromium engine');
    }
    return page.interactions;
  }

  /**
   * Acquire the target's tab, navigate first when the target names a URL,
   * run `fn`, release.
   */
  private onPage<T>(target: PageTarget, ctx: RunContext, fn: (page: PageHandle) => Promise<T>): Promise<T> {
    return this.withPage(target.tab_id, ctx, async (page) => {
      if (target.url) {
        await page.goto(target.url, {
          waitUntil: target.wait_until,
          timeoutMs: ctx.config.browser.navigation_timeout_ms,
          signal: ctx.signal,
        });
      }
      return fn(page);
    });
  }

  private async withPage<T>(tabId: string, ctx: RunContext, fn: (page: PageHandle) => Promise<T>): Promise<T> {
    const page = await this.pool.acquire(tabId, { signal: ctx.signal });
    try {
      return await fn(page);
    } finally {
      this.pool.release(tabId);
    }
  }
}
