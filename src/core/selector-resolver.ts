/**
 * Selector Resolver - self-healing locator resolution
 *
 * Walks the enabled strategies in fixed order (direct, cached, text,
 * semantic) and returns the first verified candidate. A win is written back
 * to the selector cache so the next call on the same site starts at the
 * cached strategy. Strategy errors and timeouts fall through to the next
 * strategy; only total exhaustion surfaces, as a ResolutionFailure.
 */

import type { ElementSnapshot, LocatorCandidate, LogicalTarget, StrategyTag } from '../types/index.js';
import { STRATEGY_ORDER } from '../types/index.js';
import { ResolutionFailure } from '../types/errors.js';
import type { PageHandle } from '../types/page.js';
import type { SelfHealingConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { siteKey } from '../utils/text.js';
import { withTimeout } from '../utils/timeouts.js';
import { STRATEGIES, type ResolutionStrategy, type StrategyContext } from './resolution-strategies.js';
import type { SelectorCache } from './selector-cache.js';

const log = logger.resolver;

/** Ranked candidates verified per strategy */
const VERIFY_LIMIT = 3;

const UNIQUE_STRATEGIES: ReadonlySet<StrategyTag> = new Set(['text', 'semantic']);

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Per-call settings; defaults to the resolver's configuration */
  config?: SelfHealingConfig;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Resolution aborted');
}

/**
 * Order candidates: confidence desc, then distance in DOM depth from the
 * previously cached node, then document order (input order).
 */
export function rankCandidates(
  candidates: LocatorCandidate[],
  referenceDepth: number | undefined
): LocatorCandidate[] {
  const depthDelta = (c: LocatorCandidate) =>
    referenceDepth === undefined || c.depth === undefined ? 0 : Math.abs(c.depth - referenceDepth);

  const best = new Map<string, { candidate: LocatorCandidate; order: number }>();
  candidates.forEach((c, order) => {
    const existing = best.get(c.locator);
    if (!existing || c.confidence > existing.candidate.confidence) {
      best.set(c.locator, { candidate: c, order: existing?.order ?? order });
    }
  });

  return [...best.values()]
    .sort(
      (a, b) =>
        b.candidate.confidence - a.candidate.confidence ||
        depthDelta(a.candidate) - depthDelta(b.candidate) ||
        a.order - b.order
    )
    .map((entry) => entry.candidate);
}

export class SelectorResolver {
  constructor(
    private readonly cache: SelectorCache,
    private readonly config: SelfHealingConfig
  ) {}

  /**
   * Strategies that run for the given settings. With self-healing off only
   * the direct strategy is used.
   */
  strategiesFor(config: SelfHealingConfig): ResolutionStrategy[] {
    if (!config.enabled) return [STRATEGIES.direct];
    return STRATEGY_ORDER.filter((tag) => config.strategies.includes(tag)).map((tag) => STRATEGIES[tag]);
  }

  async resolve(page: PageHandle, target: LogicalTarget, options: ResolveOptions = {}): Promise<LocatorCandidate> {
    const config = options.config ?? this.config;
    const { signal } = options;
    const site = siteKey(page.url());
    const attempted: StrategyTag[] = [];

    let elements: Promise<ElementSnapshot[]> | null = null;
    const context: StrategyContext = {
      page,
      target,
      site,
      cache: this.cache,
      config,
      snapshot: () => {
        elements ??= page.snapshot(config.max_candidates);
        return elements;
      },
    };

    const previous = this.cache.peek(site, target.logicalName);
    const referenceDepth = previous?.candidate.depth;

    for (const strategy of this.strategiesFor(config)) {
      if (signal?.aborted) throw abortReason(signal);
      attempted.push(strategy.tag);

      let winner: LocatorCandidate | null;
      try {
        winner = await withTimeout(
          this.attemptStrategy(strategy, context, referenceDepth),
          config.timeout_ms,
          `${strategy.tag} strategy for ${target.logicalName}`
        );
      } catch (error) {
        log.debug('Strategy failed, falling through', {
          strategy: strategy.tag,
          logicalName: target.logicalName,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (!winner) continue;

      if (signal?.aborted) {
        log.debug('Resolution aborted, discarding cache write', { logicalName: target.logicalName });
        throw abortReason(signal);
      }

      this.remember(site, target.logicalName, winner, config);
      log.debug('Resolved', {
        site,
        logicalName: target.logicalName,
        strategy: winner.strategy,
        locator: winner.locator,
        confidence: winner.confidence,
      });
      return winner;
    }

    throw new ResolutionFailure(target.logicalName, attempted);
  }

  private async attemptStrategy(
    strategy: ResolutionStrategy,
    context: StrategyContext,
    referenceDepth: number | undefined
  ): Promise<LocatorCandidate | null> {
    const proposed = await strategy.attempt(context);
    if (proposed.length === 0) return null;

    if (strategy.tag === 'cached' && !context.config.reverify_cached) {
      return proposed[0];
    }

    for (const candidate of rankCandidates(proposed, referenceDepth).slice(0, VERIFY_LIMIT)) {
      const depth = await this.verify(context.page, candidate);
      if (depth !== null) {
        return Object.freeze({ ...candidate, depth });
      }
    }
    return null;
  }

  /**
   * Depth of the first visible match, or null when nothing visible matches.
   * Text and semantic candidates name one element, so their locator must
   * match exactly one.
   */
  private async verify(page: PageHandle, candidate: LocatorCandidate): Promise<number | null> {
    const matches = await page.evaluate(candidate.locator);
    if (UNIQUE_STRATEGIES.has(candidate.strategy) && matches.length !== 1) {
      log.debug('Candidate locator is not unique', { locator: candidate.locator, matches: matches.length });
      return null;
    }
    const visible = matches.find((el) => el.visible);
    return visible ? visible.depth : null;
  }

  /**
   * Replace the cache entry. A cached win keeps the stored candidate and
   * bumps its hit count.
   */
  private remember(site: string, logicalName: string, winner: LocatorCandidate, config: SelfHealingConfig): void {
    if (winner.strategy === 'cached') {
      const entry = this.cache.getEntry(site, logicalName, config.cache_ttl_hours);
      if (entry) {
        this.cache.put(site, logicalName, { ...entry.candidate, depth: winner.depth }, entry.hits + 1);
        return;
      }
    }
    this.cache.put(site, logicalName, winner);
  }
}
