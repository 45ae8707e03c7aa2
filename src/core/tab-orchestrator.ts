/**
 * Tab Orchestrator - bounded-parallel work across URLs
 */

import { toTaskError, type TaskError } from '../types/errors.js';
import type { PageHandle } from '../types/page.js';
import { logger } from '../utils/logger.js';
import type { PagePool } from './page-pool.js';

const log = logger.orchestrator;

export type ParallelWork<T> = (page: PageHandle, url: string, index: number) => Promise<T>;

interface OutcomeBase {
  index: number;
  url: string;
  tabId: string;
}

export type ParallelOutcome<T> =
  | (OutcomeBase & { status: 'ok'; result: T })
  | (OutcomeBase & { status: 'error'; error: TaskError });

export interface RunParallelOptions {
  signal?: AbortSignal;
}

export function parallelTabId(index: number): string {
  return `parallel_${index}`;
}

export class TabOrchestrator {
  constructor(private readonly pool: PagePool) {}

  /**
   * Run `work` once per URL with at most `maxConcurrent` units in flight.
   * A failing unit never cancels its siblings; the result holds exactly one
   * outcome per URL, in input order.
   */
  async runParallel<T>(
    urls: readonly string[],
    maxConcurrent: number,
    work: ParallelWork<T>,
    options: RunParallelOptions = {}
  ): Promise<Array<ParallelOutcome<T>>> {
    const limit = Math.max(1, Math.trunc(maxConcurrent));
    const outcomes: Array<ParallelOutcome<T> | undefined> = new Array(urls.length);
    const inFlight = new Set<Promise<void>>();

    log.info('Parallel run started', { urls: urls.length, maxConcurrent: limit });

    for (let index = 0; index < urls.length; index++) {
      if (inFlight.size >= limit) {
        await Promise.race(inFlight);
      }
      const url = urls[index];
      const unit: Promise<void> = this.runUnit(url, index, work, options.signal)
        .then((outcome) => {
          outcomes[index] = outcome;
        })
        .finally(() => {
          inFlight.delete(unit);
        });
      inFlight.add(unit);
    }

    await Promise.all(inFlight);

    const results = outcomes.filter((outcome): outcome is ParallelOutcome<T> => outcome !== undefined);
    log.info('Parallel run finished', {
      ok: results.filter((outcome) => outcome.status === 'ok').length,
      failed: results.filter((outcome) => outcome.status === 'error').length,
    });
    return results;
  }

  private async runUnit<T>(
    url: string,
    index: number,
    work: ParallelWork<T>,
    signal: AbortSignal | undefined
  ): Promise<ParallelOutcome<T>> {
    const tabId = parallelTabId(index);
    let acquired = false;
    try {
      const page = await this.pool.acquire(tabId, { signal });
      acquired = true;
      const result = await work(page, url, index);
      return { index, url, tabId, status: 'ok', result };
    } catch (error) {
      log.warn('Parallel unit failed', { url, tabId, error: error instanceof Error ? error.message : String(error) });
      return { index, url, tabId, status: 'error', error: toTaskError(error) };
    } finally {
      if (acquired) this.pool.release(tabId);
    }
  }
}
