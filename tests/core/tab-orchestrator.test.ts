import { describe, it, expect } from 'vitest';
import { PagePool } from '../../src/core/page-pool.js';
import { StaticPageProvider } from '../../src/core/static-page-provider.js';
import { parallelTabId, TabOrchestrator } from '../../src/core/tab-orchestrator.js';
import { NavigationError } from '../../src/types/errors.js';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function createOrchestrator(maxTabs = 2) {
  const pool = new PagePool(new StaticPageProvider(), { maxTabs, acquireTimeoutMs: 5000 });
  return { pool, orchestrator: new TabOrchestrator(pool) };
}

const URLS = ['https://a.test/', 'https://b.test/', 'https://c.test/', 'https://d.test/', 'https://e.test/'];

describe('TabOrchestrator', () => {
  it('should name parallel tabs by index', () => {
    expect(parallelTabId(0)).toBe('parallel_0');
    expect(parallelTabId(12)).toBe('parallel_12');
  });

  it('should keep at most maxConcurrent units in flight', async () => {
    const { orchestrator } = createOrchestrator();
    let active = 0;
    let peak = 0;

    const outcomes = await orchestrator.runParallel(URLS, 2, async (_page, url) => {
      active++;
      peak = Math.max(peak, active);
      await delay(10);
      active--;
      return url.length;
    });

    expect(peak).toBe(2);
    expect(outcomes).toHaveLength(URLS.length);
  });

  it('should return one outcome per url in input order', async () => {
    const { orchestrator } = createOrchestrator();
    const waits = [30, 5, 20, 1, 10];

    const outcomes = await orchestrator.runParallel(URLS, 2, async (page, url, index) => {
      await delay(waits[index]);
      return `${page.id}:${new URL(url).hostname}`;
    });

    expect(outcomes).toEqual(
      URLS.map((url, index) => ({
        index,
        url,
        tabId: `parallel_${index}`,
        status: 'ok',
        result: `parallel_${index}:${new URL(url).hostname}`,
      }))
    );
  });

  it('should record a failing unit without cancelling the others', async () => {
    const { orchestrator } = createOrchestrator();

    const outcomes = await orchestrator.runParallel(URLS.slice(0, 3), 2, async (_page, url) => {
      if (url === 'https://b.test/') throw new NavigationError(url, 'bad gateway', 502);
      return 'done';
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['ok', 'error', 'ok']);
    expect(outcomes[1]).toEqual({
      index: 1,
      url: 'https://b.test/',
      tabId: 'parallel_1',
      status: 'error',
      error: {
        kind: 'navigation_error',
        message: 'Navigation to https://b.test/ failed: bad gateway',
        retryable: true,
        details: { url: 'https://b.test/', status: 502 },
      },
    });
  });

  it('should release every tab after the run', async () => {
    const { pool, orchestrator } = createOrchestrator(3);

    await orchestrator.runParallel(URLS.slice(0, 3), 3, async () => 'ok');

    expect(pool.stats()).toMatchObject({ idle: 3, active: 0 });
  });

  it('should run units one at a time when maxConcurrent is below one', async () => {
    const { orchestrator } = createOrchestrator();
    let active = 0;
    let peak = 0;

    await orchestrator.runParallel(URLS.slice(0, 3), 0, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(1);
  });

  it('should return an empty list for no urls', async () => {
    const { orchestrator } = createOrchestrator();
    await expect(orchestrator.runParallel([], 2, async () => 'never')).resolves.toEqual([]);
  });
});
