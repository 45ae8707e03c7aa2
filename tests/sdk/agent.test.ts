import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  BrowserManager,
  createAgent,
  createProvider,
  StaticPageProvider,
} from '../../src/sdk.js';
import type { HtmlFetcher } from '../../src/core/static-page-provider.js';
import { parseConfig } from '../../src/utils/config-loader.js';

const ITEM = 'https://www.shop.example/item/1';

const fetcher: HtmlFetcher = async (url) => ({
  url,
  status: 200,
  body: '<html><body><div class="product"><h2>Product price</h2><span>$19.99</span></div></body></html>',
  setCookies: [],
});

describe('sdk', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'mendscrape-sdk-'));
  });

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true });
  });

  describe('createProvider', () => {
    it('should pick the provider for the configured engine', () => {
      expect(createProvider(parseConfig({ browser: { engine: 'static' } }))).toBeInstanceOf(StaticPageProvider);
      expect(createProvider(parseConfig({}))).toBeInstanceOf(BrowserManager);
    });
  });

  describe('createAgent', () => {
    it('should build an agent from inline config', async () => {
      const agent = await createAgent({
        config: { browser: { engine: 'static', max_tabs: 3 }, log: { level: 'silent' } },
        fetcher,
        cwd,
      });

      expect(agent.provider.engine).toBe('static');
      expect(agent.pool.stats().maxTabs).toBe(3);
      await agent.cleanup();
    });

    it('should persist healed selectors across agents', async () => {
      const config = { browser: { engine: 'static' as const }, log: { level: 'silent' as const } };
      const task = { action: 'extract', target: { url: ITEM, fields: { product_price: 'div.price' } } };

      const first = await createAgent({ config, fetcher, cwd });
      await expect(first.run(task)).resolves.toMatchObject({
        status: 'ok',
        result: { fields: [{ strategy: 'text' }] },
      });
      await first.cleanup();

      const cacheFile = path.join(cwd, 'cache', 'selectors.json');
      const stored: unknown = JSON.parse(await fs.readFile(cacheFile, 'utf-8'));
      expect(stored).toMatchObject({ version: 1 });

      const second = await createAgent({ config, fetcher, cwd });
      await expect(second.run(task)).resolves.toMatchObject({
        status: 'ok',
        result: { data: { product_price: 19.99 }, fields: [{ strategy: 'cached' }] },
      });
      await second.cleanup();
    });

    it('should close pages on cleanup', async () => {
      const agent = await createAgent({
        config: { browser: { engine: 'static' }, log: { level: 'silent' } },
        fetcher,
        cwd,
      });
      await agent.run({ action: 'navigate', target: { url: ITEM } });
      expect(agent.pool.stats().idle).toBe(1);

      await agent.cleanup();
      expect(agent.pool.stats().tabs).toEqual([]);
    });
  });
});
