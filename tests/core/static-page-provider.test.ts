import { describe, it, expect, vi } from 'vitest';
import {
  StaticPageProvider,
  StaticPageHandle,
  type FetchedPage,
  type HtmlFetcher,
} from '../../src/core/static-page-provider.js';
import { NavigationError, toTaskError } from '../../src/types/errors.js';

const PAGES: Record<string, string> = {
  'https://shop.example/item/1': '<html><body><h1>Blue Widget</h1><span class="price">$19.99</span></body></html>',
  'https://shop.example/item/2': '<html><body><h1>Red Widget</h1></body></html>',
};

function fakeFetcher(setCookies: Record<string, string[]> = {}) {
  return vi.fn<HtmlFetcher>(async (url): Promise<FetchedPage> => {
    const body = PAGES[url];
    return {
      url,
      status: body === undefined ? 404 : 200,
      body: body ?? 'not found',
      setCookies: setCookies[url] ?? [],
    };
  });
}

describe('StaticPageProvider', () => {
  it('should open handles that navigate and query fetched HTML', async () => {
    const provider = new StaticPageProvider({ fetcher: fakeFetcher() });
    const page = await provider.open('default');

    expect(page.url()).toBe('');
    const outcome = await page.goto('https://shop.example/item/1');

    expect(outcome).toEqual({ url: 'https://shop.example/item/1', status: 200, ok: true });
    expect(page.url()).toBe('https://shop.example/item/1');
    await expect(page.readValue('span.price')).resolves.toBe('$19.99');
    await expect(page.evaluate('h1')).resolves.toHaveLength(1);
  });

  it('should send the configured headers', async () => {
    const fetcher = fakeFetcher();
    const provider = new StaticPageProvider({
      fetcher,
      userAgent: 'test-agent/1.0',
      extraHeaders: { 'Accept-Language': 'en-US' },
    });
    const page = await provider.open('default');
    await page.goto('https://shop.example/item/1');

    expect(fetcher.mock.calls[0][1].headers).toEqual({
      'User-Agent': 'test-agent/1.0',
      'Accept-Language': 'en-US',
    });
  });

  it('should keep cookies per host and send them back', async () => {
    const fetcher = fakeFetcher({
      'https://shop.example/item/1': ['sid=test-session; Path=/; HttpOnly', 'theme=dark; Domain=.shop.example; Path=/'],
    });
    const provider = new StaticPageProvider({ fetcher });
    const page = await provider.open('default');

    await page.goto('https://shop.example/item/1');
    await page.goto('https://shop.example/item/2');

    expect(fetcher.mock.calls[1][1].headers).toEqual({ Cookie: 'sid=test-session; theme=dark' });
    await expect(provider.exportState()).resolves.toMatchObject({
      cookieJar: {
        cookies: [
          { key: 'sid', value: 'test-session', domain: 'shop.example', path: '/' },
          { key: 'theme', value: 'dark', domain: 'shop.example', path: '/' },
        ],
      },
    });
  });

  it('should drop a cookie the server expires with Max-Age=0', async () => {
    const fetcher = fakeFetcher({
      'https://shop.example/item/1': ['sid=test-session; Path=/'],
      'https://shop.example/item/2': ['sid=; Max-Age=0; Path=/'],
    });
    const provider = new StaticPageProvider({ fetcher });
    const page = await provider.open('default');

    await page.goto('https://shop.example/item/1');
    await page.goto('https://shop.example/item/2');
    await page.goto('https://shop.example/item/1');

    expect(fetcher.mock.calls[1][1].headers).toEqual({ Cookie: 'sid=test-session' });
    expect(fetcher.mock.calls[2][1].headers).toEqual({});
  });

  it('should reject cookies set for another domain', async () => {
    const fetcher = fakeFetcher({
      'https://shop.example/item/1': ['track=test-session; Domain=tracker.example; Path=/'],
    });
    const provider = new StaticPageProvider({ fetcher });
    const page = await provider.open('default');

    await page.goto('https://shop.example/item/1');
    await page.goto('https://shop.example/item/2');

    expect(fetcher.mock.calls[1][1].headers).toEqual({});
    await expect(provider.exportState()).resolves.toMatchObject({ cookieJar: { cookies: [] } });
  });

  it('should restore an exported cookie jar in another provider', async () => {
    const source = new StaticPageProvider({
      fetcher: fakeFetcher({ 'https://shop.example/item/1': ['sid=restored; Path=/'] }),
    });
    await (await source.open('default')).goto('https://shop.example/item/1');

    const fetcher = fakeFetcher();
    const provider = new StaticPageProvider({ fetcher });
    await provider.restoreState(await source.exportState());
    const page = await provider.open('default');
    await page.goto('https://shop.example/item/2');

    expect(fetcher.mock.calls[0][1].headers).toEqual({ Cookie: 'sid=restored' });
  });

  it('should start from an empty jar when the state holds none', async () => {
    const fetcher = fakeFetcher();
    const provider = new StaticPageProvider({ fetcher });
    await provider.restoreState({ cookies: 'junk' });
    const page = await provider.open('default');
    await page.goto('https://shop.example/item/1');

    expect(fetcher.mock.calls[0][1].headers).toEqual({});
  });

  it('should abort an in-flight fetch when the caller signal fires', async () => {
    const fetcher = vi.fn<HtmlFetcher>(
      (_url, init) =>
        new Promise<FetchedPage>((_resolve, reject) => {
          init.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );
    const provider = new StaticPageProvider({ fetcher });
    const page = await provider.open('default');
    const controller = new AbortController();

    const pending = page.goto('https://shop.example/item/1', { signal: controller.signal }).catch((e: unknown) => e);
    await vi.waitFor(() => expect(fetcher).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(pending).resolves.toBeInstanceOf(NavigationError);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('should raise NavigationError for HTTP errors', async () => {
    const provider = new StaticPageProvider({ fetcher: fakeFetcher() });
    const page = await provider.open('default');

    const error = await page.goto('https://shop.example/missing').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NavigationError);
    expect(toTaskError(error)).toEqual({
      kind: 'navigation_error',
      message: 'Navigation to https://shop.example/missing failed: HTTP 404',
      retryable: false,
      details: { url: 'https://shop.example/missing', status: 404 },
    });
  });

  it('should record fetch failures as navigation errors without a status', async () => {
    const fetcher = vi.fn<HtmlFetcher>(async () => {
      throw new Error('getaddrinfo ENOTFOUND shop.invalid');
    });
    const provider = new StaticPageProvider({ fetcher });
    const page = await provider.open('default');

    const error = await page.goto('https://shop.invalid/').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NavigationError);
    expect(error instanceof NavigationError && error.status).toBeNull();
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(page.networkCalls().map((call) => [call.url, call.status])).toEqual([['https://shop.invalid/', null]]);
  });

  it('should record document requests', async () => {
    const provider = new StaticPageProvider({ fetcher: fakeFetcher() });
    const page = await provider.open('default');
    await page.goto('https://shop.example/item/1');
    await page.goto('https://shop.example/item/2');

    const calls = page.networkCalls({ limit: 1 });
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      url: 'https://shop.example/item/2',
      method: 'GET',
      status: 200,
      resourceType: 'document',
    });
  });

  it('should accept content set directly', async () => {
    const provider = new StaticPageProvider({ fetcher: fakeFetcher() });
    const page = await provider.open('default');
    expect(page).toBeInstanceOf(StaticPageHandle);

    page.setContent('<body><p>Hello there</p></body>', 'https://local.example/');
    expect(page.url()).toBe('https://local.example/');
    await expect(page.readValue('p')).resolves.toBe('Hello there');
  });
});
