import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SelectorCache, cacheKey } from '../../src/core/selector-cache.js';
import type { LocatorCandidate } from '../../src/types/index.js';

const HOUR = 60 * 60 * 1000;

const textHit: LocatorCandidate = {
  locator: 'html > body > div.product > span',
  strategy: 'text',
  confidence: 0.9,
  depth: 2,
};

describe('SelectorCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
  });

  describe('in memory', () => {
    it('should return a stored candidate', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', textHit);
      expect(cache.get('shop.example', 'price')).toEqual(textHit);
      expect(cache.getEntry('shop.example', 'price')).toEqual({
        candidate: textHit,
        hits: 1,
        lastVerifiedAt: now,
      });
    });

    it('should keep entries per site', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', textHit);
      expect(cache.get('other.example', 'price')).toBeNull();
    });

    it('should treat an entry exactly at the TTL as fresh and one past it as expired', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 2, now: clock });
      cache.put('shop.example', 'price', textHit);

      now += 2 * HOUR;
      expect(cache.get('shop.example', 'price')).toEqual(textHit);

      now += 1;
      expect(cache.get('shop.example', 'price')).toBeNull();
      expect(cache.peek('shop.example', 'price')?.candidate).toEqual(textHit);
    });

    it('should honour a per-read TTL', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 168, now: clock });
      cache.put('shop.example', 'price', textHit);
      now += HOUR + 1;
      expect(cache.get('shop.example', 'price')).toEqual(textHit);
      expect(cache.get('shop.example', 'price', 1)).toBeNull();
    });

    it('should replace the whole entry on put', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', textHit);
      now += 1000;
      cache.put('shop.example', 'price', { locator: '#price', strategy: 'semantic', confidence: 0.4 }, 3);

      expect(cache.getEntry('shop.example', 'price')).toEqual({
        candidate: { locator: '#price', strategy: 'semantic', confidence: 0.4 },
        hits: 3,
        lastVerifiedAt: now,
      });
      expect(cache.size).toBe(1);
    });

    it('should freeze stored candidates', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', { ...textHit });
      expect(Object.isFrozen(cache.get('shop.example', 'price'))).toBe(true);
    });

    it('should invalidate one entry', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', textHit);
      expect(cache.invalidate('shop.example', 'price')).toBe(true);
      expect(cache.invalidate('shop.example', 'price')).toBe(false);
      expect(cache.get('shop.example', 'price')).toBeNull();
    });

    it('should prune expired entries', () => {
      const cache = new SelectorCache({ filePath: null, ttlHours: 1, now: clock });
      cache.put('shop.example', 'price', textHit);
      now += HOUR / 2;
      cache.put('shop.example', 'rating', textHit);
      now += HOUR / 2 + 1;

      expect(cache.prune()).toBe(1);
      expect(cache.size).toBe(1);
      expect(cache.get('shop.example', 'rating')).toEqual(textHit);
    });
  });

  describe('persistence', () => {
    let dir: string;
    let filePath: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mendscrape-cache-'));
      filePath = path.join(dir, 'selectors.json');
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should write entries on flush and read them back', async () => {
      const cache = new SelectorCache({ filePath, ttlHours: 1, now: clock, debounceMs: 60000 });
      cache.put('shop.example', 'price', textHit, 4);
      await cache.flush();

      const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(raw).toEqual({
        version: 1,
        entries: {
          [cacheKey('shop.example', 'price')]: { candidate: textHit, hits: 4, lastVerifiedAt: now },
        },
      });

      const reloaded = new SelectorCache({ filePath, ttlHours: 1, now: clock });
      await reloaded.load();
      expect(reloaded.getEntry('shop.example', 'price')?.hits).toBe(4);
    });

    it('should drop expired entries on load', async () => {
      const cache = new SelectorCache({ filePath, ttlHours: 1, now: clock, debounceMs: 60000 });
      cache.put('shop.example', 'price', textHit);
      await cache.flush();

      now += HOUR + 1;
      const reloaded = new SelectorCache({ filePath, ttlHours: 1, now: clock, debounceMs: 60000 });
      await reloaded.load();
      expect(reloaded.size).toBe(0);
      await reloaded.flush();
    });

    it('should start empty when the file is invalid', async () => {
      await fs.writeFile(filePath, JSON.stringify({ version: 2, entries: {} }));
      const cache = new SelectorCache({ filePath, ttlHours: 1, now: clock });
      await cache.load();
      expect(cache.size).toBe(0);
    });

    it('should start empty when the file is missing', async () => {
      const cache = new SelectorCache({ filePath, ttlHours: 1, now: clock });
      await cache.load();
      expect(cache.size).toBe(0);
    });
  });
});
