/**
 * Relevance Filter - keyword scoring of content blocks
 *
 * filterBlocks() is pure: the same blocks and keywords always give the same
 * survivors in the same order.
 */

import type { ContentBlock, ScoredBlock } from '../types/index.js';
import type { PageHandle } from '../types/page.js';
import { normalizeSpace, round3, uniqueOrdered, words } from '../utils/text.js';

export const DEFAULT_EXCLUDE_SELECTORS = [
  'nav',
  'footer',
  'aside',
  '.advert',
  '.cookie',
  '.newsletter',
  'script',
  'style',
];

/** Blocks read from a page before scoring */
const MAX_PAGE_BLOCKS = 800;

const COVERAGE_WEIGHT = 0.6;
const MAX_DENSITY = 0.15;
const LENGTH_PENALTY = 0.15;
const MIN_WORDS = 4;
const MAX_WORDS = 400;

const SALIENCE: Record<ContentBlock['kind'], number> = {
  heading: 0.25,
  table: 0.2,
  list: 0.15,
  text: 0,
};

export interface FilterOptions {
  minScore?: number;
  maxItems?: number;
  excludeSelectors?: string[];
}

export function normalizeKeywords(keywords: Iterable<string>): string[] {
  return uniqueOrdered(
    Array.from(keywords, (keyword) => normalizeSpace(keyword).toLowerCase()).filter((k) => k.length > 0)
  );
}

/**
 * Count non-overlapping runs of text words that start with the keyword's
 * words, so "price" matches "Prices" but not "caprice".
 */
function countOccurrences(textWords: readonly string[], keywordWords: readonly string[]): number {
  if (keywordWords.length === 0) return 0;
  let count = 0;
  let at = 0;
  while (at + keywordWords.length <= textWords.length) {
    if (keywordWords.every((word, offset) => textWords[at + offset].startsWith(word))) {
      count++;
      at += keywordWords.length;
    } else {
      at++;
    }
  }
  return count;
}

/**
 * Score in [0, 1]: keyword coverage, keyword density, structural salience,
 * minus a penalty for very short or very long blocks.
 */
export function scoreBlock(block: ContentBlock, keywords: string[]): number {
  const textWords = words(block.text);
  const wordCount = textWords.length;
  if (wordCount === 0) return 0;

  let coverage = 0;
  let occurrences = 0;
  for (const keyword of keywords) {
    const found = countOccurrences(textWords, words(keyword));
    if (found > 0) coverage++;
    occurrences += found;
  }

  let score = 0;
  if (keywords.length > 0) {
    score += COVERAGE_WEIGHT * (coverage / keywords.length);
    score += Math.min(MAX_DENSITY, occurrences / wordCount);
  }
  score += SALIENCE[block.kind];
  if (wordCount < MIN_WORDS || wordCount > MAX_WORDS) score -= LENGTH_PENALTY;

  return round3(Math.min(1, Math.max(0, score)));
}

/**
 * Drop blocks scoring below `minScore`, keep the `maxItems` best (earlier
 * block wins a tie) and return them in document order.
 */
export function filterBlocks(
  blocks: readonly ContentBlock[],
  keywords: Iterable<string>,
  minScore: number,
  maxItems: number
): ScoredBlock[] {
  const normalized = normalizeKeywords(keywords);

  const scored = blocks
    .map((block, position) => ({ block: { ...block, score: scoreBlock(block, normalized) }, position }))
    .filter((entry) => entry.block.score >= minScore);

  return scored
    .sort((a, b) => b.block.score - a.block.score || a.position - b.position)
    .slice(0, Math.max(0, maxItems))
    .sort((a, b) => a.position - b.position)
    .map((entry) => entry.block);
}

/**
 * Collect blocks from a page and filter them.
 */
export async function filterPage(
  page: PageHandle,
  keywords: Iterable<string>,
  options: FilterOptions = {}
): Promise<ScoredBlock[]> {
  const blocks = await page.collectBlocks({
    excludeSelectors: options.excludeSelectors ?? DEFAULT_EXCLUDE_SELECTORS,
    limit: MAX_PAGE_BLOCKS,
  });
  return filterBlocks(blocks, keywords, options.minScore ?? 0.6, options.maxItems ?? 25);
}
