/**
 * Resolution strategies for the selector resolver.
 *
 * Each strategy proposes unverified candidates for a target; the resolver
 * ranks and verifies them. Text and semantic matching run over one element
 * snapshot per resolve call.
 */

import type { ElementSnapshot, LocatorCandidate, LogicalTarget, StrategyTag } from '../types/index.js';
import type { PageHandle } from '../types/page.js';
import type { SelfHealingConfig } from '../utils/config-schemas.js';
import { containsDigit, normalizeSpace, round3, tokenize, uniqueOrdered, words } from '../utils/text.js';
import type { SelectorCache } from './selector-cache.js';

export interface StrategyContext {
  page: PageHandle;
  target: LogicalTarget;
  site: string;
  cache: SelectorCache;
  config: SelfHealingConfig;
  /** Visible-or-not snapshot of the first `max_candidates` elements, memoized */
  snapshot(): Promise<ElementSnapshot[]>;
}

export interface ResolutionStrategy {
  readonly tag: StrategyTag;
  attempt(context: StrategyContext): Promise<LocatorCandidate[]>;
}

/** Words ignored when deriving match tokens from names and hints */
const IGNORED_TOKENS = new Set(['the', 'of', 'a', 'an', 'and', 'for', 'to', 'in', 'on', 'per', 'with']);

const LABEL_ATTRIBUTES = ['aria-label', 'title', 'placeholder', 'alt'] as const;

function candidate(
  locator: string,
  strategy: StrategyTag,
  confidence: number,
  depth?: number
): LocatorCandidate {
  return Object.freeze({ locator, strategy, confidence, ...(depth !== undefined ? { depth } : {}) });
}

// ============================================
// DIRECT / CACHED
// ============================================

export const directStrategy: ResolutionStrategy = {
  tag: 'direct',
  async attempt({ target }) {
    const hint = target.selectorHint?.trim();
    return hint ? [candidate(hint, 'direct', 1)] : [];
  },
};

export const cachedStrategy: ResolutionStrategy = {
  tag: 'cached',
  async attempt({ cache, site, target, config }) {
    const hit = cache.get(site, target.logicalName, config.cache_ttl_hours);
    if (!hit) return [];
    return [candidate(hit.locator, 'cached', hit.confidence, hit.depth)];
  },
};

// ============================================
// TEXT MATCH
// ============================================

/**
 * Tokens from the logical name and the text hint, longer than one character.
 */
export function matchTokens(target: LogicalTarget): string[] {
  return uniqueOrdered([...words(target.logicalName), ...words(target.textHint)]).filter(
    (token) => token.length > 1 && !IGNORED_TOKENS.has(token)
  );
}

function labelText(el: ElementSnapshot): string {
  const parts = [el.ownText];
  for (const name of LABEL_ATTRIBUTES) {
    const value = el.attributes[name];
    if (value) parts.push(value);
  }
  return normalizeSpace(parts.join(' '));
}

/**
 * Where the value for a matched label lives: the element itself when its own
 * text carries a number, the control a `<label for>` points at, or the next
 * visible sibling that has text.
 */
export function valueNodeFor(el: ElementSnapshot, elements: ElementSnapshot[]): ElementSnapshot {
  if (containsDigit(el.ownText)) return el;

  const forId = el.tag === 'label' ? el.attributes.for : undefined;
  if (forId) {
    const control = elements.find((other) => other.id === forId && other.visible);
    if (control) return control;
  }

  for (let i = el.index + 1; i < elements.length; i++) {
    const other = elements[i];
    if (other.parentIndex !== el.parentIndex) continue;
    if (other.visible && other.text) return other;
  }
  return el;
}

export const textStrategy: ResolutionStrategy = {
  tag: 'text',
  async attempt({ target, snapshot }) {
    const tokens = matchTokens(target);
    if (tokens.length === 0) return [];

    const elements = await snapshot();
    const out: LocatorCandidate[] = [];

    for (const el of elements) {
      if (!el.visible) continue;
      const haystack = new Set(words(labelText(el)));
      if (haystack.size === 0) continue;

      const matched = tokens.filter((token) => haystack.has(token)).length;
      if (matched === 0) continue;

      const valueNode = valueNodeFor(el, elements);
      out.push(candidate(valueNode.path, 'text', round3((0.9 * matched) / tokens.length), valueNode.depth));
    }
    return out;
  },
};

// ============================================
// SEMANTIC MATCH
// ============================================

const WEIGHTS = {
  id: 3.5,
  className: 2.2,
  name: 1.5,
  role: 1.0,
  tag: 1.2,
  textHint: 3.0,
  visible: 0.8,
  archetype: 3.0,
} as const;

const CURRENCY = /[$€£¥₹]\s?\d|\d\s?(?:[$€£¥₹]|usd|eur|gbp)\b|\b(?:usd|eur|gbp)\s?\d/i;
const RATING = /^\d+(?:\.\d+)?\s*(?:\/\s*(?:5|10)|out of (?:5|10)|stars?)$/i;
const STARS = /[★☆]{3,}/;
const ISO_DATE = /\b\d{4}-\d{2}-\d{2}\b/;
const MONTH_DATE =
  /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4}\b/i;
const EMAIL = /[\w.+-]+@[\w-]+\.[\w.-]+/;
const PHONE = /^\+?\d[\d\s().-]{6,}\d$/;

/** Short value-like text used for archetype checks */
function valueText(el: ElementSnapshot): string {
  return el.ownText || (el.text.length <= 40 ? el.text : '');
}

/**
 * Archetype recognisers. Each inspects one element in isolation.
 */
export const ARCHETYPES: Record<string, (el: ElementSnapshot) => boolean> = {
  price: (el) => CURRENCY.test(valueText(el)) || el.attributes.itemprop === 'price',
  rating: (el) => {
    const text = valueText(el);
    if (RATING.test(text) || STARS.test(text)) return true;
    const label = el.attributes['aria-label'] ?? '';
    return /\d(?:\.\d)?\s*(?:out of|\/)\s*\d+|stars?/i.test(label);
  },
  date: (el) => el.tag === 'time' || ISO_DATE.test(valueText(el)) || MONTH_DATE.test(valueText(el)),
  email: (el) => (el.attributes.href ?? '').startsWith('mailto:') || EMAIL.test(valueText(el)),
  phone: (el) => (el.attributes.href ?? '').startsWith('tel:') || PHONE.test(valueText(el)),
  image: (el) => el.tag === 'img',
  link: (el) => el.tag === 'a' && Boolean(el.attributes.href),
  title: (el) => el.tag === 'h1',
};

/**
 * Tokens compared against id, class, name and role: the logical name, the
 * selector hint and the semantic hint.
 */
export function semanticTokens(target: LogicalTarget): string[] {
  return uniqueOrdered([
    ...tokenize(target.logicalName),
    ...tokenize(target.selectorHint),
    ...tokenize(target.semanticHint),
  ]).filter((token) => token.length > 1 && !IGNORED_TOKENS.has(token));
}

export function scoreElement(el: ElementSnapshot, tokens: string[], target: LogicalTarget): number {
  const id = el.id.toLowerCase();
  const className = el.classes.join(' ').toLowerCase();
  const name = [el.attributes.name, el.attributes.itemprop, el.attributes['data-testid']]
    .filter((value): value is string => Boolean(value))
    .join(' ')
    .toLowerCase();
  const role = (el.attributes.role ?? '').toLowerCase();

  let score = 0;
  for (const token of tokens) {
    if (id.includes(token)) score += WEIGHTS.id;
    if (className.includes(token)) score += WEIGHTS.className;
    if (name.includes(token)) score += WEIGHTS.name;
    if (role.includes(token)) score += WEIGHTS.role;
    if (token === el.tag) score += WEIGHTS.tag;
  }

  const hint = normalizeSpace(target.textHint).toLowerCase();
  if (hint && labelText(el).toLowerCase().includes(hint)) score += WEIGHTS.textHint;
  if (el.visible) score += WEIGHTS.visible;

  const archetype = target.semanticHint ? ARCHETYPES[target.semanticHint] : undefined;
  if (archetype?.(el)) score += WEIGHTS.archetype;

  return score;
}

/** Confidence for a semantic score; never above 0.5 */
export function semanticConfidence(score: number): number {
  return round3(0.5 * Math.min(1, score / 10));
}

export const semanticStrategy: ResolutionStrategy = {
  tag: 'semantic',
  async attempt({ target, config, snapshot }) {
    const tokens = semanticTokens(target);
    const elements = await snapshot();
    const out: LocatorCandidate[] = [];

    for (const el of elements) {
      if (!el.visible) continue;
      const score = scoreElement(el, tokens, target);
      if (score < config.similarity_threshold) continue;
      out.push(candidate(el.path, 'semantic', semanticConfidence(score), el.depth));
    }
    return out;
  },
};

export const STRATEGIES: Record<StrategyTag, ResolutionStrategy> = {
  direct: directStrategy,
  cached: cachedStrategy,
  text: textStrategy,
  semantic: semanticStrategy,
};
