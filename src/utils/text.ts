/**
 * Text helpers shared by the resolver, the relevance filter and the
 * page providers. All of them are pure.
 */

/**
 * Collapse runs of whitespace and trim.
 */
export function normalizeSpace(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Truncate to `max` characters (no ellipsis, so results stay prefixes).
 */
export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}

/**
 * Split identifiers and selector-ish strings into lowercase tokens.
 * `product-price_main` -> ['product', 'price', 'main']
 */
const TOKEN_SPLIT = /[\s._#\-[\]>:+~=()"'/,;]+/;

export function tokenize(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((token) => token.length > 0);
}

/**
 * Split free text into lowercase alphanumeric words.
 */
export function words(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);
}

/**
 * De-duplicate while keeping first-seen order.
 */
export function uniqueOrdered<T>(values: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

/**
 * Parse a human-formatted number: "$1,299.00" -> 1299, "4.5 out of 5" -> 4.5,
 * "(12)" -> 12. Returns null when no number is present.
 */
export function parseNumber(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = value.replace(/\u00a0/g, ' ').match(/-?\d[\d,]*(?:\.\d+)?|-?\.\d+/);
  if (!match) return null;
  const parsed = Number(match[0].replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

export function containsDigit(value: string): boolean {
  return /\d/.test(value);
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Site identifier used for cache keys: lowercased hostname without `www.`.
 * Non-URL input is lowercased and returned as is.
 */
export function siteKey(url: string): string {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return url.trim().toLowerCase();
  }
}
