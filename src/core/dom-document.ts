/**
 * DOM Document - cheerio view of a page's HTML
 *
 * Both page providers answer element queries from here: the static provider
 * over fetched HTML, the Playwright provider over `page.content()` combined
 * with live visibility. Elements are addressed by their position among
 * `body *` in document order.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import type {
  BlockKind,
  ContentBlock,
  ElementSnapshot,
  FormField,
  FormInfo,
  PagePreview,
  RawTable,
  StructureInfo,
} from '../types/index.js';
import type { BlockOptions, ReadOptions } from '../types/page.js';
import { escapeCssIdentifier, locatorKind, quoteAttributeValue } from '../utils/css.js';
import { logger } from '../utils/logger.js';
import { normalizeSpace, truncate, uniqueOrdered } from '../utils/text.js';

const log = logger.create('DomDocument');

export const SNAPSHOT_ATTRIBUTES = [
  'name',
  'role',
  'aria-label',
  'title',
  'placeholder',
  'alt',
  'itemprop',
  'data-testid',
  'for',
  'type',
  'href',
  'datetime',
  'content',
];

const SNAPSHOT_TEXT_LIMIT = 140;
const MIN_BLOCK_TEXT = 20;
const BLOCK_TEXT_LIMIT = 500;

const HIDDEN_TAGS = new Set(['script', 'style', 'template', 'noscript', 'head', 'meta', 'link', 'title']);
const TEXT_SKIP_TAGS = new Set(['script', 'style', 'noscript', 'template']);
const BLOCK_LEVEL_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt', 'fieldset',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'td', 'tfoot',
  'th', 'thead', 'tr', 'ul',
]);
const BLOCK_CANDIDATE_TAGS = new Set([
  'main', 'article', 'section', 'div', 'p', 'li', 'h1', 'h2', 'h3', 'table', 'ul', 'ol',
]);
const FORM_VALUE_TAGS = new Set(['input', 'textarea', 'select']);
const FORM_SKIPPED_INPUTS = new Set(['hidden', 'submit', 'button', 'reset', 'image']);

function blockKind(tag: string): BlockKind {
  if (/^h[1-6]$/.test(tag)) return 'heading';
  if (tag === 'table') return 'table';
  if (tag === 'ul' || tag === 'ol') return 'list';
  return 'text';
}

function classList(el: Element): string[] {
  return (el.attribs.class ?? '').split(/\s+/).filter((cls) => cls.length > 0);
}

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (!isTag(node) || TEXT_SKIP_TAGS.has(node.name)) {
    return;
  }
  const block = BLOCK_LEVEL_TAGS.has(node.name);
  if (block) out.push(' ');
  for (const child of node.children) {
    collectText(child, out);
  }
  if (block) out.push(' ');
}

/**
 * Rendered-ish text of an element: skips script/style and separates
 * block-level elements with a space.
 */
export function elementText(el: AnyNode): string {
  const parts: string[] = [];
  collectText(el, parts);
  return normalizeSpace(parts.join(''));
}

export function ownText(el: Element): string {
  return normalizeSpace(
    el.children
      .filter(isText)
      .map((node) => node.data)
      .join('')
  );
}

type TextWork = AnyNode | ' ';

/**
 * Forward reader over an element's text, normalised the way elementText()
 * does it. Text is produced only as far as reads reach; everything before
 * the last read offset is dropped.
 */
export class TextCursor {
  private readonly pending: TextWork[];
  private buffer = '';
  private start = 0;
  private started = false;
  private pendingSpace = false;

  constructor(root: AnyNode) {
    this.pending = [root];
  }

  /**
   * Null when `offset` lies before text already dropped.
   */
  read(offset: number, length: number): string | null {
    if (offset < this.start) return null;

    const end = offset + length;
    while (this.start + this.buffer.length < end && this.pending.length > 0) {
      this.step();
    }

    const from = offset - this.start;
    const slice = this.buffer.slice(from, from + length);
    const drop = Math.min(from, this.buffer.length);
    this.buffer = this.buffer.slice(drop);
    this.start += drop;
    return slice;
  }

  private step(): void {
    const work = this.pending.pop();
    if (work === undefined) return;
    if (work === ' ') {
      this.append(work);
      return;
    }
    if (isText(work)) {
      this.append(work.data);
      return;
    }
    if (!isTag(work) || TEXT_SKIP_TAGS.has(work.name)) return;

    const block = BLOCK_LEVEL_TAGS.has(work.name);
    if (block) this.pending.push(' ');
    for (let i = work.children.length - 1; i >= 0; i--) {
      this.pending.push(work.children[i]);
    }
    if (block) this.pending.push(' ');
  }

  private append(raw: string): void {
    for (const token of raw.split(/(\s+)/)) {
      if (token.length === 0) continue;
      if (/^\s/.test(token)) {
        if (this.started) this.pendingSpace = true;
        continue;
      }
      if (this.pendingSpace) this.buffer += ' ';
      this.buffer += token;
      this.started = true;
      this.pendingSpace = false;
    }
  }
}

function isSelfVisible(el: Element): boolean {
  if (HIDDEN_TAGS.has(el.name)) return false;
  const attrs = el.attribs;
  if ('hidden' in attrs) return false;
  if (attrs['aria-hidden'] === 'true') return false;
  if (el.name === 'input' && (attrs.type ?? '').toLowerCase() === 'hidden') return false;
  const style = (attrs.style ?? '').toLowerCase().replace(/\s+/g, '');
  return !style.includes('display:none') && !style.includes('visibility:hidden');
}

function unquote(value: string): { text: string; exact: boolean } {
  const match = value.match(/^(["'])(.*)\1$/);
  return match ? { text: match[2], exact: true } : { text: value, exact: false };
}

export interface DomDocumentOptions {
  /**
   * Live visibility per `body *` element, in document order. Ignored when
   * its length does not match the parsed document.
   */
  visibility?: boolean[];
}

export class DomDocument {
  private readonly $: CheerioAPI;
  private readonly elements: Element[];
  private readonly positions = new Map<Element, number>();
  private readonly parents: number[] = [];
  private readonly depths: number[] = [];
  private readonly visible: boolean[] = [];
  private readonly paths = new Map<number, string>();
  private readonly cursors = new Map<string, TextCursor>();

  constructor(html: string, options: DomDocumentOptions = {}) {
    this.$ = cheerio.load(html);
    this.elements = this.$('body *').toArray().filter(isTag);

    const live =
      options.visibility && options.visibility.length === this.elements.length
        ? options.visibility
        : null;
    if (options.visibility && !live) {
      log.debug('Live visibility does not line up with parsed document; using markup heuristics', {
        live: options.visibility.length,
        parsed: this.elements.length,
      });
    }

    this.elements.forEach((el, i) => {
      this.positions.set(el, i);
      const parent = el.parent;
      const parentIndex = parent && isTag(parent) ? this.positions.get(parent) ?? -1 : -1;
      this.parents.push(parentIndex);
      this.depths.push(parentIndex < 0 ? 1 : this.depths[parentIndex] + 1);

      const inherited = parentIndex < 0 || this.visible[parentIndex];
      this.visible.push(live ? live[i] : inherited && isSelfVisible(el));
    });
  }

  get size(): number {
    return this.elements.length;
  }

  // ============================================
  // LOCATOR MATCHING
  // ============================================

  /**
   * Indexes of elements matching a CSS or `text=` locator. XPath is not
   * evaluated here; invalid selectors match nothing.
   */
  matchIndexes(locator: string): number[] {
    const kind = locatorKind(locator);

    if (kind === 'xpath') {
      log.debug('XPath locators are not evaluated on parsed documents', { locator });
      return [];
    }

    if (kind === 'text') {
      const { text, exact } = unquote(locator.trim().slice('text='.length).trim());
      if (!text) return [];
      const needle = text.toLowerCase();
      const out: number[] = [];
      this.elements.forEach((el, i) => {
        const own = ownText(el);
        if (exact ? own === text : own.toLowerCase().includes(needle)) {
          out.push(i);
        }
      });
      return out;
    }

    let matched: Element[];
    try {
      matched = this.$(locator).toArray().filter(isTag);
    } catch (error) {
      log.debug('Invalid selector', { locator, error: String(error) });
      return [];
    }

    const out: number[] = [];
    for (const el of matched) {
      const index = this.positions.get(el);
      if (index !== undefined) out.push(index);
    }
    return out;
  }

  isVisible(index: number): boolean {
    return this.visible[index] ?? false;
  }

  // ============================================
  // SNAPSHOTS
  // ============================================

  snapshotAt(index: number): ElementSnapshot {
    const el = this.elements[index];
    const attributes: Record<string, string> = {};
    for (const name of SNAPSHOT_ATTRIBUTES) {
      const value = el.attribs[name];
      if (value !== undefined) attributes[name] = value;
    }

    return {
      index,
      parentIndex: this.parents[index],
      depth: this.depths[index],
      tag: el.name,
      id: el.attribs.id ?? '',
      classes: classList(el),
      attributes,
      text: truncate(elementText(el), SNAPSHOT_TEXT_LIMIT),
      ownText: ownText(el),
      visible: this.visible[index],
      path: this.pathAt(index),
    };
  }

  snapshotsAt(indexes: number[]): ElementSnapshot[] {
    return indexes
      .filter((i) => i >= 0 && i < this.elements.length)
      .map((i) => this.snapshotAt(i));
  }

  evaluate(locator: string): ElementSnapshot[] {
    return this.snapshotsAt(this.matchIndexes(locator));
  }

  snapshot(max: number): ElementSnapshot[] {
    const count = Math.min(max, this.elements.length);
    const out: ElementSnapshot[] = [];
    for (let i = 0; i < count; i++) {
      out.push(this.snapshotAt(i));
    }
    return out;
  }

  /**
   * CSS path from `html` (or the nearest id) down to the element, with up to
   * two classes and `:nth-of-type` when same-tag siblings exist.
   */
  pathAt(index: number): string {
    const cached = this.paths.get(index);
    if (cached !== undefined) return cached;

    const segments: string[] = [];
    let current: Element | null = this.elements[index];

    while (current) {
      let part = current.name;
      const id = current.attribs.id;
      if (id) {
        segments.unshift(`${part}#${escapeCssIdentifier(id)}`);
        break;
      }

      const classes = classList(current).slice(0, 2);
      part += classes.map((cls) => `.${escapeCssIdentifier(cls)}`).join('');

      const parent: AnyNode | null = current.parent;
      if (parent && isTag(parent)) {
        const tagName = current.name;
        const siblings = parent.children.filter((node): node is Element => isTag(node) && node.name === tagName);
        if (siblings.length > 1) {
          part += `:nth-of-type(${siblings.indexOf(current) + 1})`;
        }
        segments.unshift(part);
        current = parent;
      } else {
        segments.unshift(part);
        current = null;
      }
    }

    const path = segments.join(' > ');
    this.paths.set(index, path);
    return path;
  }

  // ============================================
  // VALUES
  // ============================================

  valueAt(index: number, options: ReadOptions = {}): string | null {
    const el = this.elements[index];
    let value: string | null;

    if (options.attribute) {
      const raw = el.attribs[options.attribute];
      value = raw === undefined ? null : normalizeSpace(raw);
    } else if (FORM_VALUE_TAGS.has(el.name) && el.attribs.value !== undefined) {
      value = normalizeSpace(el.attribs.value);
    } else {
      value = elementText(el);
    }

    if (value !== null && options.maxLength !== undefined) {
      value = truncate(value, options.maxLength);
    }
    return value;
  }

  /**
   * Value of the first visible match.
   */
  readValueAt(indexes: number[], options: ReadOptions = {}): string | null {
    for (const index of indexes) {
      if (!this.visible[index]) continue;
      const value = this.valueAt(index, options);
      if (value !== null) return value;
    }
    return null;
  }

  readAllAt(indexes: number[], limit: number, options: ReadOptions = {}): string[] {
    const out: string[] = [];
    for (const index of indexes) {
      if (out.length >= limit) break;
      if (!this.visible[index]) continue;
      const value = this.valueAt(index, options);
      if (value) out.push(value);
    }
    return out;
  }

  /**
   * Indexes of the element children of each index, document order.
   */
  childIndexes(indexes: number[]): number[] {
    const wanted = new Set(indexes);
    const out: number[] = [];
    this.parents.forEach((parent, i) => {
      if (wanted.has(parent)) out.push(i);
    });
    return out;
  }

  /**
   * List items: every match when several nodes match, otherwise the single
   * match's element children.
   */
  listIndexes(matches: number[]): number[] {
    return matches.length === 1 ? this.childIndexes(matches) : matches;
  }

  /**
   * Slice of the text of the first node matching one of the comma-separated
   * alternatives, tried in order. Reads at rising offsets continue from the
   * previous one instead of rebuilding the text.
   */
  readTextSlice(selector: string, offset: number, length: number): string {
    const cursor = this.cursors.get(selector);
    const continued = cursor?.read(offset, length);
    if (continued !== undefined && continued !== null) return continued;

    const node = this.firstMatch(selector);
    if (!node) return '';
    const fresh = new TextCursor(node);
    this.cursors.set(selector, fresh);
    return fresh.read(offset, length) ?? '';
  }

  private firstMatch(selector: string): Element | null {
    const alternatives = selector
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);

    for (const alternative of alternatives) {
      let node: Element | undefined;
      try {
        node = this.$(alternative).toArray().find(isTag);
      } catch (error) {
        log.debug('Invalid selector', { locator: alternative, error: String(error) });
        continue;
      }
      if (node) return node;
    }
    return null;
  }

  // ============================================
  // BLOCKS / TABLES / STRUCTURE / PREVIEW
  // ============================================

  collectBlocks(options: BlockOptions): ContentBlock[] {
    const excludedRoots = new Set<Element>();
    for (const selector of options.excludeSelectors) {
      try {
        for (const el of this.$(selector).toArray().filter(isTag)) excludedRoots.add(el);
      } catch (error) {
        log.debug('Invalid exclude selector', { locator: selector, error: String(error) });
      }
    }

    const excluded: boolean[] = [];
    const blocks: ContentBlock[] = [];

    for (let i = 0; i < this.elements.length; i++) {
      const el = this.elements[i];
      const parent = this.parents[i];
      excluded.push(excludedRoots.has(el) || (parent >= 0 && excluded[parent]));

      if (blocks.length >= options.limit) continue;
      if (excluded[i] || !this.visible[i] || !BLOCK_CANDIDATE_TAGS.has(el.name)) continue;

      const text = elementText(el);
      if (text.length < MIN_BLOCK_TEXT) continue;

      blocks.push({
        index: blocks.length,
        tag: el.name,
        kind: blockKind(el.name),
        text: truncate(text, BLOCK_TEXT_LIMIT),
        selector: this.pathAt(i),
      });
    }

    return blocks;
  }

  /**
   * Headers come from `thead th`; otherwise the first row when every cell
   * contains a letter; otherwise `column_N`.
   */
  extractTables(selector: string, rowLimit: number): RawTable[] {
    let tables: Element[];
    try {
      tables = this.$(selector).toArray().filter(isTag);
    } catch (error) {
      log.debug('Invalid table selector', { locator: selector, error: String(error) });
      return [];
    }

    return tables.map((table) => {
      const $table = this.$(table);
      let headers = $table
        .find('thead th')
        .toArray()
        .map((th) => elementText(th));

      const bodyRows = $table.find('tbody tr').toArray();
      const rowElements = bodyRows.length > 0 ? bodyRows : $table.find('tr').toArray();
      const rows = rowElements.slice(0, rowLimit).map((tr) =>
        this.$(tr)
          .find('th, td')
          .toArray()
          .map((cell) => elementText(cell))
      );

      if (headers.length === 0 && rows.length > 0) {
        const first = rows[0];
        if (first.length > 0 && first.every((cell) => /[a-zA-Z]/.test(cell))) {
          headers = first;
          rows.shift();
        }
      }

      if (headers.length === 0 && rows.length > 0) {
        const width = Math.max(...rows.map((row) => row.length));
        headers = Array.from({ length: width }, (_, idx) => `column_${idx + 1}`);
      }

      return { headers, rows };
    });
  }

  xpathAt(index: number): string {
    const el = this.elements[index];
    const id = el.attribs.id;
    if (id) return `//*[@id="${id}"]`;

    const parts: string[] = [];
    let current: AnyNode | null = el;
    while (current && isTag(current)) {
      const tagName: string = current.name;
      let position = 1;
      let prev = current.prev;
      while (prev) {
        if (isTag(prev) && prev.name === tagName) position += 1;
        prev = prev.prev;
      }
      parts.unshift(`${tagName}[${position}]`);
      current = current.parent;
    }
    return `/${parts.join('/')}`;
  }

  describeAt(index: number): StructureInfo {
    const el = this.elements[index];
    const id = el.attribs.id || null;
    const classes = classList(el);

    const suggested: string[] = [];
    if (id) suggested.push(`#${escapeCssIdentifier(id)}`);
    if (classes.length > 0) {
      suggested.push(`${el.name}.${classes.slice(0, 3).map(escapeCssIdentifier).join('.')}`);
    }
    for (const attr of ['name', 'data-testid', 'data-qa', 'aria-label']) {
      const value = el.attribs[attr];
      if (value) suggested.push(`${el.name}[${attr}=${quoteAttributeValue(value)}]`);
    }
    const path = this.pathAt(index);
    suggested.push(path);

    const parentIndex = this.parents[index];
    const parentEl = parentIndex >= 0 ? this.elements[parentIndex] : null;

    return {
      tag: el.name,
      id,
      classes,
      attributes: Object.entries(el.attribs)
        .slice(0, 16)
        .map(([name, value]) => ({ name, value })),
      textPreview: truncate(elementText(el), 200),
      htmlPreview: truncate(this.$.html(el), 500),
      cssPath: path,
      xpath: this.xpathAt(index),
      parent: parentEl
        ? { tag: parentEl.name, id: parentEl.attribs.id || null, classes: classList(parentEl) }
        : null,
      childrenCount: el.children.filter(isTag).length,
      suggestedSelectors: uniqueOrdered(suggested),
    };
  }

  /**
   * Structure of the first visible match (first match when none is visible).
   */
  describeStructure(indexes: number[]): StructureInfo | null {
    if (indexes.length === 0) return null;
    const index = indexes.find((i) => this.visible[i]) ?? indexes[0];
    return this.describeAt(index);
  }

  /**
   * Forms in document order with their fillable fields.
   */
  forms(): FormInfo[] {
    const $ = this.$;
    const forms: FormInfo[] = [];
    this.elements.forEach((form, i) => {
      if (form.name !== 'form') return;
      const fields: FormField[] = $(form)
        .find('input, textarea, select')
        .toArray()
        .filter(isTag)
        .filter((el) => !FORM_SKIPPED_INPUTS.has((el.attribs.type ?? '').toLowerCase()))
        .map((el) => {
          const id = el.attribs.id || null;
          const forLabel = id ? $(`label[for=${quoteAttributeValue(id)}]`).first().text() : '';
          return {
            name: el.attribs.name || null,
            type: el.name === 'input' ? (el.attribs.type || 'text').toLowerCase() : el.name,
            id,
            placeholder: el.attribs.placeholder || null,
            label: normalizeSpace(forLabel || $(el).closest('label').text()) || null,
          };
        });
      forms.push({
        index: forms.length,
        id: form.attribs.id || null,
        action: form.attribs.action || null,
        method: (form.attribs.method || 'get').toLowerCase(),
        selector: this.pathAt(i),
        fields,
      });
    });
    return forms;
  }

  preview(maxSections: number): PagePreview {
    const $ = this.$;
    const texts = (selector: string, limit: number): string[] =>
      $(selector)
        .toArray()
        .slice(0, limit)
        .map((el) => elementText(el));

    const sections: PagePreview['sections'] = [];
    let scanned = 0;
    for (let i = 0; i < this.elements.length && sections.length < maxSections && scanned < 600; i++) {
      const el = this.elements[i];
      if (!['main', 'article', 'section', 'div'].includes(el.name)) continue;
      scanned++;
      if (!this.visible[i]) continue;
      const text = elementText(el);
      if (text.length <= 40) continue;
      sections.push({ index: sections.length, tag: el.name, textPreview: truncate(text, 180) });
    }

    return {
      title: normalizeSpace($('title').first().text()),
      h1: texts('h1', 1)[0] ?? '',
      h2Headings: texts('h2', 10),
      paragraphPreview: texts('p', 8),
      sections,
    };
  }
}
