/**
 * Field Parser - turns human field names into resolver targets
 *
 * Rule-based only: lowercase, split on non-alphanumerics, drop stop words,
 * map synonym clusters to a canonical name. The lexicon is read once from
 * data/field-lexicon.json.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { LogicalTarget, ValueType } from '../types/index.js';
import { normalizeSpace, uniqueOrdered, words } from '../utils/text.js';

const VALUE_TYPES = ['text', 'number', 'boolean', 'link', 'button', 'list', 'table'] as const;

/** Inference order when a name carries hints for several types */
const TYPE_PRIORITY: readonly Exclude<ValueType, 'text'>[] = [
  'table',
  'list',
  'number',
  'boolean',
  'link',
  'button',
];

const lexiconSchema = z.object({
  stopWords: z.array(z.string()),
  synonyms: z.record(z.array(z.string())),
  archetypes: z.array(z.string()),
  typeHints: z.object({
    table: z.array(z.string()),
    list: z.array(z.string()),
    number: z.array(z.string()),
    boolean: z.array(z.string()),
    link: z.array(z.string()),
    button: z.array(z.string()),
  }),
});

export type FieldLexicon = z.infer<typeof lexiconSchema>;

export const fieldSpecSchema = z
  .object({
    selector: z.string().min(1).optional(),
    type: z.enum(VALUE_TYPES).optional(),
    attribute: z.string().min(1).optional(),
    logical_name: z.string().min(1).optional(),
    text_hint: z.string().optional(),
    semantic_hint: z.string().optional(),
    required: z.boolean().optional(),
  })
  .strict();

export type FieldSpec = z.infer<typeof fieldSpecSchema>;

/**
 * Field list as accepted in tasks: names only, or a map of name to spec.
 * A bare string spec is a selector hint.
 */
export type FieldsInput = string[] | Record<string, FieldSpec | string | null>;

export interface ParsedField {
  name: string;
  target: LogicalTarget;
  valueType: ValueType;
  attribute?: string;
  required: boolean;
}

let defaultLexicon: FieldLexicon | null = null;

export function loadLexicon(): FieldLexicon {
  if (!defaultLexicon) {
    const raw = readFileSync(new URL('../../data/field-lexicon.json', import.meta.url), 'utf-8');
    defaultLexicon = lexiconSchema.parse(JSON.parse(raw));
  }
  return defaultLexicon;
}

export class FieldParser {
  private readonly stopWords: Set<string>;
  private readonly synonymIndex = new Map<string, string>();
  private readonly archetypes: Set<string>;

  constructor(private readonly lexicon: FieldLexicon = loadLexicon()) {
    this.stopWords = new Set(lexicon.stopWords);
    this.archetypes = new Set(lexicon.archetypes);
    for (const [canonical, members] of Object.entries(lexicon.synonyms)) {
      for (const member of [canonical, ...members]) {
        if (!this.synonymIndex.has(member)) this.synonymIndex.set(member, canonical);
      }
    }
  }

  /** Lowercased words of the query with stop words removed */
  tokens(query: string): string[] {
    return words(query).filter((word) => !this.stopWords.has(word));
  }

  /**
   * Canonical name for a query. The last token with a synonym wins
   * (`customer_rating` -> `rating`); otherwise the tokens joined by `_`.
   */
  canonicalName(query: string): string {
    const tokens = this.tokens(query);
    for (let i = tokens.length - 1; i >= 0; i--) {
      const canonical = this.synonymIndex.get(tokens[i]);
      if (canonical) return canonical;
    }
    return tokens.length > 0 ? uniqueOrdered(tokens).join('_') : 'target';
  }

  parse(query: string): LogicalTarget {
    const logicalName = this.canonicalName(query);
    const textHint = normalizeSpace(query);
    return Object.freeze({
      logicalName,
      ...(textHint ? { textHint } : {}),
      ...(this.archetypes.has(logicalName) ? { semanticHint: logicalName } : {}),
    });
  }

  inferType(name: string): ValueType {
    const tokens = words(name);
    const joined = `_${tokens.join('_')}_`;
    const matches = (hint: string) =>
      hint.includes('_') ? joined.includes(`_${hint}_`) : tokens.includes(hint);

    for (const type of TYPE_PRIORITY) {
      if (this.lexicon.typeHints[type].some(matches)) return type;
    }
    return 'text';
  }

  parseField(name: string, spec: FieldSpec = {}): ParsedField {
    const canonical = this.canonicalName(name);
    const logicalName = spec.logical_name?.trim() || canonical;
    const semanticHint = spec.semantic_hint ?? (this.archetypes.has(canonical) ? canonical : undefined);

    const target: LogicalTarget = Object.freeze({
      logicalName,
      ...(spec.selector ? { selectorHint: spec.selector } : {}),
      textHint: normalizeSpace(spec.text_hint ?? name.replace(/_/g, ' ')),
      ...(semanticHint ? { semanticHint } : {}),
    });

    const valueType = spec.type ?? this.inferType(name);
    const attribute = spec.attribute ?? (valueType === 'link' ? 'href' : undefined);

    return {
      name,
      target,
      valueType,
      ...(attribute ? { attribute } : {}),
      required: spec.required ?? false,
    };
  }

  parseQuery(fields: FieldsInput): ParsedField[] {
    if (Array.isArray(fields)) {
      return fields.map((name) => this.parseField(name));
    }
    return Object.entries(fields).map(([name, spec]) => {
      if (typeof spec === 'string') return this.parseField(name, { selector: spec });
      return this.parseField(name, spec ?? {});
    });
  }
}
