/**
 * Content Extractor - resolves parsed fields and reads typed values
 */

import { ResolutionFailure } from '../types/errors.js';
import type {
  ExtractedField,
  ExtractedTable,
  ExtractionResult,
  FieldValue,
  ValueType,
} from '../types/index.js';
import type { PageHandle } from '../types/page.js';
import type { ExtractionConfig, SelfHealingConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import { buildTable } from '../utils/table-normalizer.js';
import { normalizeSpace, parseNumber } from '../utils/text.js';
import type { ParsedField } from './field-parser.js';
import type { SelectorResolver } from './selector-resolver.js';

const log = logger.extractor;

const TRUE_WORDS = new Set(['true', 'yes', '1', 'on', 'enabled', 'checked', 'in stock', 'available']);
const FALSE_WORDS = new Set(['false', 'no', '0', 'off', 'disabled', 'unchecked', 'out of stock', 'unavailable']);

export interface ExtractOptions {
  limits: ExtractionConfig;
  selfHealing?: SelfHealingConfig;
  signal?: AbortSignal;
}

export function castBoolean(raw: string): boolean {
  const lowered = normalizeSpace(raw).toLowerCase();
  if (TRUE_WORDS.has(lowered)) return true;
  if (FALSE_WORDS.has(lowered)) return false;
  return lowered.length > 0;
}

/**
 * Convert a raw string to the field's value type. Null stays null.
 */
export function castValue(raw: string | null, valueType: ValueType): FieldValue {
  if (raw === null) return null;
  switch (valueType) {
    case 'number':
      return parseNumber(raw);
    case 'boolean':
      return castBoolean(raw);
    default:
      return normalizeSpace(raw);
  }
}

export async function extractTables(
  page: PageHandle,
  selector: string,
  maxRows: number
): Promise<ExtractedTable[]> {
  const raw = await page.extractTables(selector, maxRows);
  return raw.map((table, index) => buildTable(table, index));
}

export class ContentExtractor {
  constructor(private readonly resolver: SelectorResolver) {}

  /**
   * Extract every field in order. A field that cannot be resolved is
   * reported in `failures` with a null value, unless it is required, in
   * which case the ResolutionFailure propagates.
   */
  async extract(page: PageHandle, fields: ParsedField[], options: ExtractOptions): Promise<ExtractionResult> {
    const result: ExtractionResult = { data: {}, fields: [], failures: [] };

    for (const field of fields) {
      if (field.valueType === 'table') {
        const locator = field.target.selectorHint ?? 'table';
        const tables = await extractTables(page, locator, options.limits.max_table_rows);
        result.data[field.name] = tables;
        result.fields.push({
          name: field.name,
          logicalName: field.target.logicalName,
          valueType: 'table',
          value: tables,
          strategy: 'table',
          confidence: tables.length > 0 ? 1 : 0,
          locator,
        });
        continue;
      }

      let extracted: ExtractedField;
      try {
        extracted = await this.extractField(page, field, options);
      } catch (error) {
        if (!(error instanceof ResolutionFailure) || field.required) throw error;
        log.info('Field not resolved', { field: field.name, attempted: error.attemptedStrategies });
        result.data[field.name] = null;
        result.failures.push({
          name: field.name,
          logicalName: field.target.logicalName,
          attemptedStrategies: error.attemptedStrategies,
        });
        continue;
      }

      result.data[field.name] = extracted.value;
      result.fields.push(extracted);
    }

    return result;
  }

  private async extractField(page: PageHandle, field: ParsedField, options: ExtractOptions): Promise<ExtractedField> {
    const candidate = await this.resolver.resolve(page, field.target, {
      signal: options.signal,
      config: options.selfHealing,
    });

    const readOptions = {
      ...(field.attribute ? { attribute: field.attribute } : {}),
      maxLength: options.limits.max_text_length,
    };

    let value: FieldValue;
    if (field.valueType === 'list') {
      value = await page.readAll(candidate.locator, options.limits.max_list_items, readOptions);
    } else {
      value = castValue(await page.readValue(candidate.locator, readOptions), field.valueType);
    }

    return {
      name: field.name,
      logicalName: field.target.logicalName,
      valueType: field.valueType,
      value,
      strategy: candidate.strategy,
      confidence: candidate.confidence,
      locator: candidate.locator,
    };
  }
}
