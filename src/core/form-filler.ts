/**
 * Form Filler - fill form fields by name, id or placeholder
 *
 * Field lookup is engine-agnostic: the Playwright handle supplies the
 * controls, this module picks the selectors and decides what to do with
 * each value.
 */

import type { FillFormOptions, FillFormResult } from '../types/page.js';
import { escapeCssIdentifier, quoteAttributeValue } from '../utils/css.js';
import { logger } from '../utils/logger.js';

const log = logger.create('FormFiller');

export type ControlKind = 'text' | 'checkbox' | 'radio' | 'select' | 'button';

export interface FormControls {
  /** Kind of the first element matching `selector`, null when nothing matches */
  inspect(selector: string): Promise<ControlKind | null>;
  fill(selector: string, value: string): Promise<void>;
  setChecked(selector: string, checked: boolean): Promise<void>;
  selectOption(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
}

const CHECKED_VALUES = new Set(['1', 'true', 'yes', 'on', 'checked']);

export function checkedValue(value: string): boolean {
  return CHECKED_VALUES.has(value.trim().toLowerCase());
}

function scoped(formSelector: string | undefined, selector: string): string {
  return formSelector ? `${formSelector} ${selector}` : selector;
}

/**
 * Candidate selectors for a field key, most specific first.
 */
export function fieldSelectors(key: string, formSelector?: string): string[] {
  const quoted = quoteAttributeValue(key);
  return [
    `[name=${quoted}]`,
    `#${escapeCssIdentifier(key)}`,
    `input[placeholder*=${quoted} i]`,
    `textarea[placeholder*=${quoted} i]`,
    `[aria-label=${quoted} i]`,
  ].map((selector) => scoped(formSelector, selector));
}

export function submitSelectors(formSelector?: string): string[] {
  return ['button[type="submit"]', 'input[type="submit"]', 'button:not([type])'].map((selector) =>
    scoped(formSelector, selector)
  );
}

async function firstPresent(controls: FormControls, selectors: string[]) {
  for (const selector of selectors) {
    const kind = await controls.inspect(selector);
    if (kind) return { selector, kind };
  }
  return null;
}

export async function fillForm(
  controls: FormControls,
  values: Record<string, string>,
  options: FillFormOptions = {}
): Promise<FillFormResult> {
  const filledFields: string[] = [];
  const missingFields: string[] = [];

  for (const [key, value] of Object.entries(values)) {
    const target = await firstPresent(controls, fieldSelectors(key, options.formSelector));
    if (!target) {
      missingFields.push(key);
      continue;
    }

    switch (target.kind) {
      case 'checkbox':
      case 'radio':
        await controls.setChecked(target.selector, checkedValue(value));
        break;
      case 'select':
        await controls.selectOption(target.selector, value);
        break;
      case 'button':
        missingFields.push(key);
        continue;
      default:
        await controls.fill(target.selector, value);
    }
    filledFields.push(key);
  }

  let submitted = false;
  if (options.submit) {
    const button = await firstPresent(controls, submitSelectors(options.formSelector));
    if (button) {
      await controls.click(button.selector);
      submitted = true;
    } else {
      log.warn('No submit control found', { formSelector: options.formSelector });
    }
  }

  log.debug('Filled form', { filled: filledFields.length, missing: missingFields.length, submitted });
  return { filledFields, missingFields, submitted };
}
