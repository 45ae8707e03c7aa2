import { describe, it, expect } from 'vitest';
import {
  checkedValue,
  fieldSelectors,
  fillForm,
  submitSelectors,
  type ControlKind,
  type FormControls,
} from '../../src/core/form-filler.js';

class RecordingControls implements FormControls {
  readonly calls: string[] = [];

  constructor(private readonly present: Record<string, ControlKind>) {}

  async inspect(selector: string): Promise<ControlKind | null> {
    return this.present[selector] ?? null;
  }

  async fill(selector: string, value: string): Promise<void> {
    this.calls.push(`fill ${selector} ${value}`);
  }

  async setChecked(selector: string, checked: boolean): Promise<void> {
    this.calls.push(`check ${selector} ${checked}`);
  }

  async selectOption(selector: string, value: string): Promise<void> {
    this.calls.push(`select ${selector} ${value}`);
  }

  async click(selector: string): Promise<void> {
    this.calls.push(`click ${selector}`);
  }
}

describe('form-filler', () => {
  it('should try name, id, placeholder and label selectors in order', () => {
    expect(fieldSelectors('email')).toEqual([
      '[name="email"]',
      '#email',
      'input[placeholder*="email" i]',
      'textarea[placeholder*="email" i]',
      '[aria-label="email" i]',
    ]);
  });

  it('should scope selectors to a form', () => {
    expect(fieldSelectors('q', 'form#search')[0]).toBe('form#search [name="q"]');
    expect(submitSelectors('form#search')).toEqual([
      'form#search button[type="submit"]',
      'form#search input[type="submit"]',
      'form#search button:not([type])',
    ]);
  });

  it('should escape keys that are not plain identifiers', () => {
    expect(fieldSelectors('user[name]').slice(0, 2)).toEqual(['[name="user[name]"]', '#user\\[name\\]']);
  });

  it('should read checkbox values', () => {
    expect(['1', 'true', 'Yes', 'on', 'checked'].map(checkedValue)).toEqual([true, true, true, true, true]);
    expect(['0', 'false', 'no', ''].map(checkedValue)).toEqual([false, false, false, false]);
  });

  it('should fill each field by its control kind and report missing ones', async () => {
    const controls = new RecordingControls({
      '[name="email"]': 'text',
      '#terms': 'checkbox',
      '[name="country"]': 'select',
    });

    const result = await fillForm(controls, {
      email: 'user@mail.example',
      terms: 'yes',
      country: 'NZ',
      phone: '555-0100',
    });

    expect(result).toEqual({
      filledFields: ['email', 'terms', 'country'],
      missingFields: ['phone'],
      submitted: false,
    });
    expect(controls.calls).toEqual([
      'fill [name="email"] user@mail.example',
      'check #terms true',
      'select [name="country"] NZ',
    ]);
  });

  it('should not type into buttons', async () => {
    const controls = new RecordingControls({ '[name="go"]': 'button' });
    const result = await fillForm(controls, { go: 'now' });
    expect(result).toEqual({ filledFields: [], missingFields: ['go'], submitted: false });
    expect(controls.calls).toEqual([]);
  });

  it('should click the first submit control when asked', async () => {
    const controls = new RecordingControls({
      'form#login [name="user"]': 'text',
      'form#login input[type="submit"]': 'button',
    });

    const result = await fillForm(controls, { user: 'tester' }, { formSelector: 'form#login', submit: true });

    expect(result).toEqual({ filledFields: ['user'], missingFields: [], submitted: true });
    expect(controls.calls).toEqual(['fill form#login [name="user"] tester', 'click form#login input[type="submit"]']);
  });

  it('should report no submission when the form has no submit control', async () => {
    const controls = new RecordingControls({ '[name="user"]': 'text' });
    const result = await fillForm(controls, { user: 'tester' }, { submit: true });
    expect(result.submitted).toBe(false);
  });
});
