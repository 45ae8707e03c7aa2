import { describe, it, expect } from 'vitest';
import { escapeCssIdentifier, locatorKind, quoteAttributeValue } from '../../src/utils/css.js';

describe('css helpers', () => {
  describe('escapeCssIdentifier', () => {
    it('should leave plain identifiers alone', () => {
      expect(escapeCssIdentifier('product-price_1')).toBe('product-price_1');
    });

    it('should escape a leading digit as a code point', () => {
      expect(escapeCssIdentifier('1abc')).toBe('\\31 abc');
    });

    it('should backslash-escape punctuation', () => {
      expect(escapeCssIdentifier('a:b.c')).toBe('a\\:b\\.c');
    });

    it('should escape a lone hyphen', () => {
      expect(escapeCssIdentifier('-')).toBe('\\-');
    });
  });

  it('should quote attribute values', () => {
    expect(quoteAttributeValue('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('should classify locators', () => {
    expect(locatorKind('text=Add to cart')).toBe('text');
    expect(locatorKind('//div[@id="x"]')).toBe('xpath');
    expect(locatorKind('xpath=//span')).toBe('xpath');
    expect(locatorKind('div.price > span')).toBe('css');
  });
});
