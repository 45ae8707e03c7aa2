/**
 * CSS identifier escaping and locator classification.
 */

/**
 * Escape a string for use as a CSS identifier (id or class name).
 * Follows the CSS.escape algorithm for the characters pages actually use.
 */
export function escapeCssIdentifier(value: string): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    const code = value.charCodeAt(i);

    if (code === 0) {
      out += '\uFFFD';
    } else if (
      (code >= 0x1 && code <= 0x1f) ||
      code === 0x7f ||
      (i === 0 && code >= 0x30 && code <= 0x39) ||
      (i === 1 && code >= 0x30 && code <= 0x39 && value.charCodeAt(0) === 0x2d)
    ) {
      out += `\\${code.toString(16)} `;
    } else if (i === 0 && value.length === 1 && code === 0x2d) {
      out += `\\${ch}`;
    } else if (code >= 0x80 || /[a-zA-Z0-9_-]/.test(ch)) {
      out += ch;
    } else {
      out += `\\${ch}`;
    }
  }
  return out;
}

/**
 * Quote a value for an attribute selector: [name="..."]
 */
export function quoteAttributeValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export type LocatorKind = 'css' | 'text' | 'xpath';

/**
 * Playwright-style locator prefixes: `text=`, `xpath=`, or a leading `//`.
 */
export function locatorKind(locator: string): LocatorKind {
  const trimmed = locator.trim();
  if (trimmed.startsWith('text=')) return 'text';
  if (trimmed.startsWith('xpath=') || trimmed.startsWith('//') || trimmed.startsWith('(//')) {
    return 'xpath';
  }
  return 'css';
}
