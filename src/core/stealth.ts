/**
 * Stealth Provider - navigator overrides injected into every new context
 */

import type { NavigatorOverrides, StealthConfig } from '../utils/config-schemas.js';

/**
 * Build the init script for the given overrides. Values are embedded as JSON
 * literals so configured strings cannot break out of the script.
 */
export function buildInitScript(overrides: NavigatorOverrides): string {
  const define = (prop: string, value: unknown) =>
    `Object.defineProperty(navigator, ${JSON.stringify(prop)}, { get: () => ${JSON.stringify(value)} });`;

  return [
    define('webdriver', false),
    define('hardwareConcurrency', Math.trunc(overrides.hardware_concurrency)),
    define('deviceMemory', overrides.device_memory),
    define('platform', overrides.platform),
    define('language', overrides.language),
    define('languages', uniqueLanguages(overrides.language)),
    'window.chrome = window.chrome || { runtime: {} };',
  ].join('\n');
}

function uniqueLanguages(language: string): string[] {
  return language === 'en' ? ['en'] : [language, 'en'];
}

export class StealthProvider {
  constructor(private readonly config: StealthConfig) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Script to add to new browser contexts, or null when stealth is disabled.
   */
  initScript(): string | null {
    return this.config.enabled ? buildInitScript(this.config.navigator_overrides) : null;
  }
}
