import { describe, it, expect } from 'vitest';
import { StealthProvider, buildInitScript } from '../../src/core/stealth.js';
import { stealthConfigSchema } from '../../src/utils/config-schemas.js';

describe('StealthProvider', () => {
  const overrides = {
    hardware_concurrency: 4,
    device_memory: 2,
    platform: 'Linux armv8l',
    language: 'de-DE',
  };

  it('should define each navigator property as a JSON literal', () => {
    const lines = buildInitScript(overrides).split('\n');
    expect(lines).toEqual([
      'Object.defineProperty(navigator, "webdriver", { get: () => false });',
      'Object.defineProperty(navigator, "hardwareConcurrency", { get: () => 4 });',
      'Object.defineProperty(navigator, "deviceMemory", { get: () => 2 });',
      'Object.defineProperty(navigator, "platform", { get: () => "Linux armv8l" });',
      'Object.defineProperty(navigator, "language", { get: () => "de-DE" });',
      'Object.defineProperty(navigator, "languages", { get: () => ["de-DE","en"] });',
      'window.chrome = window.chrome || { runtime: {} };',
    ]);
  });

  it('should escape configured strings', () => {
    const script = buildInitScript({ ...overrides, platform: '"); alert(1); ("' });
    expect(script).toContain('{ get: () => "\\"); alert(1); (\\"" }');
  });

  it('should return no script when disabled', () => {
    const provider = new StealthProvider(stealthConfigSchema.parse({ enabled: false }));
    expect(provider.enabled).toBe(false);
    expect(provider.initScript()).toBeNull();
  });

  it('should use the default overrides when enabled', () => {
    const provider = new StealthProvider(stealthConfigSchema.parse({}));
    expect(provider.initScript()).toContain('{ get: () => "Linux armv8l" }');
  });
});
