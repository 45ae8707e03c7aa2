/**
 * Configuration Schemas
 *
 * Zod schemas for the agent configuration. Every default the agent runs with
 * lives here; the loader only merges sources on top of these.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Integer with bounds and a default.
 */
function boundedInt(min: number, max: number, defaultVal: number) {
  return z.number().int().min(min).max(max).default(defaultVal);
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: z.boolean().default(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// BROWSER
// ============================================

export const browserEngineSchema = z.enum(['chromium', 'static']);
export type BrowserEngine = z.infer<typeof browserEngineSchema>;

export const DEFAULT_LAUNCH_ARGS = [
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-background-timer-throttling',
  '--disable-renderer-backgrounding',
  '--mute-audio',
  '--no-first-run',
  '--no-sandbox',
  '--single-process',
];

export const browserConfigSchema = z.object({
  engine: browserEngineSchema.default('chromium'),
  headless: z.boolean().default(true),
  executable_path: z.string().min(1).optional(),
  max_tabs: boundedInt(1, 32, 2),
  navigation_timeout_ms: boundedInt(1000, 300000, TIMEOUTS.NAVIGATION),
  default_timeout_ms: boundedInt(100, 120000, TIMEOUTS.ELEMENT_ACTION),
  acquire_timeout_ms: boundedInt(100, 600000, TIMEOUTS.POOL_ACQUIRE),
  launch_args: z.array(z.string()).default(DEFAULT_LAUNCH_ARGS),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// PERFORMANCE
// ============================================

export const resourceTypeSchema = z.enum([
  'document',
  'stylesheet',
  'image',
  'media',
  'font',
  'script',
  'texttrack',
  'xhr',
  'fetch',
  'eventsource',
  'websocket',
  'manifest',
  'other',
]);

export const DEFAULT_AD_DOMAINS = [
  'doubleclick.net',
  'googlesyndication.com',
  'googletagmanager.com',
  'google-analytics.com',
  'adservice.google.com',
  'connect.facebook.net',
  'scorecardresearch.com',
  'taboola.com',
  'outbrain.com',
];

export const performanceConfigSchema = z.object({
  enable_request_blocking: z.boolean().default(true),
  block_resource_types: z.array(resourceTypeSchema).default(['image', 'media', 'font']),
  block_ad_domains: z.array(z.string().min(1)).default(DEFAULT_AD_DOMAINS),
  wait_after_navigation_ms: boundedInt(0, 60000, TIMEOUTS.POST_NAVIGATION),
});

export type PerformanceConfig = z.infer<typeof performanceConfigSchema>;

// ============================================
// STEALTH / DEVICE PROFILE
// ============================================

export const navigatorOverridesSchema = z.object({
  hardware_concurrency: boundedInt(1, 128, 4),
  device_memory: z.number().positive().default(4),
  platform: z.string().default('Linux armv8l'),
  language: z.string().default('en-US'),
});

export type NavigatorOverrides = z.infer<typeof navigatorOverridesSchema>;

export const stealthConfigSchema = z.object({
  enabled: z.boolean().default(true),
  navigator_overrides: navigatorOverridesSchema.default({}),
});

export type StealthConfig = z.infer<typeof stealthConfigSchema>;

export const deviceProfileSchema = z.object({
  user_agent: z
    .string()
    .default(
      'Mozilla/5.0 (X11; Linux armv8l) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36'
    ),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 1366, height: 768 }),
  locale: z.string().default('en-US'),
  timezone_id: z.string().default('UTC'),
  extra_http_headers: z.record(z.string()).default({ 'Accept-Language': 'en-US,en;q=0.9' }),
});

export type DeviceProfile = z.infer<typeof deviceProfileSchema>;

// ============================================
// SELF-HEALING
// ============================================

export const strategyTagSchema = z.enum(['direct', 'cached', 'text', 'semantic']);

export const selfHealingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  timeout_ms: boundedInt(50, 60000, TIMEOUTS.STRATEGY_ATTEMPT),
  cache_file: z.string().default('./cache/selectors.json'),
  cache_ttl_hours: z.number().positive().default(168),
  max_candidates: boundedInt(10, 20000, 1800),
  similarity_threshold: z.number().min(0).default(3.5),
  strategies: z
    .array(strategyTagSchema)
    .min(1)
    .default(['direct', 'cached', 'text', 'semantic']),
  reverify_cached: z.boolean().default(true),
});

export type SelfHealingConfig = z.infer<typeof selfHealingConfigSchema>;

// ============================================
// SESSIONS / DOWNLOADS / EXTRACTION / NETWORK / TASK
// ============================================

export const sessionsConfigSchema = z.object({
  directory: z.string().default('./cache/sessions'),
});

export type SessionsConfig = z.infer<typeof sessionsConfigSchema>;

export const downloadsConfigSchema = z.object({
  directory: z.string().default('./downloads'),
  max_bytes: boundedInt(1, 2_000_000_000, 50 * 1024 * 1024),
  timeout_ms: boundedInt(1000, 3600000, TIMEOUTS.DOWNLOAD),
  /** Permit loopback, private and link-local hosts */
  allow_private_hosts: z.boolean().default(false),
});

export type DownloadsConfig = z.infer<typeof downloadsConfigSchema>;

export const extractionConfigSchema = z.object({
  max_table_rows: boundedInt(1, 100000, 1000),
  max_text_length: boundedInt(1, 1000000, 12000),
  max_list_items: boundedInt(1, 10000, 200),
  stream_chunk_chars: boundedInt(1, 100000, 1800),
  max_stream_chunks: boundedInt(1, 10000, 12),
});

export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;

export const networkConfigSchema = z.object({
  max_events: boundedInt(1, 100000, 600),
});

export type NetworkConfig = z.infer<typeof networkConfigSchema>;

export const taskConfigSchema = z.object({
  timeout_ms: boundedInt(100, 3600000, TIMEOUTS.TASK),
});

export type TaskConfig = z.infer<typeof taskConfigSchema>;

// ============================================
// COMPLETE AGENT CONFIGURATION
// ============================================

export const agentConfigSchema = z.object({
  browser: browserConfigSchema.default({}),
  performance: performanceConfigSchema.default({}),
  stealth: stealthConfigSchema.default({}),
  device_profile: deviceProfileSchema.default({}),
  self_healing: selfHealingConfigSchema.default({}),
  sessions: sessionsConfigSchema.default({}),
  downloads: downloadsConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  network: networkConfigSchema.default({}),
  task: taskConfigSchema.default({}),
  log: logConfigSchema.default({}),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;

/**
 * Per-task overrides. Only sections that can change per call are accepted;
 * the cache file is fixed for the lifetime of the agent.
 */
export const configOverridesSchema = z
  .object({
    extraction: extractionConfigSchema.partial().strict().optional(),
    self_healing: selfHealingConfigSchema.omit({ cache_file: true }).partial().strict().optional(),
    task: taskConfigSchema.partial().strict().optional(),
  })
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.') || '(root)';
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Configuration validation error listing every failing path.
 */
export class ConfigValidationError extends Error {
  readonly kind = 'invalid_config';

  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(`Configuration validation failed for ${section}:\n${formatted}`);
    this.name = 'ConfigValidationError';
  }

  get issues(): string[] {
    return this.zodError.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
}
