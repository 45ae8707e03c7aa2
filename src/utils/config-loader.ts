/**
 * Configuration File Loader
 *
 * Precedence, lowest to highest:
 *   schema defaults < config file < environment variables < per-task overrides
 *
 * Search paths (in order), unless an explicit path is given:
 * 1. Current working directory
 * 2. Home directory
 *
 * Supported file names (YAML; JSON is valid YAML):
 * - mendscrape.yaml
 * - mendscrape.yml
 * - .mendscraperc
 * - .mendscraperc.json
 * - config/config.yaml
 *
 * @example
 * # mendscrape.yaml
 * browser:
 *   max_tabs: 3
 * self_healing:
 *   cache_ttl_hours: 72
 * log:
 *   level: debug
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import yaml from 'js-yaml';
import {
  agentConfigSchema,
  booleanStringSchema,
  configOverridesSchema,
  ConfigValidationError,
  type AgentConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

export const CONFIG_FILE_NAMES = [
  'mendscrape.yaml',
  'mendscrape.yml',
  '.mendscraperc',
  '.mendscraperc.json',
  join('config', 'config.yaml'),
];

export interface LoadConfigOptions {
  /** Explicit config file; skips the search when set */
  configPath?: string;
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: AgentConfig;
  /** File the configuration was read from, if any */
  path: string | null;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `patch` into `base`. Arrays and scalars replace.
 */
export function deepMerge(base: PlainObject, patch: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

// ============================================
// FILE SEARCH
// ============================================

function getSearchPaths(cwd: string, home: string | undefined): string[] {
  const paths = [cwd];
  if (home && !paths.includes(home)) {
    paths.push(home);
  }
  return paths;
}

/**
 * Find the first existing config file.
 */
export function findConfigFile(cwd: string = process.cwd(), home?: string): string | null {
  const searchPaths = getSearchPaths(cwd, home ?? safeHomedir());

  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

function safeHomedir(): string | undefined {
  try {
    return homedir();
  } catch (error) {
    log.debug('Home directory unavailable', { error: String(error) });
    return undefined;
  }
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Read and parse a config file. An empty file is an empty config.
 */
export function readConfigFile(filePath: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read config file ${filePath}: ${message}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

// ============================================
// ENVIRONMENT
// ============================================

/**
 * Environment overlay. Only variables that are set contribute.
 */
export function envOverlay(env: NodeJS.ProcessEnv): PlainObject {
  const overlay: PlainObject = {};

  const logSection: PlainObject = {};
  if (env.LOG_LEVEL) logSection.level = env.LOG_LEVEL;
  if (env.LOG_PRETTY !== undefined) logSection.prettyPrint = booleanStringSchema.parse(env.LOG_PRETTY);
  if (Object.keys(logSection).length > 0) overlay.log = logSection;

  if (env.MENDSCRAPE_MAX_TABS) {
    overlay.browser = { max_tabs: Number(env.MENDSCRAPE_MAX_TABS) };
  }
  if (env.MENDSCRAPE_SESSIONS_DIR) {
    overlay.sessions = { directory: env.MENDSCRAPE_SESSIONS_DIR };
  }
  if (env.MENDSCRAPE_CACHE_FILE) {
    overlay.self_healing = { cache_file: env.MENDSCRAPE_CACHE_FILE };
  }

  return overlay;
}

// ============================================
// MERGED CONFIG
// ============================================

/**
 * Validate a raw configuration object against the full schema.
 */
export function parseConfig(raw: unknown, section = 'config'): AgentConfig {
  const result = agentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

/**
 * Load the agent configuration from file and environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const path = options.configPath
    ? resolve(cwd, options.configPath)
    : findConfigFile(cwd, options.homeDir);

  let merged: PlainObject = {};
  if (path) {
    if (!existsSync(path)) {
      throw new Error(`Config file not found: ${path}`);
    }
    merged = readConfigFile(path);
    log.info('Loaded config file', { path, sections: Object.keys(merged) });
  }

  merged = deepMerge(merged, envOverlay(env));
  return { config: parseConfig(merged, path ?? 'environment'), path };
}

/**
 * Apply per-task overrides. Only `extraction`, `self_healing` (except
 * `cache_file`) and `task` may be overridden.
 */
export function applyOverrides(config: AgentConfig, overrides: unknown): AgentConfig {
  if (overrides === undefined || overrides === null) {
    return config;
  }

  const result = configOverridesSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigValidationError('config_overrides', result.error);
  }

  return parseConfig(deepMerge(config, result.data), 'config_overrides');
}

/**
 * Generate a sample config file with the default values.
 */
export function generateSampleConfig(): string {
  return yaml.dump(parseConfig({}), { lineWidth: 100 });
}
