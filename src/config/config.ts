/**
 * Configuration loader for orgview
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { DEFAULT_CONFIG, validateConfig, type OrgViewConfig } from './schema.js';

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILE_NAMES = ['orgview.config.json', '.orgviewrc.json'];

/**
 * Map of environment variable names to configuration paths
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  ORGVIEW_CACHE_TTL: ['cache', 'ttlSeconds'],
  ORGVIEW_CACHE_MAXSIZE: ['cache', 'maxSize'],
  ORGVIEW_AWS_REGION: ['aws', 'region'],
  ORGVIEW_LOG_LEVEL: ['logging', 'level'],
  ORGVIEW_LOG_FILE: ['logging', 'file'],
  ORGVIEW_LOG_PRETTY: ['logging', 'pretty'],
};

const NUMERIC_PATHS = ['cache.ttlSeconds', 'cache.maxSize'];

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; source values win
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: ConfigRecord, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.includes(path.join('.'))) {
    const num = parseInt(value, 10);
    if (!isNaN(num)) return num;
  }

  return value;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigRecord {
  const config: ConfigRecord = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Find a configuration file in the directory or any of its ancestors
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);
  const root = resolve('/');

  while (currentDir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    currentDir = resolve(currentDir, '..');
  }

  return null;
}

function loadFileConfig(filePath: string): ConfigRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Failed to load configuration from ${filePath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: Record<string, unknown>;
}

/**
 * Load and validate orgview configuration
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): OrgViewConfig {
  let config: ConfigRecord = { ...DEFAULT_CONFIG };

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): OrgViewConfig {
  return DEFAULT_CONFIG;
}
