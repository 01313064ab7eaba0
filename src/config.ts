/**
 * Configuration Loader for minilex
 * Loads and validates .minilex.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError, MINILEX_ERROR_CODES } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.minilex.yaml';

export type OutputFormat = 'text' | 'json';

export interface LexConfig {
  readonly format: OutputFormat;
  /** Append token offsets to text output */
  readonly offsets: boolean;
  /** Exit with status 1 when an Invalid token is produced */
  readonly strict: boolean;
}

const KNOWN_KEYS: ReadonlySet<string> = new Set(['format', 'offsets', 'strict']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): LexConfig {
  return { format: 'text', offsets: false, strict: false };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Validate configuration structure and values.
 * Throws ConfigError if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is Partial<LexConfig> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('must be a mapping');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`);
    }
    if (key === 'format' && !isOutputFormat(value)) {
      throw new ConfigError(
        `format has invalid value "${String(value)}" (must be 'text' or 'json')`
      );
    }
    if ((key === 'offsets' || key === 'strict') && typeof value !== 'boolean') {
      throw new ConfigError(`${key} must be a boolean`);
    }
  }
}

/**
 * Parse configuration text and merge it over the defaults.
 * An empty document yields the defaults.
 */
export function parseConfig(content: string): LexConfig {
  let parsedData: unknown;
  try {
    parsedData = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // yaml.parse returns null for empty content
  if (parsedData === null || parsedData === undefined) {
    return createDefaultConfig();
  }

  validateConfig(parsedData);
  return { ...createDefaultConfig(), ...parsedData };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .minilex.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns LexConfig, or null if no file exists
 */
export function loadConfig(cwd: string): LexConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`,
      MINILEX_ERROR_CODES.CONFIG_UNREADABLE,
      { path: configPath }
    );
  }

  return parseConfig(fileContent);
}
