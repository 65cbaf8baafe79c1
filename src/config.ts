/**
 * Configuration Loader
 * Loads and validates .dhallrc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError } from './error-classes.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.dhallrc.yaml';

// ============================================================
// TYPES
// ============================================================

export interface DhallConfig {
  /** Resolve imports when loading files; when false any import is an error */
  readonly resolveImports: boolean;
  /** Directory for `~/` imports; the OS home directory when unset */
  readonly homeDirectory: string | undefined;
  /** Share the result of a file imported more than once */
  readonly cache: boolean;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): DhallConfig {
  return {
    resolveImports: true,
    homeDirectory: undefined,
    cache: true,
  };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS = new Set(['resolveImports', 'homeDirectory', 'cache']);

/**
 * Validate configuration structure and value types.
 * Throws ConfigError if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is {
  resolveImports?: boolean;
  homeDirectory?: string;
  cache?: boolean;
} {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError('must be a mapping');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`);
    }
    if (key === 'homeDirectory') {
      if (typeof value !== 'string' || value === '') {
        throw new ConfigError('homeDirectory must be a non-empty string');
      }
    } else if (typeof value !== 'boolean') {
      throw new ConfigError(`${key} must be a boolean`);
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .dhallrc.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over the defaults, or null if file not found
 * @throws {ConfigError} If the file is unreadable, not YAML, or has invalid keys
 */
export function loadConfig(cwd: string): DhallConfig | null {
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
      err
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`,
      err
    );
  }

  // An empty file parses to null
  if (parsedData === null || parsedData === undefined) {
    return createDefaultConfig();
  }

  validateConfig(parsedData);

  const defaults = createDefaultConfig();
  return {
    resolveImports: parsedData.resolveImports ?? defaults.resolveImports,
    homeDirectory: parsedData.homeDirectory ?? defaults.homeDirectory,
    cache: parsedData.cache ?? defaults.cache,
  };
}
