/**
 * Configuration Loader for the treelox CLI
 * Loads and validates treelox.yaml configuration files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import {
  DEFAULT_MAX_CALL_DEPTH,
  DEFAULT_NUMBER_PRECISION,
  isValidCallDepth,
} from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'treelox.yaml';

/** Environment variable overriding the configuration path */
export const CONFIG_ENV_VAR = 'TREELOX_CONFIG';

export interface CliConfig {
  /** REPL prompt */
  readonly prompt: string;
  /** Maximum function call depth; `.inf` in YAML for no limit */
  readonly maxCallDepth: number;
  /** Decimals used when printing numbers */
  readonly numberPrecision: number;
}

/** Error raised for unreadable or invalid configuration */
export class ConfigError extends Error {
  constructor(reason: string) {
    super(`Invalid configuration: ${reason}`);
    this.name = 'ConfigError';
  }
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): CliConfig {
  return {
    prompt: '> ',
    maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
    numberPrecision: DEFAULT_NUMBER_PRECISION,
  };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS = new Set(['prompt', 'maxCallDepth', 'numberPrecision']);

/**
 * Validate configuration structure and merge it over the defaults.
 * @throws ConfigError naming the first offending key
 */
export function validateConfig(data: unknown): CliConfig {
  const defaults = createDefaultConfig();

  // An empty document parses to null
  if (data === null || data === undefined) {
    return defaults;
  }

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError('must be a mapping');
  }

  const config = new Map<string, unknown>(Object.entries(data));

  for (const key of config.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(`unknown key ${key}`);
    }
  }

  const prompt = config.get('prompt') ?? defaults.prompt;
  if (typeof prompt !== 'string') {
    throw new ConfigError('prompt must be a string');
  }

  const maxCallDepth = config.get('maxCallDepth') ?? defaults.maxCallDepth;
  if (typeof maxCallDepth !== 'number' || !isValidCallDepth(maxCallDepth)) {
    throw new ConfigError('maxCallDepth must be a positive integer');
  }

  const numberPrecision =
    config.get('numberPrecision') ?? defaults.numberPrecision;
  if (
    typeof numberPrecision !== 'number' ||
    !Number.isInteger(numberPrecision) ||
    numberPrecision < 0 ||
    numberPrecision > 20
  ) {
    throw new ConfigError('numberPrecision must be an integer from 0 to 20');
  }

  return { prompt, maxCallDepth, numberPrecision };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Resolve the configuration file path: TREELOX_CONFIG when set
 * (relative to cwd), otherwise treelox.yaml in cwd.
 */
export function resolveConfigPath(
  cwd: string,
  env: NodeJS.ProcessEnv
): string {
  const override = env[CONFIG_ENV_VAR];
  return override ? resolve(cwd, override) : join(cwd, CONFIG_FILE_NAME);
}

/**
 * Load configuration for the CLI.
 *
 * A missing default file means defaults. A missing file named by
 * TREELOX_CONFIG is an error.
 *
 * @throws ConfigError for unreadable files, invalid YAML or invalid values
 */
export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const configPath = resolveConfigPath(cwd, env);

  if (!existsSync(configPath)) {
    if (env[CONFIG_ENV_VAR]) {
      throw new ConfigError(`file not found (${configPath})`);
    }
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new ConfigError(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
