/**
 * @relay/core - Configuration loader
 *
 * Loads relay.json, merges it over the defaults, fills TypeBox defaults
 * and validates the result.
 */

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { RelayConfigSchema, DEFAULT_CONFIG, type RelayConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ensureRelayHome, resolveConfigPath } from './paths.js';
import { isPlainObject } from '../utils/index.js';

/** Raised when the configuration file cannot be read or parsed. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit config file. When set, a missing file is an error instead of being created. */
  path?: string;
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

function readConfigFile(configPath: string, createIfMissing: boolean): unknown {
  if (!existsSync(configPath)) {
    if (!createIfMissing) {
      throw new ConfigError(`Config file ${configPath} does not exist`, configPath);
    }
    ensureRelayHome();
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
    return structuredClone(DEFAULT_CONFIG);
  }

  const text = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      configPath,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`, configPath);
  }
  return parsed;
}

/**
 * Load the relay configuration.
 *
 * 1. Read relay.json (create it with defaults in RELAY_HOME if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Fill TypeBox defaults
 * 4. Validate
 */
export function loadConfig(options: LoadConfigOptions = {}): {
  config: RelayConfig;
  validation: ValidationResult;
  path: string;
} {
  const configPath = resolveConfigPath(options.path);
  const raw = readConfigFile(configPath, options.path === undefined);

  const merged = isPlainObject(raw)
    ? deepMerge(structuredClone(DEFAULT_CONFIG), raw)
    : structuredClone(DEFAULT_CONFIG);

  const withDefaults = Value.Default(RelayConfigSchema, merged);
  const validation = validateConfig(withDefaults);

  return { config: validation.config, validation, path: configPath };
}
