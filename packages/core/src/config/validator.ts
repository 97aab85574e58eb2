/**
 * @relay/core - Configuration validator
 *
 * Validates a RelayConfig object using TypeBox and applies business rules
 * (non-empty backend list, argument template placeholders, duplicates).
 */

import { Value } from '@sinclair/typebox/value';
import { RelayConfigSchema, DEFAULT_CONFIG, type RelayConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: RelayConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

export const BACKEND_PLACEHOLDER = '{backend}';
export const PROMPT_PLACEHOLDER = '{prompt}';

/**
 * Validate and normalise a RelayConfig object.
 *
 * 1. TypeBox schema check
 * 2. Backend list must not be empty
 * 3. Soft warnings for duplicates, missing placeholders and empty indicators
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // ----- TypeBox schema validation -----
  for (const err of Value.Errors(RelayConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  // Partial results are still useful to the caller, so fall back to defaults
  // for whatever could not be decoded.
  const withDefaults = Value.Default(RelayConfigSchema, Value.Clone(raw));
  const config: RelayConfig = Value.Check(RelayConfigSchema, withDefaults)
    ? withDefaults
    : structuredClone(DEFAULT_CONFIG);

  // ----- Business rules -----
  if (Array.isArray(config.backends) && config.backends.length === 0) {
    errors.push({
      path: '/backends',
      message: 'At least one backend must be configured',
    });
  }

  const seen = new Set<string>();
  config.backends.forEach((backend, i) => {
    if (seen.has(backend)) {
      warnings.push({
        path: `/backends/${i}`,
        message: `Duplicate backend "${backend}" will be tried twice per cycle`,
      });
    }
    seen.add(backend);
  });

  const args = config.command.args;
  if (!args.some((arg) => arg.includes(PROMPT_PLACEHOLDER))) {
    warnings.push({
      path: '/command/args',
      message: `Argument template has no ${PROMPT_PLACEHOLDER} placeholder; the prompt will not be passed`,
    });
  }
  if (!args.some((arg) => arg.includes(BACKEND_PLACEHOLDER))) {
    warnings.push({
      path: '/command/args',
      message: `Argument template has no ${BACKEND_PLACEHOLDER} placeholder; every backend runs the same command`,
    });
  }

  if (config.quotaIndicators.length === 0) {
    warnings.push({
      path: '/quotaIndicators',
      message: 'No quota indicators configured; every failure will be treated as fatal',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}
