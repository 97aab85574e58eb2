/**
 * @relay/core - TypeBox schema for relay.json configuration
 *
 * Sections: backends, command, fallback, quotaIndicators, log
 */

import { Type, type Static } from '@sinclair/typebox';
import { MAX_TIMER_DELAY_MS } from '../utils/index.js';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const CommandSchema = Type.Object({
  command: Type.String({ default: 'gemini', description: 'Executable invoked once per attempt' }),
  args: Type.Array(Type.String(), {
    default: ['--model', '{backend}', '-p', '{prompt}'],
    description: 'Argument template; {backend} and {prompt} are substituted',
  }),
  env: Type.Optional(Type.Record(Type.String(), Type.String())),
  cwd: Type.Optional(Type.String()),
});

const FallbackSchema = Type.Object({
  maxRetriesPerBackend: Type.Integer({ minimum: 1, default: 3 }),
  maxCycles: Type.Integer({ minimum: 1, default: 3 }),
  deadlineMs: Type.Integer({ minimum: 1, maximum: MAX_TIMER_DELAY_MS, default: 60000 }),
  retryBackoffMs: Type.Integer({ minimum: 0, maximum: MAX_TIMER_DELAY_MS, default: 5000 }),
  cycleBackoffMs: Type.Integer({ minimum: 0, maximum: MAX_TIMER_DELAY_MS, default: 2000 }),
});

const LogSchema = Type.Object({
  level: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const RelayConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  backends: Type.Array(Type.String({ minLength: 1 }), {
    description: 'Backend identifiers, highest priority first',
  }),
  command: CommandSchema,
  fallback: FallbackSchema,
  quotaIndicators: Type.Array(Type.String({ minLength: 1 })),
  log: LogSchema,
});

export type RelayConfig = Static<typeof RelayConfigSchema>;
export type LogLevel = RelayConfig['log']['level'];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_BACKENDS: readonly string[] = [
  'gemini-2.5-pro',
  'gemini-2.5-flash',
  'gemini-2.5-flash-preview-09-2025',
  'gemini-2.5-flash-lite',
  'gemini-1.5-pro',
  'gemini-1.5-flash',
];

export const DEFAULT_CONFIG: RelayConfig = {
  version: 1,
  backends: [...DEFAULT_BACKENDS],
  command: {
    command: 'gemini',
    args: ['--model', '{backend}', '-p', '{prompt}'],
  },
  fallback: {
    maxRetriesPerBackend: 3,
    maxCycles: 3,
    deadlineMs: 60000,
    retryBackoffMs: 5000,
    cycleBackoffMs: 2000,
  },
  quotaIndicators: ['quota', 'quota exceeded', 'limit', '429', 'rate limit'],
  log: {
    level: 'info',
  },
};
